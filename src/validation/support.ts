/**
 * @fileoverview Claim support checking
 *
 * The lexical checker measures how much of a claim's content vocabulary the
 * evidence contains. A claim citing several passages is measured against
 * their combined text; an uncited claim against its best single passage.
 */

import type { ClaimAssessment, SupportLevel } from '../types.js';
import { contentTokens, isNumericToken, normalizeText } from '../utils/text.js';
import type { ClaimSpan } from './claims.js';

export interface EvidencePassage {
  citationIndex: number;
  text: string;
}

export interface SupportChecker {
  readonly name: string;
  assess(claim: ClaimSpan, evidence: readonly EvidencePassage[], signal?: AbortSignal): Promise<ClaimAssessment>;
}

export const HEDGE_PHRASES: readonly string[] = [
  'based on my knowledge',
  'as far as i know',
  'generally speaking',
  'in my experience',
];

export interface LexicalSupportOptions {
  exactThreshold?: number;
  partialThreshold?: number;
}

function coverageOf(claimTokens: ReadonlySet<string>, evidenceTokens: ReadonlySet<string>): number {
  if (claimTokens.size === 0) return 0;
  let hits = 0;
  for (const token of claimTokens) {
    if (evidenceTokens.has(token)) hits += 1;
  }
  return hits / claimTokens.size;
}

export class LexicalSupportChecker implements SupportChecker {
  readonly name = 'lexical';
  private readonly exactThreshold: number;
  private readonly partialThreshold: number;

  constructor(options: LexicalSupportOptions = {}) {
    this.exactThreshold = options.exactThreshold ?? 0.75;
    this.partialThreshold = options.partialThreshold ?? 0.5;
  }

  async assess(claim: ClaimSpan, evidence: readonly EvidencePassage[]): Promise<ClaimAssessment> {
    const base = { text: claim.text, citedIndices: [...claim.citedIndices] };
    const normalizedClaim = normalizeText(claim.text);

    const hedge = HEDGE_PHRASES.find((phrase) => normalizedClaim.includes(phrase));
    if (hedge) {
      return { ...base, support: 'none', coverage: 0, reason: `hedged with "${hedge}"` };
    }
    if (evidence.length === 0) {
      return { ...base, support: 'none', coverage: 0, reason: 'no evidence passages' };
    }

    const claimTokens = new Set(contentTokens(claim.text));
    const passages = evidence.map((passage) => ({
      normalized: normalizeText(passage.text),
      tokens: new Set(contentTokens(passage.text)),
    }));

    const substring = passages.some((passage) => passage.normalized.includes(normalizedClaim));
    let coverage: number;
    let evidenceTokens: Set<string>;
    if (claim.citedIndices.length > 0) {
      evidenceTokens = new Set(passages.flatMap((passage) => Array.from(passage.tokens)));
      coverage = coverageOf(claimTokens, evidenceTokens);
    } else {
      let best = passages[0];
      let bestCoverage = -1;
      for (const passage of passages) {
        const value = coverageOf(claimTokens, passage.tokens);
        if (value > bestCoverage) {
          best = passage;
          bestCoverage = value;
        }
      }
      coverage = bestCoverage;
      evidenceTokens = best.tokens;
    }
    if (substring) coverage = 1;

    const missingNumber = Array.from(claimTokens).find((token) => isNumericToken(token) && !evidenceTokens.has(token));
    if (missingNumber && !substring) {
      return { ...base, support: 'none', coverage, reason: `number ${missingNumber} not found in evidence` };
    }

    let support: SupportLevel;
    if (substring || coverage >= this.exactThreshold) {
      support = 'exact';
    } else if (coverage >= this.partialThreshold) {
      support = 'partial';
    } else {
      support = 'none';
    }
    return {
      ...base,
      support,
      coverage,
      reason: substring ? 'claim appears verbatim in evidence' : `${Math.round(coverage * 100)}% of claim terms found in evidence`,
    };
  }
}
