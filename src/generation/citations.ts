/**
 * @fileoverview Citation markers in generated answers
 *
 * Accepted forms: `[2]`, `[1, 3]` and `[Source 2]`. Valid markers are
 * rewritten to the canonical `[n]` / `[n, m]` form; indices for passages the
 * model was not given are removed from the text and reported.
 */

import type { Citation, ContextPassage, DraftAnswer } from '../types.js';

const MARKER_PATTERN = /(\s*)\[(?:source\s+)?(\d+(?:\s*,\s*(?:source\s+)?\d+)*)\]/gi;

/** Opening of the refusal sentence the system prompt prescribes. */
export const DECLINE_SENTENCE = 'cannot answer this question';

export const DECLINE_PHRASES: readonly string[] = [
  'cannot answer',
  'not covered',
  'not mentioned',
  'no information',
  'not in the context',
];

export interface ResolvedCitations {
  text: string;
  citations: ContextPassage[];
  invalidCitations: number[];
}

function parseIndices(group: string): number[] {
  return group
    .split(',')
    .map((part) => Number.parseInt(part.replace(/source/i, '').trim(), 10))
    .filter((value) => Number.isInteger(value));
}

/** Every cited index in order of appearance, duplicates included. */
export function extractCitationIndices(text: string): number[] {
  const indices: number[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    indices.push(...parseIndices(match[2]));
  }
  return indices;
}

export function stripCitationMarkers(text: string): string {
  return text.replace(MARKER_PATTERN, '').replace(/\s+([.,;:!?])/g, '$1').trim();
}

export function resolveCitations(text: string, passages: readonly ContextPassage[]): ResolvedCitations {
  const byIndex = new Map(passages.map((passage) => [passage.citationIndex, passage]));
  const cited: ContextPassage[] = [];
  const citedIndices = new Set<number>();
  const invalid: number[] = [];

  const rewritten = text.replace(MARKER_PATTERN, (_match, lead: string, group: string) => {
    const valid: number[] = [];
    for (const index of parseIndices(group)) {
      const passage = byIndex.get(index);
      if (!passage) {
        if (!invalid.includes(index)) invalid.push(index);
        continue;
      }
      if (!valid.includes(index)) valid.push(index);
      if (!citedIndices.has(index)) {
        citedIndices.add(index);
        cited.push(passage);
      }
    }
    return valid.length > 0 ? `${lead}[${valid.join(', ')}]` : '';
  });

  return { text: rewritten.trim(), citations: cited, invalidCitations: invalid };
}

/**
 * A draft declines when it uses the prescribed refusal sentence, or when it
 * cites no source and says the sources lack the answer. A cited statement
 * that something "is not covered" is an ordinary claim for the validator.
 */
export function isDecline(text: string, validCitationCount: number): boolean {
  const lower = text.toLowerCase();
  if (lower.includes(DECLINE_SENTENCE)) return true;
  return validCitationCount === 0 && DECLINE_PHRASES.some((phrase) => lower.includes(phrase));
}

export function toPublicCitations(draft: DraftAnswer, excerptLength = 300): Citation[] {
  return draft.citations.map(({ citationIndex, candidate }) => {
    const { chunk } = candidate;
    const excerpt = chunk.text.length > excerptLength ? `${chunk.text.slice(0, excerptLength).trimEnd()}...` : chunk.text;
    return {
      chunkId: chunk.chunkId,
      documentId: chunk.documentId,
      filename: chunk.filename,
      chunkIndex: chunk.chunkIndex,
      pageNumber: chunk.pageNumber,
      excerpt,
      relevanceScore: Number(candidate.relevanceScore.toFixed(3)),
      citationIndex,
    };
  });
}
