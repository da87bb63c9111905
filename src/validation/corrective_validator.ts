/**
 * @fileoverview Corrective validation loop
 *
 * States: drafted → checking → { supported, partially_unsupported,
 * unsupported }. Terminal outcomes: accepted, regenerated, suppressed.
 *
 * `nextTransition` is the whole decision table; `runCorrectiveLoop` is a
 * counted loop around it that never calls the generator more than
 * retryBudget + 1 times.
 */

import { GenerationFailure, ValidationFailure, isCancellation } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ClaimAssessment, DraftAnswer, ValidationVerdict, VerdictClassification } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { splitClaims } from './claims.js';
import type { EvidencePassage, SupportChecker } from './support.js';

// ============================================================================
// STATE MACHINE
// ============================================================================

export type ValidatorState = 'drafted' | 'checking' | VerdictClassification;
export type CorrectiveOutcome = 'accepted' | 'regenerated' | 'suppressed';

export interface TransitionInput {
  classification: VerdictClassification;
  /** 1-based generator call count for the draft under review */
  attempt: number;
  retryBudget: number;
  /** An earlier draft of this answer was classified unsupported */
  previouslyUnsupported: boolean;
  declined: boolean;
}

export function nextTransition(input: TransitionInput): CorrectiveOutcome {
  if (input.declined) return 'suppressed';
  if (input.classification === 'supported') return 'accepted';
  const canRetry = input.attempt - 1 < input.retryBudget;
  if (input.classification === 'partially_unsupported') {
    return canRetry ? 'regenerated' : 'suppressed';
  }
  return canRetry && !input.previouslyUnsupported ? 'regenerated' : 'suppressed';
}

// ============================================================================
// VALIDATOR
// ============================================================================

export interface CorrectiveValidatorOptions {
  minClaimTokens: number;
}

export function classifyClaims(claims: readonly ClaimAssessment[], extraFlags: readonly string[]): VerdictClassification {
  if (claims.length === 0) return 'unsupported';
  if (claims.every((claim) => claim.support === 'none')) return 'unsupported';
  const flagged = claims.some((claim) => claim.support === 'none') || extraFlags.length > 0;
  return flagged ? 'partially_unsupported' : 'supported';
}

export class CorrectiveValidator {
  constructor(
    private readonly checker: SupportChecker,
    private readonly options: CorrectiveValidatorOptions
  ) {}

  /**
   * @throws ValidationFailure when the support checker fails
   */
  async validate(draft: DraftAnswer, signal?: AbortSignal): Promise<ValidationVerdict> {
    const { claims } = splitClaims(draft.text, this.options.minClaimTokens);
    const evidenceByIndex = new Map<number, EvidencePassage>(
      draft.passages.map((passage) => [
        passage.citationIndex,
        { citationIndex: passage.citationIndex, text: passage.candidate.chunk.text },
      ]),
    );
    const allEvidence = Array.from(evidenceByIndex.values());

    const assessments: ClaimAssessment[] = [];
    for (const claim of claims) {
      const cited = claim.citedIndices.flatMap((index) => {
        const passage = evidenceByIndex.get(index);
        return passage ? [passage] : [];
      });
      const evidence = claim.citedIndices.length > 0 ? cited : allEvidence;
      try {
        assessments.push(await this.checker.assess(claim, evidence, signal));
      } catch (error) {
        if (isCancellation(error)) throw error;
        throw new ValidationFailure(`${this.checker.name} checker: ${getErrorMessage(error)}`, toError(error));
      }
    }

    const citationFlags = draft.invalidCitations.map(
      (index) => `Citation [${index}] refers to a source that was not provided`,
    );
    const flaggedSpans = [
      ...assessments.filter((claim) => claim.support === 'none').map((claim) => claim.text),
      ...citationFlags,
    ];
    const confidence = assessments.length > 0
      ? assessments.reduce((sum, claim) => sum + claim.coverage, 0) / assessments.length
      : 0;

    return {
      classification: classifyClaims(assessments, citationFlags),
      claims: assessments,
      flaggedSpans,
      confidence,
    };
  }
}

/** Verdict used when the checker itself fails: never treated as supported. */
export function failedVerdict(): ValidationVerdict {
  return { classification: 'unsupported', claims: [], flaggedSpans: [], confidence: 0 };
}

// ============================================================================
// LOOP
// ============================================================================

export interface LoopTransition {
  attempt: number;
  from: ValidatorState;
  outcome: CorrectiveOutcome;
  reason: string;
}

export interface CorrectiveLoopHooks {
  generate(attempt: number, feedback: readonly string[]): Promise<DraftAnswer>;
  validate(draft: DraftAnswer): Promise<ValidationVerdict>;
  retryBudget: number;
}

export interface LoopFailure {
  stage: 'generation' | 'validation';
  attempt: number;
  message: string;
}

export interface CorrectiveLoopResult {
  outcome: 'accepted' | 'suppressed';
  draft?: DraftAnswer;
  verdict?: ValidationVerdict;
  generationCalls: number;
  transitions: LoopTransition[];
  /** Generation and validation errors, oldest first */
  failures: LoopFailure[];
}

export async function runCorrectiveLoop(hooks: CorrectiveLoopHooks): Promise<CorrectiveLoopResult> {
  const maxCalls = hooks.retryBudget + 1;
  const transitions: LoopTransition[] = [];
  const failures: LoopFailure[] = [];
  let feedback: readonly string[] = [];
  let previouslyUnsupported = false;
  let generationRetried = false;
  let lastDraft: DraftAnswer | undefined;
  let lastVerdict: ValidationVerdict | undefined;
  let calls = 0;

  for (let attempt = 1; attempt <= maxCalls; attempt++) {
    calls = attempt;
    let draft: DraftAnswer;
    try {
      draft = await hooks.generate(attempt, feedback);
    } catch (error) {
      if (isCancellation(error)) throw error;
      const failure = error instanceof GenerationFailure ? error : new GenerationFailure(attempt, getErrorMessage(error), toError(error));
      failures.push({ stage: 'generation', attempt, message: failure.message });
      if (!generationRetried && attempt < maxCalls) {
        generationRetried = true;
        logWarning('Generation failed; retrying with the same context', { attempt, error: failure.message });
        continue;
      }
      transitions.push({ attempt, from: 'drafted', outcome: 'suppressed', reason: 'generation failed' });
      return { outcome: 'suppressed', draft: lastDraft, verdict: lastVerdict, generationCalls: calls, transitions, failures };
    }
    lastDraft = draft;

    if (draft.declined) {
      transitions.push({ attempt, from: 'drafted', outcome: 'suppressed', reason: 'model declined to answer' });
      return { outcome: 'suppressed', draft, verdict: lastVerdict, generationCalls: calls, transitions, failures };
    }

    let verdict: ValidationVerdict;
    let validationFailed = false;
    try {
      verdict = await hooks.validate(draft);
    } catch (error) {
      if (isCancellation(error)) throw error;
      const message = getErrorMessage(error);
      failures.push({ stage: 'validation', attempt, message });
      logWarning('Validation failed; treating draft as unsupported', { attempt, error: message });
      verdict = failedVerdict();
      validationFailed = true;
    }
    lastVerdict = verdict;

    const outcome = nextTransition({
      classification: verdict.classification,
      attempt,
      retryBudget: hooks.retryBudget,
      previouslyUnsupported,
      declined: false,
    });
    transitions.push({
      attempt,
      from: verdict.classification,
      outcome,
      reason: validationFailed ? 'validation failed' : `${verdict.flaggedSpans.length} flagged span(s)`,
    });
    logDebug('Corrective transition', { attempt, classification: verdict.classification, outcome });

    if (outcome !== 'regenerated') {
      return { outcome, draft, verdict, generationCalls: calls, transitions, failures };
    }
    if (verdict.classification === 'unsupported') previouslyUnsupported = true;
    feedback = verdict.flaggedSpans;
  }

  return { outcome: 'suppressed', draft: lastDraft, verdict: lastVerdict, generationCalls: calls, transitions, failures };
}
