import { describe, it, expect } from 'vitest';
import {
  CorrectiveValidator,
  classifyClaims,
  failedVerdict,
  nextTransition,
  runCorrectiveLoop,
  type CorrectiveLoopHooks,
} from '../corrective_validator.js';
import { LexicalSupportChecker, type SupportChecker } from '../support.js';
import { PipelineCancelledError, ValidationFailure } from '../../core/errors.js';
import type {
  ClaimAssessment,
  ContextPassage,
  DraftAnswer,
  ValidationVerdict,
  VerdictClassification,
} from '../../types.js';
import { makeChunk, makeReranked } from '../../__tests__/helpers/corpus.js';

const LIFE_TEXT =
  'No person shall be deprived of his life or personal liberty except according to procedure established by law.';
const ARREST_TEXT = 'Every person who is arrested shall be informed of the grounds for such arrest.';

const PASSAGES: ContextPassage[] = [
  { citationIndex: 1, candidate: makeReranked(makeChunk('constitution', 0, LIFE_TEXT), 1, 0.9) },
  { citationIndex: 2, candidate: makeReranked(makeChunk('crpc', 0, ARREST_TEXT), 2, 0.7) },
];

function draft(text: string, overrides: Partial<DraftAnswer> = {}): DraftAnswer {
  return {
    text,
    passages: PASSAGES,
    citations: [],
    invalidCitations: [],
    attempt: 1,
    declined: false,
    ...overrides,
  };
}

function verdict(classification: VerdictClassification, flaggedSpans: string[] = []): ValidationVerdict {
  return { classification, claims: [], flaggedSpans, confidence: classification === 'supported' ? 1 : 0.3 };
}

function assessment(support: ClaimAssessment['support']): ClaimAssessment {
  return { text: 'claim', citedIndices: [], support, coverage: 0, reason: '' };
}

describe('nextTransition', () => {
  const base = { attempt: 1, retryBudget: 2, previouslyUnsupported: false, declined: false };

  it('accepts supported drafts', () => {
    expect(nextTransition({ ...base, classification: 'supported' })).toBe('accepted');
  });

  it('regenerates partially unsupported drafts while budget remains', () => {
    expect(nextTransition({ ...base, classification: 'partially_unsupported', attempt: 2 })).toBe('regenerated');
    expect(nextTransition({ ...base, classification: 'partially_unsupported', attempt: 3 })).toBe('suppressed');
  });

  it('allows one regeneration after an unsupported draft', () => {
    expect(nextTransition({ ...base, classification: 'unsupported' })).toBe('regenerated');
    expect(nextTransition({ ...base, classification: 'unsupported', attempt: 2, previouslyUnsupported: true })).toBe(
      'suppressed'
    );
  });

  it('suppresses immediately with a zero budget', () => {
    expect(nextTransition({ ...base, classification: 'unsupported', retryBudget: 0 })).toBe('suppressed');
    expect(nextTransition({ ...base, classification: 'partially_unsupported', retryBudget: 0 })).toBe('suppressed');
  });

  it('suppresses declined drafts', () => {
    expect(nextTransition({ ...base, classification: 'supported', declined: true })).toBe('suppressed');
  });
});

describe('classifyClaims', () => {
  it('classifies by claim support', () => {
    expect(classifyClaims([], [])).toBe('unsupported');
    expect(classifyClaims([assessment('none'), assessment('none')], [])).toBe('unsupported');
    expect(classifyClaims([assessment('exact'), assessment('none')], [])).toBe('partially_unsupported');
    expect(classifyClaims([assessment('exact'), assessment('partial')], [])).toBe('supported');
  });

  it('treats extra flags as partial support', () => {
    expect(classifyClaims([assessment('exact')], ['Citation [4] refers to a source that was not provided'])).toBe(
      'partially_unsupported'
    );
  });
});

describe('CorrectiveValidator', () => {
  const validator = new CorrectiveValidator(new LexicalSupportChecker(), { minClaimTokens: 3 });

  it('flags the unsupported claim of a mixed answer', async () => {
    const result = await validator.validate(
      draft('No person shall be deprived of his life or personal liberty [1]. Bail is automatic for every offence [2].')
    );
    expect(result.classification).toBe('partially_unsupported');
    expect(result.flaggedSpans).toEqual(['Bail is automatic for every offence.']);
    expect(result.claims.map((claim) => claim.support)).toEqual(['exact', 'none']);
    expect(result.confidence).toBeCloseTo(0.625, 10);
  });

  it('checks a cited claim only against the passages it cites', async () => {
    const result = await validator.validate(
      draft('Every person who is arrested shall be informed of the grounds [1].')
    );
    expect(result.classification).toBe('unsupported');
    expect(result.claims[0]?.support).toBe('none');
  });

  it('accepts a fully supported answer', async () => {
    const result = await validator.validate(
      draft('Every person who is arrested shall be informed of the grounds [2].')
    );
    expect(result.classification).toBe('supported');
    expect(result.flaggedSpans).toEqual([]);
  });

  it('flags citations to sources that were not provided', async () => {
    const result = await validator.validate(
      draft('Every person who is arrested shall be informed of the grounds [2].', { invalidCitations: [5] })
    );
    expect(result.classification).toBe('partially_unsupported');
    expect(result.flaggedSpans).toEqual(['Citation [5] refers to a source that was not provided']);
  });

  it('wraps checker errors in ValidationFailure', async () => {
    const broken: SupportChecker = {
      name: 'broken',
      assess: async () => {
        throw new Error('checker down');
      },
    };
    const failing = new CorrectiveValidator(broken, { minClaimTokens: 3 });
    const error = await failing.validate(draft('Personal liberty requires fair procedure [1].')).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationFailure);
    expect(error instanceof Error ? error.message : '').toBe('Answer validation failed: broken checker: checker down');
  });
});

describe('runCorrectiveLoop', () => {
  function hooks(
    drafts: Array<DraftAnswer | Error>,
    verdicts: Array<ValidationVerdict | Error>,
    retryBudget = 2
  ): CorrectiveLoopHooks & { feedback: Array<readonly string[]>; validated: number } {
    const feedback: Array<readonly string[]> = [];
    let validated = 0;
    return {
      feedback,
      get validated() {
        return validated;
      },
      retryBudget,
      async generate(attempt, nextFeedback) {
        feedback.push(nextFeedback);
        const next = drafts[Math.min(attempt - 1, drafts.length - 1)];
        if (next === undefined) throw new Error('no draft scripted');
        if (next instanceof Error) throw next;
        return { ...next, attempt };
      },
      async validate() {
        const next = verdicts[Math.min(validated, verdicts.length - 1)];
        validated += 1;
        if (next === undefined) throw new Error('no verdict scripted');
        if (next instanceof Error) throw next;
        return next;
      },
    };
  }

  it('accepts a supported first draft', async () => {
    const result = await runCorrectiveLoop(hooks([draft('ok')], [verdict('supported')]));
    expect(result.outcome).toBe('accepted');
    expect(result.generationCalls).toBe(1);
    expect(result.transitions).toEqual([
      { attempt: 1, from: 'supported', outcome: 'accepted', reason: '0 flagged span(s)' },
    ]);
  });

  it('regenerates with feedback and accepts the corrected draft', async () => {
    const loop = hooks([draft('first'), draft('second')], [
      verdict('partially_unsupported', ['Bail is automatic.']),
      verdict('supported'),
    ]);
    const result = await runCorrectiveLoop(loop);
    expect(result.outcome).toBe('accepted');
    expect(result.generationCalls).toBe(2);
    expect(result.draft?.text).toBe('second');
    expect(loop.feedback).toEqual([[], ['Bail is automatic.']]);
  });

  it('never calls the generator more than retryBudget + 1 times', async () => {
    const result = await runCorrectiveLoop(hooks([draft('again')], [verdict('partially_unsupported', ['x'])], 2));
    expect(result.outcome).toBe('suppressed');
    expect(result.generationCalls).toBe(3);
    expect(result.transitions.map((t) => t.outcome)).toEqual(['regenerated', 'regenerated', 'suppressed']);
  });

  it('suppresses after a second unsupported draft', async () => {
    const result = await runCorrectiveLoop(hooks([draft('made up')], [verdict('unsupported', ['made up'])], 5));
    expect(result.outcome).toBe('suppressed');
    expect(result.generationCalls).toBe(2);
  });

  it('suppresses a declined draft without validating it', async () => {
    const loop = hooks([draft('cannot answer', { declined: true })], [verdict('supported')]);
    const result = await runCorrectiveLoop(loop);
    expect(result.outcome).toBe('suppressed');
    expect(result.generationCalls).toBe(1);
    expect(loop.validated).toBe(0);
    expect(result.transitions[0]?.reason).toBe('model declined to answer');
  });

  it('retries a failed generation once', async () => {
    const result = await runCorrectiveLoop(hooks([new Error('overloaded'), draft('ok')], [verdict('supported')]));
    expect(result.outcome).toBe('accepted');
    expect(result.generationCalls).toBe(2);
    expect(result.failures).toEqual([
      { stage: 'generation', attempt: 1, message: 'Generation attempt 1 failed: overloaded' },
    ]);
  });

  it('suppresses after a second generation failure', async () => {
    const result = await runCorrectiveLoop(hooks([new Error('overloaded')], [verdict('supported')]));
    expect(result.outcome).toBe('suppressed');
    expect(result.generationCalls).toBe(2);
    expect(result.draft).toBeUndefined();
    expect(result.transitions).toEqual([
      { attempt: 2, from: 'drafted', outcome: 'suppressed', reason: 'generation failed' },
    ]);
  });

  it('does not retry generation with a zero budget', async () => {
    const result = await runCorrectiveLoop(hooks([new Error('overloaded'), draft('ok')], [verdict('supported')], 0));
    expect(result.outcome).toBe('suppressed');
    expect(result.generationCalls).toBe(1);
  });

  it('treats a validation error as an unsupported verdict', async () => {
    const result = await runCorrectiveLoop(hooks([draft('first'), draft('second')], [new Error('checker down'), verdict('supported')]));
    expect(result.outcome).toBe('accepted');
    expect(result.generationCalls).toBe(2);
    expect(result.transitions[0]).toEqual({
      attempt: 1,
      from: 'unsupported',
      outcome: 'regenerated',
      reason: 'validation failed',
    });
    expect(result.failures).toEqual([{ stage: 'validation', attempt: 1, message: 'checker down' }]);
  });

  it('propagates cancellation', async () => {
    await expect(
      runCorrectiveLoop(hooks([new PipelineCancelledError('generation')], [verdict('supported')]))
    ).rejects.toBeInstanceOf(PipelineCancelledError);
  });

  it('failedVerdict is never supported', () => {
    expect(failedVerdict()).toEqual({ classification: 'unsupported', claims: [], flaggedSpans: [], confidence: 0 });
  });
});
