import { describe, it, expect } from 'vitest';
import { LexicalSupportChecker, type EvidencePassage } from '../support.js';

const LIFE: EvidencePassage = {
  citationIndex: 1,
  text: 'No person shall be deprived of his life or personal liberty except according to procedure established by law.',
};
const ARREST: EvidencePassage = {
  citationIndex: 2,
  text: 'Every person who is arrested shall be informed of the grounds for such arrest.',
};

const checker = new LexicalSupportChecker();

describe('LexicalSupportChecker', () => {
  it('treats a verbatim claim as exact support', async () => {
    const assessment = await checker.assess(
      { text: 'No person shall be deprived of his life or personal liberty.', citedIndices: [1] },
      [LIFE],
    );
    expect(assessment.support).toBe('exact');
    expect(assessment.coverage).toBe(1);
    expect(assessment.reason).toBe('claim appears verbatim in evidence');
  });

  it('grades partial coverage', async () => {
    const assessment = await checker.assess(
      { text: 'Personal liberty requires fair procedure.', citedIndices: [1] },
      [LIFE],
    );
    expect(assessment.support).toBe('partial');
    expect(assessment.coverage).toBeCloseTo(0.6, 10);
    expect(assessment.reason).toBe('60% of claim terms found in evidence');
  });

  it('measures a multi-citation claim against the combined passages', async () => {
    const claim = { text: 'An arrested person retains personal liberty.', citedIndices: [1, 2] };
    const cited = await checker.assess(claim, [LIFE, ARREST]);
    expect(cited.support).toBe('exact');
    expect(cited.coverage).toBeCloseTo(0.8, 10);

    const uncited = await checker.assess({ ...claim, citedIndices: [] }, [LIFE, ARREST]);
    expect(uncited.support).toBe('partial');
    expect(uncited.coverage).toBeCloseTo(0.6, 10);
  });

  it('flags an unsupported claim', async () => {
    const assessment = await checker.assess(
      { text: 'Bail is automatic for every offence.', citedIndices: [] },
      [LIFE, ARREST],
    );
    expect(assessment.support).toBe('none');
    expect(assessment.reason).toBe('25% of claim terms found in evidence');
  });

  it('requires numbers to appear in the evidence', async () => {
    const assessment = await checker.assess(
      { text: 'Detention beyond 24 hours requires procedure established by law.', citedIndices: [1] },
      [LIFE],
    );
    expect(assessment.support).toBe('none');
    expect(assessment.reason).toBe('number 24 not found in evidence');
  });

  it('rejects hedged generalizations', async () => {
    const assessment = await checker.assess(
      { text: 'Generally speaking, personal liberty is protected.', citedIndices: [1] },
      [LIFE],
    );
    expect(assessment).toMatchObject({ support: 'none', coverage: 0, reason: 'hedged with "generally speaking"' });
  });

  it('finds no support without evidence', async () => {
    const assessment = await checker.assess({ text: 'Life is protected by law.', citedIndices: [] }, []);
    expect(assessment).toMatchObject({ support: 'none', reason: 'no evidence passages' });
  });

  it('checks claims written in other scripts', async () => {
    const assessment = await checker.assess(
      { text: 'Срок исковой давности составляет три года.', citedIndices: [1] },
      [{ citationIndex: 1, text: 'Общий срок исковой давности составляет три года.' }],
    );
    expect(assessment.support).toBe('exact');
    expect(assessment.coverage).toBe(1);
    expect(assessment.reason).toBe('claim appears verbatim in evidence');
  });

  it('keeps accented words whole when measuring coverage', async () => {
    const assessment = await checker.assess(
      { text: 'El Código Civil regula los contratos.', citedIndices: [1] },
      [{ citationIndex: 1, text: 'El Código Civil regula las obligaciones.' }],
    );
    expect(assessment.support).toBe('partial');
    expect(assessment.reason).toBe('67% of claim terms found in evidence');
  });

  it('honours custom thresholds', async () => {
    const strict = new LexicalSupportChecker({ exactThreshold: 0.9, partialThreshold: 0.7 });
    const assessment = await strict.assess(
      { text: 'Personal liberty requires fair procedure.', citedIndices: [1] },
      [LIFE],
    );
    expect(assessment.support).toBe('none');
  });
});
