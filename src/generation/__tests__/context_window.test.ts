import { describe, it, expect } from 'vitest';
import { makeChunk, makeReranked } from '../../__tests__/helpers/corpus.js';
import { buildContextWindow, formatPassage } from '../context_window.js';

// Each formatted passage is 23 header characters plus 80 of text: 26 tokens.
const TEXT = 'x'.repeat(80);
const FIRST = makeReranked(makeChunk('doc-a', 0, TEXT), 1, 0.9);
const SECOND = makeReranked(makeChunk('doc-b', 0, TEXT), 2, 0.4);
const THIRD = makeReranked(makeChunk('doc-c', 0, TEXT), 3, 0.7);

const OPTIONS = { generatorPassages: 5, minRelevanceScore: 0, maxContextTokens: 3000 };

describe('formatPassage', () => {
  it('labels the passage with its citation number, file and page', () => {
    const chunk = makeChunk('constitution', 4, 'Article 21 text.', [1, 0], 12);
    expect(formatPassage({ citationIndex: 3, candidate: makeReranked(chunk, 3, 0.5) })).toBe(
      '[3] constitution.pdf (page 12)\nArticle 21 text.',
    );
  });
});

describe('buildContextWindow', () => {
  it('numbers passages 1..n in rank order', () => {
    const window = buildContextWindow([THIRD, FIRST, SECOND], OPTIONS);
    expect(window.passages.map((passage) => [passage.citationIndex, passage.candidate.chunk.documentId])).toEqual([
      [1, 'doc-a'],
      [2, 'doc-b'],
      [3, 'doc-c'],
    ]);
    expect(window.estimatedTokens).toBe(78);
  });

  it('drops low-relevance candidates before numbering', () => {
    const window = buildContextWindow([FIRST, SECOND, THIRD], { ...OPTIONS, minRelevanceScore: 0.5 });
    expect(window.passages.map((passage) => [passage.citationIndex, passage.candidate.chunk.documentId])).toEqual([
      [1, 'doc-a'],
      [2, 'doc-c'],
    ]);
    expect(window.belowThreshold).toBe(1);
  });

  it('caps the number of passages', () => {
    expect(buildContextWindow([FIRST, SECOND, THIRD], { ...OPTIONS, generatorPassages: 1 }).passages).toHaveLength(1);
  });

  it('drops whole passages from the bottom to fit the budget', () => {
    const window = buildContextWindow([FIRST, SECOND, THIRD], { ...OPTIONS, maxContextTokens: 60 });
    expect(window.passages).toHaveLength(2);
    expect(window.estimatedTokens).toBe(52);
    expect(window.droppedForBudget).toBe(1);
  });

  it('always keeps the top passage', () => {
    const window = buildContextWindow([FIRST, SECOND], { ...OPTIONS, maxContextTokens: 10 });
    expect(window.passages.map((passage) => passage.candidate.chunk.documentId)).toEqual(['doc-a']);
    expect(window.droppedForBudget).toBe(1);
  });

  it('is empty when nothing passes the threshold', () => {
    const window = buildContextWindow([SECOND], { ...OPTIONS, minRelevanceScore: 0.5 });
    expect(window.passages).toEqual([]);
    expect(window.estimatedTokens).toBe(0);
  });
});
