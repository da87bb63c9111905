import { describe, it, expect } from 'vitest';
import { HybridRetriever, buildQueryWeights, fuseResults, type HybridRetrieverOptions } from '../hybrid_retriever.js';
import { PipelineCancelledError, RetrievalFailure } from '../../core/errors.js';
import { IndexStore } from '../../storage/index_store.js';
import { SparseIndex, type ScoredChunk } from '../../storage/sparse_index.js';
import type { EmbeddingModel } from '../../providers/types.js';
import type { ExpandedQuery } from '../../types.js';
import { FailingEmbeddingModel, TableEmbeddingModel } from '../../__tests__/helpers/fakes.js';
import { makeChunk } from '../../__tests__/helpers/corpus.js';

const OPTIONS: HybridRetrieverOptions = {
  topK: 5,
  candidatePoolSize: 10,
  fusionAlpha: 0.4,
  expansionTermWeight: 0.5,
};

function plainQuery(originalQuery: string): ExpandedQuery {
  return { originalQuery, entities: [], expansionTerms: [], provenance: {} };
}

async function seededStore(): Promise<IndexStore> {
  const store = new IndexStore(new TableEmbeddingModel(2));
  await store.indexDocument({
    documentId: 'constitution',
    filename: 'constitution.pdf',
    chunks: [
      { pageNumber: 12, text: 'No person shall be deprived of his life or personal liberty.', embedding: [1, 0] },
      { pageNumber: 13, text: 'Arrested persons must be informed of the grounds.', embedding: [0, 1] },
    ],
  });
  return store;
}

class BrokenSparseIndex extends SparseIndex {
  search(): ScoredChunk[] {
    throw new Error('index corrupted');
  }
}

describe('buildQueryWeights', () => {
  it('weights original terms at 1 and expansion terms by graph weight', () => {
    const weights = buildQueryWeights(
      {
        ...plainQuery('What is due process?'),
        expansionTerms: [
          { term: 'fair hearing', weight: 0.8, distance: 1, relation: 'related-to', sourceEntity: 'due process' },
          { term: 'due process of law', weight: 0.5, distance: 1, relation: 'synonym-of', sourceEntity: 'due process' },
          { term: 'natural justice', weight: 0, distance: 2, relation: 'related-to', sourceEntity: 'due process' },
        ],
      },
      0.5
    );
    expect(weights).toEqual(
      new Map([
        ['due', 1],
        ['process', 1],
        ['fair', 0.4],
        ['hearing', 0.4],
        ['law', 0.25],
      ])
    );
  });
});

describe('fuseResults', () => {
  const a = makeChunk('a', 0, 'first');
  const b = makeChunk('b', 0, 'second');
  const c = makeChunk('c', 0, 'third');

  it('normalizes each side and fuses with alpha', () => {
    const fused = fuseResults(
      [
        { chunk: a, score: 4 },
        { chunk: b, score: 2 },
      ],
      [
        { chunk: b, score: 0.9 },
        { chunk: c, score: 0.5 },
      ],
      0.5,
      10
    );
    expect(fused.map((candidate) => [candidate.chunk.chunkId, candidate.fusedScore, candidate.source, candidate.fusedRank])).toEqual([
      ['a#0', 0.5, 'sparse', 1],
      ['b#0', 0.5, 'both', 2],
      ['c#0', 0, 'dense', 3],
    ]);
    expect(fused[1]).toMatchObject({ sparseScore: 2, denseScore: 0.9, normalizedSparse: 0, normalizedDense: 1 });
  });

  it('ignores the dense side when alpha is 1', () => {
    const fused = fuseResults([{ chunk: a, score: 4 }, { chunk: b, score: 2 }], [{ chunk: c, score: 0.5 }], 1, 10);
    expect(fused.map((candidate) => candidate.chunk.chunkId)).toEqual(['a#0', 'b#0', 'c#0']);
    expect(fused.map((candidate) => candidate.fusedScore)).toEqual([1, 0, 0]);
  });

  it('breaks full ties by document and chunk order', () => {
    const fused = fuseResults([{ chunk: b, score: 1 }, { chunk: a, score: 1 }], [], 0.4, 10);
    expect(fused.map((candidate) => [candidate.chunk.chunkId, candidate.normalizedSparse])).toEqual([
      ['a#0', 1],
      ['b#0', 1],
    ]);
  });

  it('never lowers a chunk when only its sparse score rises', () => {
    const dense = [{ chunk: c, score: 0.8 }, { chunk: b, score: 0.2 }];
    const before = fuseResults([{ chunk: a, score: 4 }, { chunk: b, score: 2 }, { chunk: c, score: 1 }], dense, 0.4, 10);
    const after = fuseResults([{ chunk: a, score: 4 }, { chunk: b, score: 3 }, { chunk: c, score: 1 }], dense, 0.4, 10);
    const fusedB = (candidates: typeof before) => candidates.find((candidate) => candidate.chunk === b);

    expect(fusedB(after)?.fusedScore).toBeGreaterThan(fusedB(before)?.fusedScore ?? Infinity);
    expect(fusedB(after)?.fusedRank).toBeLessThanOrEqual(fusedB(before)?.fusedRank ?? 0);
  });

  it('truncates to topK', () => {
    const fused = fuseResults([{ chunk: a, score: 3 }, { chunk: b, score: 2 }, { chunk: c, score: 1 }], [], 0.4, 2);
    expect(fused.map((candidate) => candidate.fusedRank)).toEqual([1, 2]);
  });
});

describe('HybridRetriever', () => {
  it('fuses sparse and dense results over a snapshot', async () => {
    const store = await seededStore();
    const embedder = new TableEmbeddingModel(2, new Map([['personal liberty', [1, 0]]]));
    const retriever = new HybridRetriever(embedder, OPTIONS);

    const result = await retriever.retrieve(plainQuery('personal liberty'), store.current());

    expect(embedder.calls).toEqual([['personal liberty']]);
    expect(result.sparseCount).toBe(1);
    expect(result.denseCount).toBe(2);
    expect(result.degraded).toEqual([]);
    expect(result.candidates.map((candidate) => [candidate.chunk.chunkId, candidate.source, candidate.fusedScore])).toEqual([
      ['constitution#0', 'both', 1],
      ['constitution#1', 'dense', 0],
    ]);
  });

  it('falls back to sparse results when the dense lookup fails', async () => {
    const store = await seededStore();
    const retriever = new HybridRetriever(new FailingEmbeddingModel(2), OPTIONS);

    const result = await retriever.retrieve(plainQuery('personal liberty'), store.current());

    expect(result.degraded).toEqual([{ method: 'dense', error: 'embedding service unavailable' }]);
    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0]?.source).toBe('sparse');
    expect(result.candidates[0]?.fusedScore).toBeCloseTo(0.4, 10);
  });

  it('falls back to dense results when the sparse lookup fails', async () => {
    const store = await seededStore();
    const snapshot = store.current();
    const retriever = new HybridRetriever(new TableEmbeddingModel(2), OPTIONS);

    const result = await retriever.retrieve(plainQuery('personal liberty'), {
      ...snapshot,
      sparse: new BrokenSparseIndex(snapshot.chunks),
    });

    expect(result.degraded).toEqual([{ method: 'sparse', error: 'index corrupted' }]);
    expect(result.candidates.map((candidate) => candidate.source)).toEqual(['dense', 'dense']);
  });

  it('raises RetrievalFailure when both lookups fail', async () => {
    const store = await seededStore();
    const snapshot = store.current();
    const retriever = new HybridRetriever(new FailingEmbeddingModel(2), OPTIONS);

    await expect(
      retriever.retrieve(plainQuery('personal liberty'), { ...snapshot, sparse: new BrokenSparseIndex(snapshot.chunks) })
    ).rejects.toBeInstanceOf(RetrievalFailure);
  });

  it('returns no candidates for an empty corpus without embedding', async () => {
    const embedder = new TableEmbeddingModel(2);
    const retriever = new HybridRetriever(embedder, OPTIONS);
    const result = await retriever.retrieve(plainQuery('personal liberty'), new IndexStore(embedder).current());
    expect(result).toEqual({ candidates: [], sparseCount: 0, denseCount: 0, degraded: [] });
    expect(embedder.calls).toEqual([]);
  });

  it('propagates cancellation from the embedding call', async () => {
    const store = await seededStore();
    const cancelled: EmbeddingModel = {
      modelId: 'cancelled',
      dimensions: 2,
      embed: async () => {
        throw new PipelineCancelledError('retrieval');
      },
    };
    await expect(
      new HybridRetriever(cancelled, OPTIONS).retrieve(plainQuery('personal liberty'), store.current())
    ).rejects.toBeInstanceOf(PipelineCancelledError);
  });
});
