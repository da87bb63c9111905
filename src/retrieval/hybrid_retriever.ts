/**
 * @fileoverview Hybrid Retrieval
 *
 * ARCHITECTURE:
 * ┌────────────────────────────────────────────────────────────────┐
 * │                       HYBRID RETRIEVAL                         │
 * ├────────────────────────────────────────────────────────────────┤
 * │  1. SPARSE (BM25)                                              │
 * │     • Original query terms at weight 1                         │
 * │     • Expansion terms at expansionTermWeight × graph weight    │
 * │                                                                │
 * │  2. DENSE (cosine)                                             │
 * │     • One embedding of the query text against every chunk      │
 * │                                                                │
 * │  3. FUSION                                                     │
 * │     • Min-max normalize each method over its own result set    │
 * │     • fused = α·sparse + (1 − α)·dense, absent side counts 0   │
 * │     • Order: fused ↓, raw sparse ↓, documentId ↑, chunkIndex ↑ │
 * └────────────────────────────────────────────────────────────────┘
 *
 * Both lookups run concurrently against the same snapshot. A failed dense
 * lookup degrades to sparse-only; a failed sparse lookup degrades to
 * dense-only; both failing raises RetrievalFailure.
 */

import { RetrievalFailure, isCancellation } from '../core/errors.js';
import type { EmbeddingModel } from '../providers/types.js';
import type { CorpusSnapshot } from '../storage/index_store.js';
import type { ScoredChunk } from '../storage/sparse_index.js';
import { logWarning } from '../telemetry/logger.js';
import {
  compareChunkIdentity,
  type CandidateSource,
  type Chunk,
  type ExpandedQuery,
  type RetrievalCandidate,
} from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { minMaxNormalize } from '../utils/math.js';
import { contentTokens } from '../utils/text.js';

// ============================================================================
// TYPES
// ============================================================================

export interface HybridRetrieverOptions {
  topK: number;
  /** Per-method result count before fusion; must exceed topK */
  candidatePoolSize: number;
  /** Weight of the sparse side in fusion */
  fusionAlpha: number;
  expansionTermWeight: number;
}

export interface HybridRetrievalResult {
  candidates: RetrievalCandidate[];
  sparseCount: number;
  denseCount: number;
  /** Lookups that failed and were left out of fusion */
  degraded: Array<{ method: 'sparse' | 'dense'; error: string }>;
}

// ============================================================================
// QUERY WEIGHTS
// ============================================================================

/**
 * Term weights for the BM25 query. A token that is both an original term and
 * part of an expansion term keeps the higher weight.
 */
export function buildQueryWeights(expanded: ExpandedQuery, expansionTermWeight: number): Map<string, number> {
  const weights = new Map<string, number>();
  const raise = (token: string, weight: number): void => {
    if ((weights.get(token) ?? 0) < weight) weights.set(token, weight);
  };
  for (const token of contentTokens(expanded.originalQuery)) {
    raise(token, 1);
  }
  for (const term of expanded.expansionTerms) {
    const weight = expansionTermWeight * term.weight;
    if (weight <= 0) continue;
    for (const token of contentTokens(term.term)) {
      raise(token, weight);
    }
  }
  return weights;
}

// ============================================================================
// FUSION
// ============================================================================

export function fuseResults(
  sparse: readonly ScoredChunk[],
  dense: readonly ScoredChunk[],
  fusionAlpha: number,
  topK: number
): RetrievalCandidate[] {
  const chunks = new Map<string, Chunk>();
  const sparseRaw = new Map<string, number>();
  const denseRaw = new Map<string, number>();
  for (const { chunk, score } of sparse) {
    chunks.set(chunk.chunkId, chunk);
    sparseRaw.set(chunk.chunkId, score);
  }
  for (const { chunk, score } of dense) {
    chunks.set(chunk.chunkId, chunk);
    denseRaw.set(chunk.chunkId, score);
  }

  const sparseNorm = minMaxNormalize(sparseRaw);
  const denseNorm = minMaxNormalize(denseRaw);

  const fused = Array.from(chunks.values()).map((chunk) => {
    const inSparse = sparseRaw.has(chunk.chunkId);
    const inDense = denseRaw.has(chunk.chunkId);
    const normalizedSparse = sparseNorm.get(chunk.chunkId) ?? 0;
    const normalizedDense = denseNorm.get(chunk.chunkId) ?? 0;
    const source: CandidateSource = inSparse && inDense ? 'both' : inSparse ? 'sparse' : 'dense';
    return {
      chunk,
      sparseScore: sparseRaw.get(chunk.chunkId) ?? 0,
      denseScore: denseRaw.get(chunk.chunkId) ?? 0,
      normalizedSparse,
      normalizedDense,
      fusedScore: fusionAlpha * normalizedSparse + (1 - fusionAlpha) * normalizedDense,
      source,
      fusedRank: 0,
    };
  });

  fused.sort((a, b) => {
    if (a.fusedScore !== b.fusedScore) return b.fusedScore - a.fusedScore;
    if (a.sparseScore !== b.sparseScore) return b.sparseScore - a.sparseScore;
    return compareChunkIdentity(a.chunk, b.chunk);
  });

  return fused.slice(0, Math.max(0, topK)).map((candidate, index) => ({ ...candidate, fusedRank: index + 1 }));
}

// ============================================================================
// RETRIEVER
// ============================================================================

export class HybridRetriever {
  constructor(
    private readonly embeddingModel: EmbeddingModel,
    private readonly options: HybridRetrieverOptions
  ) {}

  async retrieve(
    expanded: ExpandedQuery,
    snapshot: CorpusSnapshot,
    signal?: AbortSignal
  ): Promise<HybridRetrievalResult> {
    if (snapshot.chunks.length === 0) {
      return { candidates: [], sparseCount: 0, denseCount: 0, degraded: [] };
    }
    const { candidatePoolSize, fusionAlpha, expansionTermWeight, topK } = this.options;

    const [sparseOutcome, denseOutcome] = await Promise.allSettled([
      this.sparseLookup(expanded, snapshot, expansionTermWeight, candidatePoolSize),
      this.denseLookup(expanded.originalQuery, snapshot, candidatePoolSize, signal),
    ]);

    if (denseOutcome.status === 'rejected' && isCancellation(denseOutcome.reason)) {
      throw denseOutcome.reason;
    }
    if (sparseOutcome.status === 'rejected' && denseOutcome.status === 'rejected') {
      throw new RetrievalFailure(
        `sparse: ${getErrorMessage(sparseOutcome.reason)}; dense: ${getErrorMessage(denseOutcome.reason)}`,
        toError(denseOutcome.reason),
      );
    }

    const degraded: HybridRetrievalResult['degraded'] = [];
    let sparse: ScoredChunk[] = [];
    let dense: ScoredChunk[] = [];
    if (sparseOutcome.status === 'fulfilled') {
      sparse = sparseOutcome.value;
    } else {
      const error = getErrorMessage(sparseOutcome.reason);
      degraded.push({ method: 'sparse', error });
      logWarning('Sparse lookup failed; using dense results only', { error });
    }
    if (denseOutcome.status === 'fulfilled') {
      dense = denseOutcome.value;
    } else {
      const error = getErrorMessage(denseOutcome.reason);
      degraded.push({ method: 'dense', error });
      logWarning('Dense lookup failed; using sparse results only', { error });
    }

    return {
      candidates: fuseResults(sparse, dense, fusionAlpha, topK),
      sparseCount: sparse.length,
      denseCount: dense.length,
      degraded,
    };
  }

  private async sparseLookup(
    expanded: ExpandedQuery,
    snapshot: CorpusSnapshot,
    expansionTermWeight: number,
    limit: number
  ): Promise<ScoredChunk[]> {
    const weights = buildQueryWeights(expanded, expansionTermWeight);
    return snapshot.sparse.search(weights, limit);
  }

  private async denseLookup(
    queryText: string,
    snapshot: CorpusSnapshot,
    limit: number,
    signal?: AbortSignal
  ): Promise<ScoredChunk[]> {
    const [vector] = await this.embeddingModel.embed([queryText], signal);
    if (!vector) {
      throw new Error('Embedding model returned no vector for the query');
    }
    return snapshot.dense.search(vector, limit);
  }
}
