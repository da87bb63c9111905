/**
 * @fileoverview Cross-encoder reranking
 *
 * Rescores the top `rerankDepth` fused candidates with a cross-encoder and
 * reorders them by relevance. Candidates past the depth are dropped, not
 * appended unscored. Ties on relevance keep fused order, so the output is a
 * total order and identical input always yields identical output.
 */

import { RerankFailure, isCancellation } from '../core/errors.js';
import type { CrossEncoder, ScoreScale } from '../providers/types.js';
import type { RerankSource, RerankedCandidate, RetrievalCandidate } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { clamp01, sigmoid } from '../utils/math.js';

export interface RerankerOptions {
  rerankDepth: number;
}

export function toRelevance(score: number, scale: ScoreScale): number {
  return scale === 'logit' ? sigmoid(score) : clamp01(score);
}

function dedupeByChunk(candidates: readonly RetrievalCandidate[]): RetrievalCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.chunk.chunkId)) return false;
    seen.add(candidate.chunk.chunkId);
    return true;
  });
}

interface ScoredCandidate {
  candidate: RetrievalCandidate;
  /** Raw scorer output; orders candidates whose mapped relevance saturates */
  rawScore: number;
  relevanceScore: number;
}

function assignRanks(scored: ScoredCandidate[], scoredBy: RerankSource): RerankedCandidate[] {
  return scored
    .sort((a, b) => {
      if (a.rawScore !== b.rawScore) return b.rawScore - a.rawScore;
      return a.candidate.fusedRank - b.candidate.fusedRank;
    })
    .map(({ candidate, relevanceScore }, index) => ({
      ...candidate,
      relevanceScore,
      rank: index + 1,
      scoredBy,
    }));
}

/**
 * Fused order with the fused score standing in for relevance. Used when the
 * cross-encoder is unavailable.
 */
export function fusionFallback(candidates: readonly RetrievalCandidate[], rerankDepth: number): RerankedCandidate[] {
  const prefix = dedupeByChunk(candidates).slice(0, rerankDepth);
  return assignRanks(
    prefix.map((candidate) => ({
      candidate,
      rawScore: candidate.fusedScore,
      relevanceScore: clamp01(candidate.fusedScore),
    })),
    'fusion_fallback',
  );
}

export class Reranker {
  constructor(
    private readonly crossEncoder: CrossEncoder,
    private readonly options: RerankerOptions
  ) {}

  get modelId(): string {
    return this.crossEncoder.modelId;
  }

  /**
   * @throws RerankFailure on scorer error, wrong score count or a
   * non-finite score
   */
  async rerank(
    query: string,
    candidates: readonly RetrievalCandidate[],
    signal?: AbortSignal
  ): Promise<RerankedCandidate[]> {
    const prefix = dedupeByChunk(candidates).slice(0, this.options.rerankDepth);
    if (prefix.length === 0) return [];

    let scores: number[];
    try {
      scores = await this.crossEncoder.score(
        query,
        prefix.map((candidate) => candidate.chunk.text),
        signal,
      );
    } catch (error) {
      if (isCancellation(error)) throw error;
      throw new RerankFailure(this.crossEncoder.modelId, getErrorMessage(error), toError(error));
    }

    if (scores.length !== prefix.length) {
      throw new RerankFailure(
        this.crossEncoder.modelId,
        `expected ${prefix.length} scores, received ${scores.length}`,
      );
    }
    const badIndex = scores.findIndex((score) => !Number.isFinite(score));
    if (badIndex >= 0) {
      throw new RerankFailure(this.crossEncoder.modelId, `non-finite score for passage ${badIndex + 1}`);
    }

    return assignRanks(
      prefix.map((candidate, index) => ({
        candidate,
        rawScore: scores[index],
        relevanceScore: toRelevance(scores[index], this.crossEncoder.scoreScale),
      })),
      'cross_encoder',
    );
  }
}
