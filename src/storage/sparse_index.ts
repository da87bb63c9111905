/**
 * @fileoverview BM25 lexical index
 *
 * Built once per corpus snapshot from each chunk's term frequencies. Query
 * terms carry their own weight so expansion terms can count for less than
 * the user's words.
 *
 *   idf(t)    = ln(1 + (N - n_t + 0.5) / (n_t + 0.5))
 *   score(c)  = Σ w_t · idf(t) · tf·(k1 + 1) / (tf + k1·(1 - b + b·|c| / avgdl))
 */

import { compareChunkIdentity, type Chunk } from '../types.js';

export interface Bm25Parameters {
  k1: number;
  b: number;
}

export const DEFAULT_BM25_PARAMETERS: Bm25Parameters = { k1: 1.5, b: 0.75 };

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

/** Higher score first, then identity order. */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareChunkIdentity(a.chunk, b.chunk);
}

export class SparseIndex {
  private readonly documentFrequency = new Map<string, number>();
  private readonly postings = new Map<string, Chunk[]>();
  private readonly averageLength: number;

  constructor(
    private readonly chunks: readonly Chunk[],
    private readonly parameters: Bm25Parameters = DEFAULT_BM25_PARAMETERS
  ) {
    let totalLength = 0;
    for (const chunk of chunks) {
      totalLength += chunk.tokenCount;
      for (const term of chunk.termFrequencies.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
        const list = this.postings.get(term) ?? [];
        list.push(chunk);
        this.postings.set(term, list);
      }
    }
    this.averageLength = chunks.length > 0 ? totalLength / chunks.length : 0;
  }

  get size(): number {
    return this.chunks.length;
  }

  idf(term: string): number {
    const n = this.documentFrequency.get(term) ?? 0;
    const total = this.chunks.length;
    return Math.log(1 + (total - n + 0.5) / (n + 0.5));
  }

  /**
   * Score every chunk that shares a term with the query and return the top
   * `limit` with a positive score.
   */
  search(queryWeights: ReadonlyMap<string, number>, limit: number): ScoredChunk[] {
    if (limit <= 0 || this.chunks.length === 0) return [];
    const { k1, b } = this.parameters;
    const avgdl = this.averageLength > 0 ? this.averageLength : 1;
    const scores = new Map<Chunk, number>();

    for (const [term, weight] of queryWeights) {
      if (weight <= 0) continue;
      const matching = this.postings.get(term);
      if (!matching) continue;
      const idf = this.idf(term);
      for (const chunk of matching) {
        const tf = chunk.termFrequencies.get(term) ?? 0;
        if (tf <= 0) continue;
        const norm = tf + k1 * (1 - b + (b * chunk.tokenCount) / avgdl);
        const contribution = weight * idf * ((tf * (k1 + 1)) / norm);
        scores.set(chunk, (scores.get(chunk) ?? 0) + contribution);
      }
    }

    const results: ScoredChunk[] = [];
    for (const [chunk, score] of scores) {
      if (score > 0) results.push({ chunk, score });
    }
    return results.sort(compareScoredChunks).slice(0, limit);
  }
}
