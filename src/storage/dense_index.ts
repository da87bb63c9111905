import type { Chunk } from '../types.js';
import { cosineSimilarity } from '../utils/math.js';
import { compareScoredChunks, type ScoredChunk } from './sparse_index.js';

/**
 * Exhaustive cosine-similarity search over chunk embeddings. Corpora here
 * are a few thousand chunks, so a linear scan is exact and fast enough.
 */
export class DenseIndex {
  constructor(
    private readonly chunks: readonly Chunk[],
    readonly dimensions: number
  ) {}

  get size(): number {
    return this.chunks.length;
  }

  search(queryVector: Float32Array, limit: number): ScoredChunk[] {
    if (limit <= 0 || this.chunks.length === 0) return [];
    if (queryVector.length !== this.dimensions) {
      throw new Error(`Query embedding has ${queryVector.length} dimensions; index expects ${this.dimensions}`);
    }
    return this.chunks
      .map((chunk) => ({ chunk, score: cosineSimilarity(queryVector, chunk.embedding) }))
      .sort(compareScoredChunks)
      .slice(0, limit);
  }
}
