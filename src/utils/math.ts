/**
 * @fileoverview Math utilities shared by the scoring stages.
 */

/**
 * Clamp a value to [0, 1].
 * @param value - The value to clamp
 * @returns The value clamped to [0, 1]
 */
export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/**
 * Logistic sigmoid; maps cross-encoder logits to (0, 1).
 */
export function sigmoid(value: number): number {
  return 1 / (1 + Math.exp(-value));
}

/**
 * Min-max normalize scores over their own set.
 *
 * When every score is equal the range is degenerate: positive scores map to 1
 * and the rest to 0, so a lone match still contributes.
 */
export function minMaxNormalize(scores: ReadonlyMap<string, number>): Map<string, number> {
  const normalized = new Map<string, number>();
  if (scores.size === 0) return normalized;

  let min = Infinity;
  let max = -Infinity;
  for (const score of scores.values()) {
    if (score < min) min = score;
    if (score > max) max = score;
  }

  const range = max - min;
  for (const [key, score] of scores) {
    if (range === 0) {
      normalized.set(key, score > 0 ? 1 : 0);
    } else {
      normalized.set(key, (score - min) / range);
    }
  }
  return normalized;
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dot / denominator;
}
