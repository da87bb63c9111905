/**
 * @fileoverview Cross-encoder scoring through a language model
 *
 * The model sees the query and every passage in one request and returns a
 * relevance probability per passage, so the adapter declares the
 * `probability` scale.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { OutputValidationError, validateLLMOutput } from '../utils/output_validator.js';
import type { CrossEncoder, LanguageModel, ScoreScale } from './types.js';

const ScoreReplySchema = z.object({
  scores: z.array(z.number()),
});

const MAX_PASSAGE_CHARS = 1500;

const SYSTEM_PROMPT = [
  'You judge how well each numbered passage answers a legal question.',
  'Score every passage from 0 (irrelevant) to 1 (directly answers the question).',
  'Reply with JSON only, in the form {"scores": [0.9, 0.1, ...]}, one score per passage in order.',
].join('\n');

export function formatScoringRequest(query: string, passages: string[]): string {
  const body = passages
    .map((passage, index) => {
      const clipped = passage.length > MAX_PASSAGE_CHARS ? `${passage.slice(0, MAX_PASSAGE_CHARS)}...` : passage;
      return `Passage ${index + 1}:\n${clipped}`;
    })
    .join('\n\n');
  return `Question: ${query}\n\n${body}`;
}

export class LlmCrossEncoder implements CrossEncoder {
  readonly modelId: string;
  readonly scoreScale: ScoreScale = 'probability';

  constructor(private readonly model: LanguageModel) {
    this.modelId = `llm:${model.modelId}`;
  }

  async score(query: string, passages: string[], signal?: AbortSignal): Promise<number[]> {
    if (passages.length === 0) return [];
    const response = await this.model.complete({
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: formatScoringRequest(query, passages) }],
      maxTokens: 20 + passages.length * 8,
      temperature: 0,
      signal,
    });

    try {
      return validateLLMOutput(response.text, ScoreReplySchema).scores;
    } catch (error) {
      if (error instanceof OutputValidationError) {
        throw new ProviderError(this.modelId, 'invalid_response', true, `${error.message}: ${error.details.join('; ')}`);
      }
      throw error;
    }
  }
}
