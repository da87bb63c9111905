/**
 * @fileoverview Entity extraction through a language model
 *
 * The model is asked for a JSON list of legal entities; the reply is
 * validated with zod and unknown entity types collapse to `other`.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { ENTITY_TYPES, type ExtractedEntity } from '../types.js';
import { OutputValidationError, validateLLMOutput } from '../utils/output_validator.js';
import type { EntityExtractor, LanguageModel } from './types.js';

const EntityReplySchema = z.object({
  entities: z.array(
    z.object({
      text: z.string().trim().min(1),
      type: z.enum(ENTITY_TYPES).catch('other'),
    }),
  ),
});

const SYSTEM_PROMPT = [
  'You extract legal entities from questions about law.',
  `Entity types: ${ENTITY_TYPES.join(', ')}.`,
  'Reply with JSON only, in the form {"entities": [{"text": "...", "type": "..."}]}.',
  'Use the exact wording from the question. Reply {"entities": []} when there are none.',
].join('\n');

export class LlmEntityExtractor implements EntityExtractor {
  readonly name: string;

  constructor(
    private readonly model: LanguageModel,
    private readonly maxEntities = 8
  ) {
    this.name = `llm:${model.modelId}`;
  }

  async extract(text: string, signal?: AbortSignal): Promise<ExtractedEntity[]> {
    const response = await this.model.complete({
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: text }],
      maxTokens: 300,
      temperature: 0,
      signal,
    });

    let reply: z.infer<typeof EntityReplySchema>;
    try {
      reply = validateLLMOutput(response.text, EntityReplySchema);
    } catch (error) {
      if (error instanceof OutputValidationError) {
        throw new ProviderError(this.name, 'invalid_response', true, `${error.message}: ${error.details.join('; ')}`);
      }
      throw error;
    }

    const seen = new Set<string>();
    const entities: ExtractedEntity[] = [];
    for (const entity of reply.entities) {
      const key = entity.text.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      entities.push({ text: entity.text, type: entity.type });
      if (entities.length >= this.maxEntities) break;
    }
    return entities;
  }
}
