/**
 * @fileoverview OpenAI embeddings adapter for EmbeddingModel
 */

import OpenAI from 'openai';
import { ProviderError } from '../core/errors.js';
import { toProviderError } from './provider_errors.js';
import type { EmbeddingModel } from './types.js';

export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_OPENAI_EMBEDDING_DIMENSIONS = 1536;

export interface OpenAIEmbeddingModelOptions {
  apiKey?: string;
  model?: string;
  dimensions?: number;
  maxRetries?: number;
  client?: OpenAI;
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  readonly modelId: string;
  readonly dimensions: number;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingModelOptions = {}) {
    this.modelId = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_OPENAI_EMBEDDING_DIMENSIONS;
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      maxRetries: options.maxRetries ?? 1,
    });
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create(
        { model: this.modelId, input: texts, dimensions: this.dimensions },
        { signal },
      );
    } catch (error) {
      throw toProviderError('openai', error);
    }

    if (response.data.length !== texts.length) {
      throw new ProviderError(
        'openai',
        'invalid_response',
        true,
        `Expected ${texts.length} embeddings, received ${response.data.length}`,
      );
    }
    // The API does not promise response order; place vectors by index.
    const byIndex = new Map<number, Float32Array>();
    for (const item of response.data) {
      if (item.embedding.length !== this.dimensions) {
        throw new ProviderError(
          'openai',
          'invalid_response',
          false,
          `Embedding dimension ${item.embedding.length} does not match ${this.dimensions}`,
        );
      }
      byIndex.set(item.index, Float32Array.from(item.embedding));
    }
    return texts.map((_, index) => {
      const vector = byIndex.get(index);
      if (!vector) {
        throw new ProviderError('openai', 'invalid_response', true, `Missing embedding for input ${index}`);
      }
      return vector;
    });
  }
}
