/**
 * @fileoverview Anthropic Messages API adapter for LanguageModel
 */

import Anthropic from '@anthropic-ai/sdk';
import { ProviderError } from '../core/errors.js';
import { toProviderError } from './provider_errors.js';
import type { CompletionRequest, CompletionResponse, LanguageModel, StopReason } from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

export interface AnthropicLanguageModelOptions {
  apiKey?: string;
  model?: string;
  /** SDK-level retries; the pipeline does its own retry accounting */
  maxRetries?: number;
  client?: Anthropic;
}

function toStopReason(value: string | null): StopReason {
  switch (value) {
    case 'end_turn':
    case 'max_tokens':
    case 'stop_sequence':
      return value;
    default:
      return 'other';
  }
}

export class AnthropicLanguageModel implements LanguageModel {
  readonly modelId: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicLanguageModelOptions = {}) {
    this.modelId = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.client = options.client ?? new Anthropic({
      apiKey: options.apiKey,
      maxRetries: options.maxRetries ?? 1,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.modelId,
          system: request.system,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw toProviderError('anthropic', error);
    }

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
    if (!text) {
      throw new ProviderError('anthropic', 'invalid_response', true, 'Response contained no text');
    }
    return { text, model: response.model, stopReason: toStopReason(response.stop_reason) };
  }
}
