/**
 * @fileoverview Capability interfaces for the models the pipeline consumes
 *
 * Every model-driven step (entity extraction, embeddings, cross-encoder
 * scoring, generation) is reached through one of these interfaces, with one
 * adapter per concrete model. All calls take an AbortSignal that fires when
 * the stage times out or the caller cancels.
 *
 * @packageDocumentation
 */

import type { ExtractedEntity } from '../types.js';

// ============================================================================
// LANGUAGE MODEL
// ============================================================================

export type MessageRole = 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence' | 'other';

export interface CompletionResponse {
  text: string;
  model: string;
  stopReason: StopReason;
}

export interface LanguageModel {
  readonly modelId: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

// ============================================================================
// EMBEDDING MODEL
// ============================================================================

export interface EmbeddingModel {
  readonly modelId: string;
  readonly dimensions: number;
  /** One vector per input text, in input order */
  embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;
}

// ============================================================================
// CROSS-ENCODER
// ============================================================================

/**
 * `logit` scores are unbounded and mapped through the logistic sigmoid;
 * `probability` scores are already in 0..1.
 */
export type ScoreScale = 'logit' | 'probability';

export interface CrossEncoder {
  readonly modelId: string;
  readonly scoreScale: ScoreScale;
  /** One score per passage, in passage order */
  score(query: string, passages: string[], signal?: AbortSignal): Promise<number[]>;
}

// ============================================================================
// ENTITY EXTRACTOR
// ============================================================================

export interface EntityExtractor {
  readonly name: string;
  extract(text: string, signal?: AbortSignal): Promise<ExtractedEntity[]>;
}

// ============================================================================
// PROVIDER BUNDLE
// ============================================================================

export interface PipelineProviders {
  languageModel: LanguageModel;
  embeddingModel: EmbeddingModel;
  crossEncoder: CrossEncoder;
  entityExtractor: EntityExtractor;
  /** Model for follow-up rewriting; defaults to languageModel */
  rewriteModel?: LanguageModel;
}
