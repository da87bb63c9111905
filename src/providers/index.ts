/**
 * @fileoverview Provider Module Exports
 *
 * Language model, embedding, cross-encoder and entity extraction adapters,
 * plus `createDefaultProviders` for wiring them from environment variables.
 *
 * @packageDocumentation
 */

import { ConfigurationError } from '../core/errors.js';
import type { LegalKnowledgeGraph } from '../knowledge/knowledge_graph.js';
import { AnthropicLanguageModel } from './anthropic_language_model.js';
import { LexiconEntityExtractor } from './lexicon_entity_extractor.js';
import { LlmCrossEncoder } from './llm_cross_encoder.js';
import { LlmEntityExtractor } from './llm_entity_extractor.js';
import { OpenAIEmbeddingModel } from './openai_embedding_model.js';
import type { EntityExtractor, PipelineProviders } from './types.js';

export type {
  MessageRole,
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  StopReason,
  LanguageModel,
  EmbeddingModel,
  ScoreScale,
  CrossEncoder,
  EntityExtractor,
  PipelineProviders,
} from './types.js';

export { AnthropicLanguageModel, DEFAULT_ANTHROPIC_MODEL } from './anthropic_language_model.js';
export type { AnthropicLanguageModelOptions } from './anthropic_language_model.js';
export {
  OpenAIEmbeddingModel,
  DEFAULT_OPENAI_EMBEDDING_MODEL,
  DEFAULT_OPENAI_EMBEDDING_DIMENSIONS,
} from './openai_embedding_model.js';
export type { OpenAIEmbeddingModelOptions } from './openai_embedding_model.js';
export { LlmCrossEncoder, formatScoringRequest } from './llm_cross_encoder.js';
export { LlmEntityExtractor } from './llm_entity_extractor.js';
export { LexiconEntityExtractor } from './lexicon_entity_extractor.js';
export { toProviderError } from './provider_errors.js';

/** Smaller model for rewriting, extraction and scoring calls. */
export const DEFAULT_UTILITY_MODEL = 'claude-3-5-haiku-20241022';

function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(key, 'environment variable is not set');
  }
  return value;
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the production providers.
 *
 * Reads ANTHROPIC_API_KEY and OPENAI_API_KEY (both required), and optionally
 * LEGAL_RAG_GENERATION_MODEL, LEGAL_RAG_UTILITY_MODEL,
 * LEGAL_RAG_EMBEDDING_MODEL, LEGAL_RAG_EMBEDDING_DIMENSIONS and
 * LEGAL_RAG_ENTITY_EXTRACTOR (`lexicon` or `llm`).
 *
 * @throws ConfigurationError when a key is missing or a value is invalid
 */
export function createDefaultProviders(
  graph: LegalKnowledgeGraph,
  env: NodeJS.ProcessEnv = process.env
): PipelineProviders {
  const anthropicKey = requireEnv(env, 'ANTHROPIC_API_KEY');
  const openaiKey = requireEnv(env, 'OPENAI_API_KEY');

  const languageModel = new AnthropicLanguageModel({
    apiKey: anthropicKey,
    model: optionalEnv(env, 'LEGAL_RAG_GENERATION_MODEL'),
  });
  const utilityModel = new AnthropicLanguageModel({
    apiKey: anthropicKey,
    model: optionalEnv(env, 'LEGAL_RAG_UTILITY_MODEL') ?? DEFAULT_UTILITY_MODEL,
  });

  let dimensions: number | undefined;
  const rawDimensions = optionalEnv(env, 'LEGAL_RAG_EMBEDDING_DIMENSIONS');
  if (rawDimensions !== undefined) {
    dimensions = Number(rawDimensions);
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError('LEGAL_RAG_EMBEDDING_DIMENSIONS', `expected a positive integer, received "${rawDimensions}"`);
    }
  }
  const embeddingModel = new OpenAIEmbeddingModel({
    apiKey: openaiKey,
    model: optionalEnv(env, 'LEGAL_RAG_EMBEDDING_MODEL'),
    dimensions,
  });

  const extractorKind = optionalEnv(env, 'LEGAL_RAG_ENTITY_EXTRACTOR') ?? 'lexicon';
  let entityExtractor: EntityExtractor;
  switch (extractorKind) {
    case 'lexicon':
      entityExtractor = new LexiconEntityExtractor(graph);
      break;
    case 'llm':
      entityExtractor = new LlmEntityExtractor(utilityModel);
      break;
    default:
      throw new ConfigurationError('LEGAL_RAG_ENTITY_EXTRACTOR', `expected "lexicon" or "llm", received "${extractorKind}"`);
  }

  return {
    languageModel,
    embeddingModel,
    crossEncoder: new LlmCrossEncoder(utilityModel),
    entityExtractor,
    rewriteModel: utilityModel,
  };
}
