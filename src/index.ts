/**
 * @fileoverview Legal RAG - grounded question answering over legal documents
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   LegalRagPipeline,
 *   createDefaultProviders,
 *   getDefaultKnowledgeGraph,
 *   loadPipelineConfigFromEnv,
 * } from 'legal-rag';
 *
 * const graph = getDefaultKnowledgeGraph();
 * const pipeline = new LegalRagPipeline({
 *   providers: createDefaultProviders(graph),
 *   config: loadPipelineConfigFromEnv(),
 *   knowledgeGraph: graph,
 * });
 *
 * await pipeline.indexDocument({
 *   documentId: 'constitution',
 *   filename: 'constitution.pdf',
 *   chunks: [{ pageNumber: 12, text: 'No person shall be deprived of life or personal liberty...' }],
 * });
 *
 * const result = await pipeline.answer('What is due process?');
 * console.log(result.answerText, result.citations);
 * ```
 *
 * @packageDocumentation
 */

// Pipeline
export { LegalRagPipeline } from './api/pipeline.js';
export type { LegalRagPipelineOptions } from './api/pipeline.js';
export { createStageTracker, deriveStageStatus } from './api/stage_tracker.js';

// Types
export * from './types.js';

// Configuration
export {
  PipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  resolvePipelineConfig,
  loadPipelineConfigFromEnv,
  stageTimeoutFor,
} from './config/index.js';
export type { PipelineConfig, PipelineConfigInput } from './config/index.js';

// Errors
export {
  PipelineError,
  InvalidQueryError,
  ExtractionFailure,
  RetrievalFailure,
  RetrievalEmpty,
  RerankFailure,
  GenerationFailure,
  ValidationFailure,
  StageTimeoutError,
  PipelineCancelledError,
  IndexingError,
  ConfigurationError,
  ProviderError,
  isPipelineError,
  isCancellation,
} from './core/errors.js';
export type { ErrorJSON } from './core/errors.js';

// Providers
export * from './providers/index.js';

// Knowledge
export { LegalKnowledgeGraph, getDefaultKnowledgeGraph, KnowledgeGraphFileSchema } from './knowledge/knowledge_graph.js';
export type { KnowledgeGraphFile, ConceptNode, ReachedConcept } from './knowledge/knowledge_graph.js';
export { KnowledgeExpander, unexpandedQuery } from './knowledge/expander.js';
export { FollowUpRewriter, isVagueFollowUp } from './knowledge/query_rewriter.js';
export type { RewriteResult } from './knowledge/query_rewriter.js';

// Storage
export { InMemoryConversationStore, SqliteConversationStore } from './storage/conversation_store.js';
export type { ConversationStore, ConversationStoreOptions, SqliteConversationStoreOptions } from './storage/conversation_store.js';
export { IndexStore } from './storage/index_store.js';
export type { CorpusSnapshot } from './storage/index_store.js';
export { SqliteIndexPersistence } from './storage/index_persistence.js';
export type { IndexPersistence, SqliteIndexPersistenceOptions } from './storage/index_persistence.js';

// Retrieval, generation, validation
export { HybridRetriever, fuseResults, buildQueryWeights } from './retrieval/hybrid_retriever.js';
export { Reranker, fusionFallback } from './retrieval/reranker.js';
export { Generator } from './generation/generator.js';
export { INSUFFICIENT_INFORMATION_ANSWER, SUPPRESSED_ANSWER } from './generation/prompts.js';
export { CorrectiveValidator, nextTransition, runCorrectiveLoop } from './validation/corrective_validator.js';
export { LexicalSupportChecker } from './validation/support.js';
export type { SupportChecker, EvidencePassage } from './validation/support.js';

// Logging
export { resolveLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';
