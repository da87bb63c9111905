/**
 * @fileoverview Legal RAG pipeline orchestrator
 *
 * Sequences one query through the stages:
 *
 *   contextualize → entity_extraction → expansion → retrieval → reranking
 *     → generation ⇄ validation (bounded) → answer + citations
 *
 * Every stage runs under its own deadline and AbortSignal. Stage failures are
 * contained where they happen and turned into a degraded but well-formed
 * answer; only invalid input and caller cancellation reject `answer()`. A
 * failed history write is reported on the result as `historyError`.
 * Turns on one conversation run one at a time, and a turn is written to
 * history only after the corrective loop has finished and the caller has not
 * cancelled.
 */

import { randomUUID } from 'node:crypto';
import {
  ConfigurationError,
  ExtractionFailure,
  InvalidQueryError,
  RerankFailure,
  RetrievalEmpty,
  RetrievalFailure,
  isCancellation,
  isPipelineError,
} from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { resolvePipelineConfig, stageTimeoutFor, type PipelineConfig, type PipelineConfigInput } from '../config/index.js';
import { toPublicCitations } from '../generation/citations.js';
import { Generator } from '../generation/generator.js';
import { INSUFFICIENT_INFORMATION_ANSWER, SUPPRESSED_ANSWER } from '../generation/prompts.js';
import { KnowledgeExpander } from '../knowledge/expander.js';
import { LegalKnowledgeGraph, getDefaultKnowledgeGraph } from '../knowledge/knowledge_graph.js';
import { FollowUpRewriter } from '../knowledge/query_rewriter.js';
import type { PipelineProviders } from '../providers/types.js';
import { HybridRetriever } from '../retrieval/hybrid_retriever.js';
import { Reranker, fusionFallback } from '../retrieval/reranker.js';
import { InMemoryConversationStore, type ConversationStore } from '../storage/conversation_store.js';
import { SqliteIndexPersistence, type IndexPersistence } from '../storage/index_persistence.js';
import { IndexStore } from '../storage/index_store.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import {
  PIPELINE_STAGES,
  type AnswerOptions,
  type AnswerResult,
  type Citation,
  type ConversationState,
  type ConversationTurn,
  type Document,
  type DocumentInput,
  type DocumentSummary,
  type ExtractedEntity,
  type PipelineStats,
  type RerankedCandidate,
  type RetrievalCandidate,
  type StageName,
  type ValidationVerdict,
} from '../types.js';
import { throwIfAborted, withDeadline } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { KeyedSerialLock } from '../utils/serial_lock.js';
import { CorrectiveValidator, runCorrectiveLoop } from '../validation/corrective_validator.js';
import { LexicalSupportChecker, type SupportChecker } from '../validation/support.js';
import { createStageTracker, type StageTracker } from './stage_tracker.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface LegalRagPipelineOptions {
  providers: PipelineProviders;
  config?: PipelineConfigInput;
  knowledgeGraph?: LegalKnowledgeGraph;
  supportChecker?: SupportChecker;
  conversationStore?: ConversationStore;
  /** Durable index backend; defaults to SQLite at `config.indexPath` when set */
  indexPersistence?: IndexPersistence;
  now?: () => Date;
  createConversationId?: () => string;
}

interface TurnContext {
  query: string;
  conversationId: string;
  signal?: AbortSignal;
  tracker: StageTracker;
}

interface TurnOutcome {
  answerText: string;
  citations: Citation[];
  isGrounded: boolean;
  outcome: AnswerResult['outcome'];
  verdict?: ValidationVerdict;
  generationCalls: number;
  rewrittenQuery?: string;
}

// ============================================================================
// PIPELINE
// ============================================================================

export class LegalRagPipeline {
  readonly config: PipelineConfig;
  private readonly providers: PipelineProviders;
  private readonly indexStore: IndexStore;
  private readonly conversations: ConversationStore;
  private readonly expander: KnowledgeExpander;
  private readonly rewriter: FollowUpRewriter;
  private readonly retriever: HybridRetriever;
  private readonly reranker: Reranker;
  private readonly generator: Generator;
  private readonly validator: CorrectiveValidator;
  private readonly turnLock = new KeyedSerialLock();
  private readonly now: () => Date;
  private readonly createConversationId: () => string;

  constructor(options: LegalRagPipelineOptions) {
    const config = resolvePipelineConfig(options.config);
    const { providers } = options;
    if (!Number.isInteger(providers.embeddingModel.dimensions) || providers.embeddingModel.dimensions <= 0) {
      throw new ConfigurationError('embeddingModel.dimensions', 'must be a positive integer');
    }

    this.config = config;
    this.providers = providers;
    this.now = options.now ?? (() => new Date());
    this.createConversationId = options.createConversationId ?? (() => `conv_${randomUUID()}`);

    const graph = options.knowledgeGraph
      ?? (config.knowledgeGraphPath ? LegalKnowledgeGraph.load(config.knowledgeGraphPath) : getDefaultKnowledgeGraph());
    this.expander = new KnowledgeExpander(graph, {
      maxDepth: config.maxExpansionDepth,
      maxExpansionTerms: config.maxExpansionTerms,
    });
    this.rewriter = new FollowUpRewriter(providers.rewriteModel ?? providers.languageModel, {
      maxFollowUpWords: config.maxFollowUpWords,
    });
    this.indexStore = new IndexStore(providers.embeddingModel, {
      bm25: { k1: config.bm25K1, b: config.bm25B },
      embeddingBatchSize: config.embeddingBatchSize,
      embeddingConcurrency: config.embeddingConcurrency,
      persistence: options.indexPersistence
        ?? (config.indexPath
          ? new SqliteIndexPersistence({ path: config.indexPath, dimensions: providers.embeddingModel.dimensions })
          : undefined),
      now: this.now,
    });
    this.retriever = new HybridRetriever(providers.embeddingModel, {
      topK: config.topK,
      candidatePoolSize: config.candidatePoolSize,
      fusionAlpha: config.fusionAlpha,
      expansionTermWeight: config.expansionTermWeight,
    });
    this.reranker = new Reranker(providers.crossEncoder, { rerankDepth: config.rerankDepth });
    this.generator = new Generator(providers.languageModel, {
      generatorPassages: config.generatorPassages,
      minRelevanceScore: config.minRelevanceScore,
      maxContextTokens: config.maxContextTokens,
      historyTurns: config.historyTurns,
      maxAnswerTokens: config.maxAnswerTokens,
      temperature: config.temperature,
    });
    this.validator = new CorrectiveValidator(
      options.supportChecker ?? new LexicalSupportChecker({
        exactThreshold: config.exactSupportThreshold,
        partialThreshold: config.partialSupportThreshold,
      }),
      { minClaimTokens: config.minClaimTokens },
    );
    this.conversations = options.conversationStore ?? new InMemoryConversationStore({
      maxTurns: config.maxConversationTurns,
      ttlMs: config.conversationTtlMs,
      now: this.now,
    });
  }

  // ==========================================================================
  // QUERY
  // ==========================================================================

  /**
   * Answer a question, optionally continuing a conversation.
   *
   * @throws InvalidQueryError for an empty, non-string or over-long query
   * @throws PipelineCancelledError when `options.signal` fires first, including
   *   while the call is queued behind another turn on the same conversation
   */
  async answer(query: unknown, options: AnswerOptions = {}): Promise<AnswerResult> {
    const question = this.validateQuery(query);
    const conversationId = options.conversationId?.trim() || this.createConversationId();
    const { signal } = options;
    throwIfAborted(signal);

    return this.turnLock.run(conversationId, async () => {
      throwIfAborted(signal);
      const tracker = createStageTracker(options.onStage);
      const startedAt = Date.now();
      const outcome = await this.runTurn({ query: question, conversationId, signal, tracker });

      // Commit point: nothing is written for a cancelled call.
      throwIfAborted(signal, 'commit');
      const turn: ConversationTurn = {
        query: question,
        answer: outcome.answerText,
        citations: outcome.citations,
        isGrounded: outcome.isGrounded,
        createdAt: this.now().toISOString(),
      };
      const historyError = await this.commitTurn(conversationId, turn);

      logInfo('Query answered', {
        conversationId,
        outcome: outcome.outcome,
        citations: outcome.citations.length,
        generationCalls: outcome.generationCalls,
        durationMs: Date.now() - startedAt,
      });
      return {
        ...outcome,
        conversationId,
        stages: tracker.report(),
        ...(historyError ? { historyError } : {}),
      };
    }, signal);
  }

  /** Store failures are logged and reported; the answer is still returned. */
  private async commitTurn(conversationId: string, turn: ConversationTurn): Promise<string | undefined> {
    try {
      await this.conversations.appendTurn(conversationId, turn);
      return undefined;
    } catch (error) {
      const message = getErrorMessage(error);
      logError('Failed to record conversation turn', { conversationId, error: message });
      return message;
    }
  }

  private validateQuery(query: unknown): string {
    if (typeof query !== 'string') {
      throw new InvalidQueryError('not_text', `expected a string, received ${query === null ? 'null' : typeof query}`);
    }
    const trimmed = query.trim();
    if (!trimmed) {
      throw new InvalidQueryError('empty', 'query is empty');
    }
    if (trimmed.length > this.config.maxQueryLength) {
      throw new InvalidQueryError('too_long', `query has ${trimmed.length} characters; limit is ${this.config.maxQueryLength}`);
    }
    return trimmed;
  }

  private async runTurn(context: TurnContext): Promise<TurnOutcome> {
    try {
      return await this.runStages(context);
    } catch (error) {
      if (isCancellation(error)) throw error;
      logError('Pipeline failed unexpectedly; answer suppressed', {
        conversationId: context.conversationId,
        error: getErrorMessage(error),
      });
      context.tracker.finalizeMissing(PIPELINE_STAGES, 'pipeline aborted after an unexpected error');
      return suppressedOutcome(0);
    }
  }

  private async runStages(context: TurnContext): Promise<TurnOutcome> {
    const { query, conversationId, signal, tracker } = context;
    const snapshot = this.indexStore.current();

    if (snapshot.chunks.length === 0) {
      const empty = new RetrievalEmpty(0);
      logWarning(empty.message, { conversationId });
      tracker.finalizeMissing(PIPELINE_STAGES, empty.message);
      return insufficientOutcome();
    }

    const history = (await this.conversations.get(conversationId))?.turns ?? [];

    // contextualize
    let retrievalQuery = query;
    let rewrittenQuery: string | undefined;
    const contextStage = tracker.start('contextualize', history.length);
    if (!this.config.rewriteFollowUps) {
      tracker.finish(contextStage, { outputCount: 1, filteredCount: 0, status: 'skipped' });
    } else {
      try {
        const rewrite = await this.withStageDeadline('contextualize', signal, (stageSignal) =>
          this.rewriter.rewrite(query, history, stageSignal)
        );
        if (rewrite.rewritten) {
          retrievalQuery = rewrite.query;
          rewrittenQuery = rewrite.query;
        }
        tracker.finish(contextStage, { outputCount: 1, filteredCount: 0 });
      } catch (error) {
        if (isCancellation(error)) throw error;
        const fallback = this.rewriter.fallback(query, history);
        if (fallback.rewritten) {
          retrievalQuery = fallback.query;
          rewrittenQuery = fallback.query;
        }
        tracker.issue('contextualize', { message: `Rewrite failed: ${getErrorMessage(error)}`, severity: 'minor' });
        tracker.finish(contextStage, { outputCount: 1, filteredCount: 0, status: 'partial' });
      }
    }

    // entity_extraction
    let entities: ExtractedEntity[] = [];
    const extractionStage = tracker.start('entity_extraction', 1);
    const extraction = await safeAsync(() =>
      this.withStageDeadline('entity_extraction', signal, (stageSignal) =>
        this.providers.entityExtractor.extract(retrievalQuery, stageSignal)
      )
    );
    if (extraction.ok) {
      entities = extraction.value;
      tracker.finish(extractionStage, { outputCount: entities.length, filteredCount: 0, status: 'success' });
    } else {
      if (isCancellation(extraction.error)) throw extraction.error;
      const failure = new ExtractionFailure(extraction.error.message, extraction.error);
      logWarning(failure.message, { conversationId });
      tracker.issue('entity_extraction', {
        message: failure.message,
        severity: 'moderate',
        remediation: 'Continuing with the unexpanded query',
      });
      tracker.finish(extractionStage, { outputCount: 0, filteredCount: 0, status: 'failed' });
    }

    // expansion
    const expansionStage = tracker.start('expansion', entities.length);
    const expanded = this.expander.expand(retrievalQuery, entities);
    tracker.finish(expansionStage, {
      outputCount: expanded.expansionTerms.length,
      filteredCount: 0,
      status: entities.length === 0 ? 'skipped' : 'success',
    });

    // retrieval
    let candidates: RetrievalCandidate[] = [];
    {
      const stage = tracker.start('retrieval', snapshot.chunks.length);
      try {
        const result = await this.withStageDeadline('retrieval', signal, (stageSignal) =>
          this.retriever.retrieve(expanded, snapshot, stageSignal)
        );
        candidates = result.candidates;
        for (const degraded of result.degraded) {
          tracker.issue('retrieval', {
            message: `${degraded.method} lookup failed: ${degraded.error}`,
            severity: 'moderate',
          });
        }
        tracker.finish(stage, { outputCount: candidates.length });
      } catch (error) {
        if (isCancellation(error)) throw error;
        const failure = error instanceof RetrievalFailure
          ? error
          : new RetrievalFailure(getErrorMessage(error), toError(error));
        logWarning(failure.message, { conversationId });
        tracker.issue('retrieval', { message: failure.message, severity: 'significant' });
        tracker.finish(stage, { outputCount: 0, status: 'failed' });
      }
    }
    if (candidates.length === 0) {
      const empty = new RetrievalEmpty(snapshot.chunks.length);
      logInfo(empty.message, { conversationId });
      tracker.finalizeMissing(PIPELINE_STAGES, empty.message);
      return insufficientOutcome(rewrittenQuery);
    }

    // reranking
    let reranked: RerankedCandidate[];
    {
      const stage = tracker.start('reranking', candidates.length);
      try {
        reranked = await this.withStageDeadline('reranking', signal, (stageSignal) =>
          this.reranker.rerank(retrievalQuery, candidates, stageSignal)
        );
        tracker.finish(stage, { outputCount: reranked.length });
      } catch (error) {
        if (isCancellation(error)) throw error;
        const failure = error instanceof RerankFailure
          ? error
          : new RerankFailure(this.reranker.modelId, getErrorMessage(error), toError(error));
        logWarning(`${failure.message}; using fused order`, { conversationId });
        reranked = fusionFallback(candidates, this.config.rerankDepth);
        tracker.issue('reranking', {
          message: failure.message,
          severity: 'moderate',
          remediation: 'Fell back to fused-score ordering',
        });
        tracker.finish(stage, { outputCount: reranked.length, status: 'partial' });
      }
    }

    const window = this.generator.buildWindow(reranked);
    if (window.passages.length === 0) {
      const message = `No passage reached the relevance threshold ${this.config.minRelevanceScore}`;
      logInfo(message, { conversationId });
      tracker.finalizeMissing(PIPELINE_STAGES, message);
      return insufficientOutcome(rewrittenQuery);
    }

    // generation ⇄ validation
    const generationStage = tracker.start('generation', window.passages.length);
    const validationStage = tracker.start('validation', 1);
    const loop = await runCorrectiveLoop({
      retryBudget: this.config.retryBudget,
      generate: (attempt, feedback) =>
        this.withStageDeadline('generation', signal, (stageSignal) =>
          this.generator.generate({
            query,
            history,
            candidates: reranked,
            feedback,
            attempt,
            signal: stageSignal,
          })
        ),
      validate: (draft) =>
        this.withStageDeadline('validation', signal, (stageSignal) => this.validator.validate(draft, stageSignal)),
    });

    for (const failure of loop.failures) {
      tracker.issue(failure.stage, { message: failure.message, severity: 'moderate' });
    }
    const generationFailed = loop.failures.some((failure) => failure.stage === 'generation');
    tracker.finish(generationStage, {
      outputCount: loop.generationCalls,
      filteredCount: 0,
      status: loop.draft === undefined ? 'failed' : generationFailed ? 'partial' : 'success',
    });
    for (const transition of loop.transitions) {
      tracker.issue('validation', {
        message: `attempt ${transition.attempt}: ${transition.from} → ${transition.outcome} (${transition.reason})`,
        severity: transition.outcome === 'accepted' ? 'minor' : 'moderate',
      });
    }
    tracker.finish(validationStage, {
      outputCount: loop.outcome === 'accepted' ? 1 : 0,
      filteredCount: 0,
      status: loop.verdict === undefined ? 'skipped' : loop.outcome === 'accepted' ? 'success' : 'partial',
    });

    if (loop.outcome === 'accepted' && loop.draft) {
      return {
        answerText: loop.draft.text,
        citations: toPublicCitations(loop.draft),
        isGrounded: true,
        outcome: 'accepted',
        verdict: loop.verdict,
        generationCalls: loop.generationCalls,
        rewrittenQuery,
      };
    }
    return {
      ...suppressedOutcome(loop.generationCalls, rewrittenQuery),
      answerText: loop.draft?.declined ? INSUFFICIENT_INFORMATION_ANSWER : SUPPRESSED_ANSWER,
      verdict: loop.verdict,
    };
  }

  private withStageDeadline<T>(
    stage: StageName,
    signal: AbortSignal | undefined,
    work: (stageSignal: AbortSignal) => Promise<T>
  ): Promise<T> {
    return withDeadline(work, { stage, timeoutMs: stageTimeoutFor(this.config, stage), signal });
  }

  // ==========================================================================
  // CORPUS & CONVERSATIONS
  // ==========================================================================

  /**
   * Index or replace a document. Once this resolves, `answer()` sees it.
   *
   * @throws IndexingError
   */
  async indexDocument(input: DocumentInput, signal?: AbortSignal): Promise<Document> {
    try {
      return await this.indexStore.indexDocument(input, signal);
    } catch (error) {
      logError('Indexing failed', {
        documentId: input.documentId,
        error: isPipelineError(error) ? error.toJSON() : getErrorMessage(error),
      });
      throw error;
    }
  }

  /**
   * @throws IndexingError when the removal cannot be persisted
   */
  removeDocument(documentId: string): Promise<boolean> {
    return this.indexStore.removeDocument(documentId);
  }

  listDocuments(): DocumentSummary[] {
    return this.indexStore.listDocuments();
  }

  getConversation(conversationId: string): Promise<ConversationState | undefined> {
    return this.conversations.get(conversationId);
  }

  /** Clears history; waits for any turn in flight on the same conversation. */
  clearConversation(conversationId: string): Promise<boolean> {
    return this.turnLock.run(conversationId, () => this.conversations.clear(conversationId));
  }

  async stats(): Promise<PipelineStats> {
    const snapshot = this.indexStore.current();
    return {
      indexVersion: snapshot.version,
      documents: snapshot.documents.size,
      chunks: snapshot.chunks.length,
      conversations: await this.conversations.count(),
    };
  }

  close(): void {
    this.conversations.close?.();
    this.indexStore.close();
  }
}

// ============================================================================
// OUTCOMES
// ============================================================================

function insufficientOutcome(rewrittenQuery?: string): TurnOutcome {
  return {
    answerText: INSUFFICIENT_INFORMATION_ANSWER,
    citations: [],
    isGrounded: false,
    outcome: 'insufficient',
    generationCalls: 0,
    rewrittenQuery,
  };
}

function suppressedOutcome(generationCalls: number, rewrittenQuery?: string): TurnOutcome {
  return {
    answerText: SUPPRESSED_ANSWER,
    citations: [],
    isGrounded: false,
    outcome: 'suppressed',
    generationCalls,
    rewrittenQuery,
  };
}
