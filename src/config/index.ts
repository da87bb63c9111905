/**
 * @fileoverview Pipeline configuration
 *
 * One zod schema holds every tunable of the pipeline: fusion weight, retry
 * budget, candidate funnel sizes, context budget, support thresholds and
 * stage timeouts. `resolvePipelineConfig` merges overrides onto the defaults
 * and enforces the cross-field rules; `loadPipelineConfigFromEnv` reads the
 * same keys from `LEGAL_RAG_*` variables.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { StageName } from '../types.js';

// ============================================================================
// SCHEMA
// ============================================================================

const probability = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();
const timeoutMs = z.number().int().nonnegative();

export const StageTimeoutsSchema = z
  .object({
    contextualize: timeoutMs,
    entity_extraction: timeoutMs,
    expansion: timeoutMs,
    retrieval: timeoutMs,
    reranking: timeoutMs,
    generation: timeoutMs,
    validation: timeoutMs,
  })
  .partial()
  .strict();

const BaseConfigSchema = z
  .object({
    /** Weight of the normalized sparse score in fusion; dense gets 1 - α */
    fusionAlpha: probability.default(0.4),
    /** Regenerations allowed after the first draft */
    retryBudget: z.number().int().min(0).max(10).default(2),
    topK: positiveInt.default(10),
    /** Per-method pool fetched before fusion; must exceed topK */
    candidatePoolSize: positiveInt.default(30),
    rerankDepth: positiveInt.default(8),
    generatorPassages: positiveInt.default(5),
    minRelevanceScore: probability.default(0),
    maxContextTokens: positiveInt.default(3000),
    maxAnswerTokens: positiveInt.default(1024),
    temperature: z.number().min(0).max(1).default(0.1),
    historyTurns: z.number().int().nonnegative().default(3),
    maxQueryLength: positiveInt.default(2000),

    bm25K1: z.number().positive().default(1.5),
    bm25B: probability.default(0.75),
    expansionTermWeight: probability.default(0.5),
    maxExpansionDepth: z.number().int().min(1).max(5).default(2),
    maxExpansionTerms: z.number().int().nonnegative().default(12),
    knowledgeGraphPath: z.string().min(1).optional(),
    /** SQLite file the corpus index is persisted to and restored from */
    indexPath: z.string().min(1).optional(),

    exactSupportThreshold: probability.default(0.75),
    partialSupportThreshold: probability.default(0.5),
    minClaimTokens: positiveInt.default(3),

    rewriteFollowUps: z.boolean().default(true),
    maxFollowUpWords: positiveInt.default(8),

    stageTimeoutMs: timeoutMs.default(30_000),
    stageTimeouts: StageTimeoutsSchema.default({}),

    conversationTtlMs: positiveInt.default(24 * 60 * 60 * 1000),
    maxConversationTurns: positiveInt.default(10),

    embeddingBatchSize: positiveInt.default(32),
    embeddingConcurrency: positiveInt.default(4),
  })
  .strict();

export const PipelineConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (config.rerankDepth > config.topK) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rerankDepth'],
      message: `rerankDepth (${config.rerankDepth}) must not exceed topK (${config.topK})`,
    });
  }
  if (config.topK >= config.candidatePoolSize) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['candidatePoolSize'],
      message: `candidatePoolSize (${config.candidatePoolSize}) must exceed topK (${config.topK})`,
    });
  }
  if (config.generatorPassages > config.rerankDepth) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['generatorPassages'],
      message: `generatorPassages (${config.generatorPassages}) must not exceed rerankDepth (${config.rerankDepth})`,
    });
  }
  if (config.partialSupportThreshold > config.exactSupportThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['partialSupportThreshold'],
      message: 'partialSupportThreshold must not exceed exactSupportThreshold',
    });
  }
});

export type PipelineConfig = z.output<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

function formatIssues(error: z.ZodError): { key: string; message: string } {
  const first = error.issues[0];
  const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
  const message = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return { key, message };
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ConfigurationError listing every violated rule
 */
export function resolvePipelineConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const { key, message } = formatIssues(parsed.error);
    throw new ConfigurationError(key, message);
  }
  return parsed.data;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze(resolvePipelineConfig());

export function stageTimeoutFor(config: PipelineConfig, stage: StageName): number {
  return config.stageTimeouts[stage] ?? config.stageTimeoutMs;
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

type NumericKey = {
  [K in keyof PipelineConfigInput]-?: NonNullable<PipelineConfigInput[K]> extends number ? K : never;
}[keyof PipelineConfigInput];

const NUMERIC_ENV_KEYS: Record<string, NumericKey> = {
  LEGAL_RAG_FUSION_ALPHA: 'fusionAlpha',
  LEGAL_RAG_RETRY_BUDGET: 'retryBudget',
  LEGAL_RAG_TOP_K: 'topK',
  LEGAL_RAG_CANDIDATE_POOL_SIZE: 'candidatePoolSize',
  LEGAL_RAG_RERANK_DEPTH: 'rerankDepth',
  LEGAL_RAG_GENERATOR_PASSAGES: 'generatorPassages',
  LEGAL_RAG_MIN_RELEVANCE_SCORE: 'minRelevanceScore',
  LEGAL_RAG_MAX_CONTEXT_TOKENS: 'maxContextTokens',
  LEGAL_RAG_MAX_ANSWER_TOKENS: 'maxAnswerTokens',
  LEGAL_RAG_TEMPERATURE: 'temperature',
  LEGAL_RAG_HISTORY_TURNS: 'historyTurns',
  LEGAL_RAG_EXPANSION_TERM_WEIGHT: 'expansionTermWeight',
  LEGAL_RAG_MAX_EXPANSION_DEPTH: 'maxExpansionDepth',
  LEGAL_RAG_MAX_EXPANSION_TERMS: 'maxExpansionTerms',
  LEGAL_RAG_STAGE_TIMEOUT_MS: 'stageTimeoutMs',
  LEGAL_RAG_CONVERSATION_TTL_MS: 'conversationTtlMs',
  LEGAL_RAG_MAX_CONVERSATION_TURNS: 'maxConversationTurns',
};

function parseBoolean(key: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(key, `expected a boolean, received "${raw}"`);
}

/**
 * Read pipeline settings from `LEGAL_RAG_*` variables. Unset or blank
 * variables keep their defaults.
 */
export function loadPipelineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: PipelineConfigInput = {}
): PipelineConfig {
  const fromEnv: PipelineConfigInput = {};
  for (const [envKey, configKey] of Object.entries(NUMERIC_ENV_KEYS)) {
    const raw = env[envKey];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(envKey, `expected a number, received "${raw}"`);
    }
    fromEnv[configKey] = value;
  }

  const graphPath = env.LEGAL_RAG_KNOWLEDGE_GRAPH_PATH?.trim();
  if (graphPath) {
    fromEnv.knowledgeGraphPath = graphPath;
  }
  const indexPath = env.LEGAL_RAG_INDEX_PATH?.trim();
  if (indexPath) {
    fromEnv.indexPath = indexPath;
  }
  const rewrite = env.LEGAL_RAG_REWRITE_FOLLOW_UPS;
  if (rewrite !== undefined && rewrite.trim() !== '') {
    fromEnv.rewriteFollowUps = parseBoolean('LEGAL_RAG_REWRITE_FOLLOW_UPS', rewrite);
  }

  return resolvePipelineConfig({ ...fromEnv, ...overrides });
}
