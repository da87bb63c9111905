/**
 * @fileoverview Pipeline error hierarchy
 *
 * Every stage failure has a typed error so the orchestrator can translate it
 * into a degraded-but-valid outcome at the stage boundary.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class InvalidQueryError extends PipelineError {
  readonly code = 'INVALID_QUERY';
  readonly retryable = false;

  constructor(readonly reason: 'empty' | 'not_text' | 'too_long', message: string) {
    super(`Invalid query (${reason}): ${message}`);
    this.name = 'InvalidQueryError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { reason: this.reason } };
  }
}

// ============================================================================
// STAGE ERRORS
// ============================================================================

export class ExtractionFailure extends PipelineError {
  readonly code = 'EXTRACTION_FAILURE';
  readonly retryable = true;

  constructor(message: string, readonly cause?: Error) {
    super(`Entity extraction failed: ${message}`);
    this.name = 'ExtractionFailure';
  }
}

export class RetrievalFailure extends PipelineError {
  readonly code = 'RETRIEVAL_FAILURE';
  readonly retryable = true;

  constructor(message: string, readonly cause?: Error) {
    super(`Retrieval failed: ${message}`);
    this.name = 'RetrievalFailure';
  }
}

export class RetrievalEmpty extends PipelineError {
  readonly code = 'RETRIEVAL_EMPTY';
  readonly retryable = false;

  constructor(readonly indexedChunks: number) {
    super(
      indexedChunks === 0
        ? 'No chunks are indexed'
        : `No candidates matched the query among ${indexedChunks} indexed chunks`,
    );
    this.name = 'RetrievalEmpty';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { indexedChunks: this.indexedChunks } };
  }
}

export class RerankFailure extends PipelineError {
  readonly code = 'RERANK_FAILURE';
  readonly retryable = true;

  constructor(readonly modelId: string, message: string, readonly cause?: Error) {
    super(`Reranking with ${modelId} failed: ${message}`);
    this.name = 'RerankFailure';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { modelId: this.modelId, cause: this.cause?.message } };
  }
}

export class GenerationFailure extends PipelineError {
  readonly code = 'GENERATION_FAILURE';
  readonly retryable = true;

  constructor(readonly attempt: number, message: string, readonly cause?: Error) {
    super(`Generation attempt ${attempt} failed: ${message}`);
    this.name = 'GenerationFailure';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { attempt: this.attempt, cause: this.cause?.message } };
  }
}

export class ValidationFailure extends PipelineError {
  readonly code = 'VALIDATION_FAILURE';
  readonly retryable = false;

  constructor(message: string, readonly cause?: Error) {
    super(`Answer validation failed: ${message}`);
    this.name = 'ValidationFailure';
  }
}

export class StageTimeoutError extends PipelineError {
  readonly code = 'STAGE_TIMEOUT';
  readonly retryable = true;

  constructor(readonly stage: string, readonly timeoutMs: number) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { stage: this.stage, timeoutMs: this.timeoutMs } };
  }
}

export class PipelineCancelledError extends PipelineError {
  readonly code = 'PIPELINE_CANCELLED';
  readonly retryable = false;

  constructor(readonly stage?: string) {
    super(stage ? `Query cancelled during ${stage}` : 'Query cancelled');
    this.name = 'PipelineCancelledError';
  }
}

// ============================================================================
// INDEXING & CONFIGURATION ERRORS
// ============================================================================

export class IndexingError extends PipelineError {
  readonly code = 'INDEXING_ERROR';

  constructor(
    readonly documentId: string,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Indexing ${documentId} failed: ${message}`);
    this.name = 'IndexingError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { documentId: this.documentId, cause: this.cause?.message } };
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { configKey: this.configKey } };
  }
}

export class ProviderError extends PipelineError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: string,
    readonly reason: 'invalid_response' | 'unavailable' | 'auth_failed',
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { provider: this.provider, reason: this.reason } };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isCancellation(error: unknown): error is PipelineCancelledError {
  return error instanceof PipelineCancelledError;
}
