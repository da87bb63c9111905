/**
 * @fileoverview In-process stand-ins for every model capability.
 *
 * Each fake records its calls so tests can assert how often a stage reached
 * its model and with what input.
 */

import type {
  CompletionRequest,
  CompletionResponse,
  CrossEncoder,
  EmbeddingModel,
  EntityExtractor,
  LanguageModel,
  ScoreScale,
} from '../../providers/types.js';
import type { ExtractedEntity } from '../../types.js';
import { contentTokens } from '../../utils/text.js';

// ============================================================================
// LANGUAGE MODEL
// ============================================================================

export type ScriptedReply = string | Error | ((request: CompletionRequest) => string | Promise<string>);

/**
 * Replies from a script in order; the last entry repeats once the script
 * runs out.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly modelId: string;
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: ScriptedReply[], modelId = 'fake-llm') {
    this.modelId = modelId;
  }

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const reply = this.script[Math.min(this.requests.length - 1, this.script.length - 1)];
    if (reply === undefined) {
      throw new Error('ScriptedLanguageModel has an empty script');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    const text = typeof reply === 'function' ? await reply(request) : reply;
    return { text, model: this.modelId, stopReason: 'end_turn' };
  }
}

/** Never settles until the request's signal fires, then rejects. */
export class HangingLanguageModel implements LanguageModel {
  readonly modelId = 'hanging-llm';
  calls = 0;

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.calls += 1;
    return new Promise((_, reject) => {
      request.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

/**
 * Looks texts up in a fixed table; anything else gets `fallback`.
 */
export class TableEmbeddingModel implements EmbeddingModel {
  readonly modelId = 'fake-embedding';
  readonly calls: string[][] = [];

  constructor(
    readonly dimensions: number,
    private readonly table: ReadonlyMap<string, readonly number[]> = new Map(),
    private readonly fallback: readonly number[] = Array.from({ length: dimensions }, (_, i) => (i === 0 ? 1 : 0))
  ) {}

  async embed(texts: string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    return texts.map((text) => Float32Array.from(this.table.get(text) ?? this.fallback));
  }
}

export class FailingEmbeddingModel implements EmbeddingModel {
  readonly modelId = 'failing-embedding';
  calls = 0;

  constructor(
    readonly dimensions: number,
    private readonly error: Error = new Error('embedding service unavailable')
  ) {}

  async embed(): Promise<Float32Array[]> {
    this.calls += 1;
    throw this.error;
  }
}

// ============================================================================
// CROSS-ENCODER
// ============================================================================

/** Scores a passage by the share of query content tokens it contains. */
export function overlapScore(query: string, passage: string): number {
  const queryTokens = new Set(contentTokens(query));
  if (queryTokens.size === 0) return 0;
  const passageTokens = new Set(contentTokens(passage));
  let hits = 0;
  for (const token of queryTokens) {
    if (passageTokens.has(token)) hits += 1;
  }
  return hits / queryTokens.size;
}

export class FakeCrossEncoder implements CrossEncoder {
  readonly modelId = 'fake-cross-encoder';
  readonly calls: Array<{ query: string; passages: string[] }> = [];

  constructor(
    private readonly scorer: (query: string, passage: string) => number = overlapScore,
    readonly scoreScale: ScoreScale = 'probability'
  ) {}

  async score(query: string, passages: string[]): Promise<number[]> {
    this.calls.push({ query, passages: [...passages] });
    return passages.map((passage) => this.scorer(query, passage));
  }
}

export class FailingCrossEncoder implements CrossEncoder {
  readonly modelId = 'failing-cross-encoder';
  readonly scoreScale = 'probability';
  calls = 0;

  async score(): Promise<number[]> {
    this.calls += 1;
    throw new Error('reranker offline');
  }
}

// ============================================================================
// ENTITY EXTRACTION
// ============================================================================

export class StaticEntityExtractor implements EntityExtractor {
  readonly name = 'static';
  readonly calls: string[] = [];

  constructor(private readonly entities: ExtractedEntity[] | Error = []) {}

  async extract(text: string): Promise<ExtractedEntity[]> {
    this.calls.push(text);
    if (this.entities instanceof Error) throw this.entities;
    return this.entities.map((entity) => ({ ...entity }));
  }
}
