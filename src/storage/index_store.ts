/**
 * @fileoverview Versioned corpus index
 *
 * Readers take `current()` and keep that immutable snapshot for the whole
 * query. Writers run one at a time behind a mutex, build a complete new
 * snapshot (sparse + dense) and install it with a single assignment, so an
 * in-flight retrieval never observes a partially indexed document. With a
 * persistence backend the corpus is restored at construction, and a write
 * that cannot be persisted leaves the current snapshot in place.
 */

import pLimit from 'p-limit';
import { IndexingError, isPipelineError } from '../core/errors.js';
import type { EmbeddingModel } from '../providers/types.js';
import { logInfo } from '../telemetry/logger.js';
import {
  chunkIdFor,
  type Chunk,
  type ChunkInput,
  type Document,
  type DocumentInput,
  type DocumentSummary,
} from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { Mutex } from '../utils/serial_lock.js';
import { contentTokens, termFrequencies } from '../utils/text.js';
import { DenseIndex } from './dense_index.js';
import type { IndexPersistence } from './index_persistence.js';
import { DEFAULT_BM25_PARAMETERS, SparseIndex, type Bm25Parameters } from './sparse_index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CorpusSnapshot {
  readonly version: number;
  readonly documents: ReadonlyMap<string, Document>;
  readonly chunks: readonly Chunk[];
  readonly sparse: SparseIndex;
  readonly dense: DenseIndex;
}

export interface IndexStoreOptions {
  bm25?: Bm25Parameters;
  embeddingBatchSize?: number;
  embeddingConcurrency?: number;
  persistence?: IndexPersistence;
  now?: () => Date;
}

// ============================================================================
// STORE
// ============================================================================

export class IndexStore {
  private snapshot: CorpusSnapshot;
  private readonly writeLock = new Mutex();
  private readonly bm25: Bm25Parameters;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private readonly persistence?: IndexPersistence;

  constructor(
    private readonly embeddingModel: EmbeddingModel,
    options: IndexStoreOptions = {}
  ) {
    this.bm25 = options.bm25 ?? DEFAULT_BM25_PARAMETERS;
    this.batchSize = Math.max(1, options.embeddingBatchSize ?? 32);
    this.concurrency = Math.max(1, options.embeddingConcurrency ?? 4);
    this.now = options.now ?? (() => new Date());
    this.persistence = options.persistence;
    const restored = this.persistence?.load() ?? [];
    this.snapshot = this.buildSnapshot(0, new Map(restored.map((document) => [document.documentId, document])));
  }

  current(): CorpusSnapshot {
    return this.snapshot;
  }

  get version(): number {
    return this.snapshot.version;
  }

  listDocuments(): DocumentSummary[] {
    return Array.from(this.snapshot.documents.values())
      .map(({ documentId, filename, totalChunks, indexedAt }) => ({ documentId, filename, totalChunks, indexedAt }))
      .sort((a, b) => (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0));
  }

  /**
   * Index (or replace) a document. Resolves once the new snapshot is
   * installed; later reads see the document.
   *
   * @throws IndexingError on invalid input or embedding failure
   */
  async indexDocument(input: DocumentInput, signal?: AbortSignal): Promise<Document> {
    validateDocumentInput(input, this.embeddingModel.dimensions);
    const embeddings = await this.embedChunks(input, signal);
    const indexedAt = this.now().toISOString();

    const chunks: Chunk[] = input.chunks.map((chunkInput, chunkIndex) => {
      const tokens = contentTokens(chunkInput.text);
      return {
        chunkId: chunkIdFor(input.documentId, chunkIndex),
        documentId: input.documentId,
        chunkIndex,
        filename: input.filename,
        pageNumber: chunkInput.pageNumber,
        text: chunkInput.text,
        embedding: embeddings[chunkIndex],
        termFrequencies: termFrequencies(tokens),
        tokenCount: tokens.length,
      };
    });
    const document: Document = Object.freeze({
      documentId: input.documentId,
      filename: input.filename,
      chunks: Object.freeze(chunks),
      totalChunks: chunks.length,
      indexedAt,
    });

    return this.writeLock.run(() => {
      this.persist(document.documentId, (persistence) => persistence.saveDocument(document));
      const documents = new Map(this.snapshot.documents);
      const replaced = documents.has(document.documentId);
      documents.set(document.documentId, document);
      this.snapshot = this.buildSnapshot(this.snapshot.version + 1, documents);
      logInfo(replaced ? 'Document re-indexed' : 'Document indexed', {
        documentId: document.documentId,
        chunks: document.totalChunks,
        version: this.snapshot.version,
      });
      return document;
    });
  }

  async removeDocument(documentId: string): Promise<boolean> {
    return this.writeLock.run(() => {
      if (!this.snapshot.documents.has(documentId)) return false;
      this.persist(documentId, (persistence) => persistence.deleteDocument(documentId));
      const documents = new Map(this.snapshot.documents);
      documents.delete(documentId);
      this.snapshot = this.buildSnapshot(this.snapshot.version + 1, documents);
      logInfo('Document removed', { documentId, version: this.snapshot.version });
      return true;
    });
  }

  close(): void {
    this.persistence?.close?.();
  }

  private persist(documentId: string, write: (persistence: IndexPersistence) => void): void {
    if (!this.persistence) return;
    try {
      write(this.persistence);
    } catch (error) {
      throw new IndexingError(documentId, true, `persisting failed: ${getErrorMessage(error)}`, toError(error));
    }
  }

  private async embedChunks(input: DocumentInput, signal?: AbortSignal): Promise<Float32Array[]> {
    const vectors: Array<Float32Array | undefined> = input.chunks.map((chunk) => toVector(chunk.embedding));
    const missing = vectors.flatMap((vector, index) => (vector ? [] : [index]));
    if (missing.length === 0) {
      return vectors.map((vector, index) => requireVector(input.documentId, vector, index));
    }

    const batches: number[][] = [];
    for (let start = 0; start < missing.length; start += this.batchSize) {
      batches.push(missing.slice(start, start + this.batchSize));
    }

    const limit = pLimit(this.concurrency);
    try {
      await Promise.all(
        batches.map((batch) =>
          limit(async () => {
            const texts = batch.map((index) => input.chunks[index].text);
            const embedded = await this.embeddingModel.embed(texts, signal);
            if (embedded.length !== batch.length) {
              throw new Error(`Embedding model returned ${embedded.length} vectors for ${batch.length} chunks`);
            }
            batch.forEach((chunkIndex, position) => {
              vectors[chunkIndex] = embedded[position];
            });
          })
        )
      );
    } catch (error) {
      const retryable = isPipelineError(error) ? error.retryable : true;
      throw new IndexingError(input.documentId, retryable, `embedding failed: ${getErrorMessage(error)}`, toError(error));
    }

    return vectors.map((vector, index) => {
      const checked = requireVector(input.documentId, vector, index);
      if (checked.length !== this.embeddingModel.dimensions) {
        throw new IndexingError(
          input.documentId,
          false,
          `chunk ${index} embedding has ${checked.length} dimensions; expected ${this.embeddingModel.dimensions}`,
        );
      }
      return checked;
    });
  }

  private buildSnapshot(version: number, documents: Map<string, Document>): CorpusSnapshot {
    const chunks = Array.from(documents.values()).flatMap((document) => document.chunks);
    return Object.freeze({
      version,
      documents,
      chunks,
      sparse: new SparseIndex(chunks, this.bm25),
      dense: new DenseIndex(chunks, this.embeddingModel.dimensions),
    });
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toVector(embedding: ChunkInput['embedding']): Float32Array | undefined {
  if (embedding === undefined) return undefined;
  return embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
}

function requireVector(documentId: string, vector: Float32Array | undefined, index: number): Float32Array {
  if (!vector) {
    throw new IndexingError(documentId, true, `chunk ${index} has no embedding`);
  }
  return vector;
}

function validateDocumentInput(input: DocumentInput, dimensions: number): void {
  const documentId = typeof input.documentId === 'string' ? input.documentId.trim() : '';
  if (!documentId) {
    throw new IndexingError(String(input.documentId), false, 'documentId must be a non-empty string');
  }
  if (!input.filename || !input.filename.trim()) {
    throw new IndexingError(documentId, false, 'filename must be a non-empty string');
  }
  if (input.chunks.length === 0) {
    throw new IndexingError(documentId, false, 'document has no chunks');
  }
  input.chunks.forEach((chunk, index) => {
    if (!chunk.text || !chunk.text.trim()) {
      throw new IndexingError(documentId, false, `chunk ${index} has no text`);
    }
    if (!Number.isInteger(chunk.pageNumber) || chunk.pageNumber < 1) {
      throw new IndexingError(documentId, false, `chunk ${index} has invalid page number ${chunk.pageNumber}`);
    }
    if (chunk.embedding !== undefined && chunk.embedding.length !== dimensions) {
      throw new IndexingError(
        documentId,
        false,
        `chunk ${index} embedding has ${chunk.embedding.length} dimensions; expected ${dimensions}`,
      );
    }
  });
}
