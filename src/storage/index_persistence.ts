/**
 * @fileoverview Durable copy of the corpus index
 *
 * The index store writes every indexed document here (chunk text, page,
 * embedding and term frequencies) and reads the whole corpus back when it is
 * constructed, so a restart does not require re-embedding. Embeddings are
 * stored as little-endian float32 blobs.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { IndexingError } from '../core/errors.js';
import { logInfo } from '../telemetry/logger.js';
import { chunkIdFor, type Chunk, type Document } from '../types.js';

export interface IndexPersistence {
  /** Every stored document, ordered by id. */
  load(): Document[];
  /** Store a document, replacing any earlier version with the same id. */
  saveDocument(document: Document): void;
  deleteDocument(documentId: string): void;
  close?(): void;
}

export interface SqliteIndexPersistenceOptions {
  /** File path, or ':memory:' */
  path?: string;
  database?: Database.Database;
  /** Expected embedding length; stored vectors of another length are rejected */
  dimensions: number;
}

const DocumentRowSchema = z.object({
  id: z.string(),
  filename: z.string(),
  indexed_at: z.string(),
});

const ChunkRowSchema = z.object({
  chunk_index: z.number().int().nonnegative(),
  page_number: z.number().int().positive(),
  text: z.string(),
  embedding: z.instanceof(Buffer),
  term_frequencies: z.string(),
  token_count: z.number().int().nonnegative(),
});

const TermFrequenciesSchema = z.array(z.tuple([z.string(), z.number().int().positive()]));

function encodeEmbedding(embedding: Float32Array): Buffer {
  const buffer = Buffer.allocUnsafe(embedding.length * Float32Array.BYTES_PER_ELEMENT);
  const view = new Float32Array(buffer.buffer, buffer.byteOffset, embedding.length);
  view.set(embedding);
  return buffer;
}

function decodeEmbedding(blob: Buffer): Float32Array {
  return new Float32Array(blob.buffer.slice(blob.byteOffset, blob.byteOffset + blob.length));
}

export class SqliteIndexPersistence implements IndexPersistence {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly dimensions: number;

  constructor(options: SqliteIndexPersistenceOptions) {
    this.ownsDatabase = !options.database;
    this.db = options.database ?? new Database(options.path ?? ':memory:');
    this.dimensions = options.dimensions;
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.pragma('foreign_keys = ON');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS legal_rag_documents (
        id TEXT PRIMARY KEY,
        filename TEXT NOT NULL,
        indexed_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS legal_rag_chunks (
        document_id TEXT NOT NULL REFERENCES legal_rag_documents(id) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        page_number INTEGER NOT NULL,
        text TEXT NOT NULL,
        embedding BLOB NOT NULL,
        term_frequencies TEXT NOT NULL,
        token_count INTEGER NOT NULL,
        PRIMARY KEY (document_id, chunk_index)
      );
    `);
  }

  load(): Document[] {
    const documentRows = this.db
      .prepare('SELECT id, filename, indexed_at FROM legal_rag_documents ORDER BY id ASC')
      .all();
    const selectChunks = this.db.prepare(
      `SELECT chunk_index, page_number, text, embedding, term_frequencies, token_count
       FROM legal_rag_chunks WHERE document_id = ? ORDER BY chunk_index ASC`
    );

    const documents = documentRows.map((raw): Document => {
      const row = DocumentRowSchema.parse(raw);
      const chunks = selectChunks.all(row.id).map((rawChunk): Chunk => {
        const chunk = ChunkRowSchema.parse(rawChunk);
        const embedding = decodeEmbedding(chunk.embedding);
        if (embedding.length !== this.dimensions) {
          throw new IndexingError(
            row.id,
            false,
            `stored chunk ${chunk.chunk_index} embedding has ${embedding.length} dimensions; expected ${this.dimensions}`,
          );
        }
        const frequencies: unknown = JSON.parse(chunk.term_frequencies);
        return {
          chunkId: chunkIdFor(row.id, chunk.chunk_index),
          documentId: row.id,
          chunkIndex: chunk.chunk_index,
          filename: row.filename,
          pageNumber: chunk.page_number,
          text: chunk.text,
          embedding,
          termFrequencies: new Map(TermFrequenciesSchema.parse(frequencies)),
          tokenCount: chunk.token_count,
        };
      });
      return Object.freeze({
        documentId: row.id,
        filename: row.filename,
        chunks: Object.freeze(chunks),
        totalChunks: chunks.length,
        indexedAt: row.indexed_at,
      });
    });

    if (documents.length > 0) {
      logInfo('Index restored', {
        documents: documents.length,
        chunks: documents.reduce((total, document) => total + document.totalChunks, 0),
      });
    }
    return documents;
  }

  saveDocument(document: Document): void {
    const insertDocument = this.db.prepare(
      'INSERT INTO legal_rag_documents (id, filename, indexed_at) VALUES (?, ?, ?)'
    );
    const insertChunk = this.db.prepare(
      `INSERT INTO legal_rag_chunks
         (document_id, chunk_index, page_number, text, embedding, term_frequencies, token_count)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    const save = this.db.transaction(() => {
      this.db.prepare('DELETE FROM legal_rag_documents WHERE id = ?').run(document.documentId);
      insertDocument.run(document.documentId, document.filename, document.indexedAt);
      for (const chunk of document.chunks) {
        insertChunk.run(
          document.documentId,
          chunk.chunkIndex,
          chunk.pageNumber,
          chunk.text,
          encodeEmbedding(chunk.embedding),
          JSON.stringify(Array.from(chunk.termFrequencies)),
          chunk.tokenCount,
        );
      }
    });
    save();
  }

  deleteDocument(documentId: string): void {
    this.db.prepare('DELETE FROM legal_rag_documents WHERE id = ?').run(documentId);
  }

  close(): void {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }
}
