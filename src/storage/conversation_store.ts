/**
 * @fileoverview Conversation state persistence
 *
 * The orchestrator is the only writer. Both stores keep at most
 * `maxTurns` turns per conversation (oldest dropped first) and forget a
 * conversation `ttlMs` after its last update. Reads after a write on the same
 * conversation always see that write.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { Citation, ConversationState, ConversationTurn } from '../types.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// INTERFACE
// ============================================================================

export interface ConversationStore {
  get(conversationId: string): Promise<ConversationState | undefined>;
  /** Append a turn, creating the conversation when it does not exist. */
  appendTurn(conversationId: string, turn: ConversationTurn): Promise<ConversationState>;
  clear(conversationId: string): Promise<boolean>;
  count(): Promise<number>;
  close?(): void;
}

export interface ConversationStoreOptions {
  maxTurns?: number;
  ttlMs?: number;
  now?: () => Date;
}

const DEFAULT_MAX_TURNS = 10;
const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

function cloneState(state: ConversationState): ConversationState {
  return {
    ...state,
    turns: state.turns.map((turn) => ({ ...turn, citations: turn.citations.map((citation) => ({ ...citation })) })),
  };
}

// ============================================================================
// IN-MEMORY
// ============================================================================

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, ConversationState>();
  private readonly maxTurns: number;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: ConversationStoreOptions = {}) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async get(conversationId: string): Promise<ConversationState | undefined> {
    this.removeExpired();
    const state = this.conversations.get(conversationId);
    return state ? cloneState(state) : undefined;
  }

  async appendTurn(conversationId: string, turn: ConversationTurn): Promise<ConversationState> {
    this.removeExpired();
    const timestamp = this.now().toISOString();
    const existing = this.conversations.get(conversationId);
    const turns = [...(existing?.turns ?? []), turn].slice(-this.maxTurns);
    const state: ConversationState = {
      conversationId,
      turns,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.conversations.set(conversationId, state);
    return cloneState(state);
  }

  async clear(conversationId: string): Promise<boolean> {
    return this.conversations.delete(conversationId);
  }

  async count(): Promise<number> {
    this.removeExpired();
    return this.conversations.size;
  }

  private removeExpired(): void {
    const cutoff = this.now().getTime() - this.ttlMs;
    for (const [id, state] of this.conversations) {
      if (Date.parse(state.updatedAt) < cutoff) {
        this.conversations.delete(id);
        logDebug('Conversation expired', { conversationId: id });
      }
    }
  }
}

// ============================================================================
// SQLITE
// ============================================================================

const CitationRowSchema = z.array(
  z.object({
    chunkId: z.string(),
    documentId: z.string(),
    filename: z.string(),
    chunkIndex: z.number().int(),
    pageNumber: z.number().int(),
    excerpt: z.string(),
    relevanceScore: z.number(),
    citationIndex: z.number().int(),
  }),
);

const ConversationRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const TurnRowSchema = z.object({
  query: z.string(),
  answer: z.string(),
  citations: z.string(),
  is_grounded: z.number().int(),
  created_at: z.string(),
});

export interface SqliteConversationStoreOptions extends ConversationStoreOptions {
  /** File path, or ':memory:' */
  path?: string;
  database?: Database.Database;
}

export class SqliteConversationStore implements ConversationStore {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly maxTurns: number;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(options: SqliteConversationStoreOptions = {}) {
    this.ownsDatabase = !options.database;
    this.db = options.database ?? new Database(options.path ?? ':memory:');
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? (() => new Date());
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.pragma('foreign_keys = ON');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS legal_rag_conversations (
        id TEXT PRIMARY KEY,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS legal_rag_turns (
        conversation_id TEXT NOT NULL REFERENCES legal_rag_conversations(id) ON DELETE CASCADE,
        seq INTEGER NOT NULL,
        query TEXT NOT NULL,
        answer TEXT NOT NULL,
        citations TEXT NOT NULL,
        is_grounded INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (conversation_id, seq)
      );

      CREATE INDEX IF NOT EXISTS idx_legal_rag_conversations_updated
        ON legal_rag_conversations(updated_at);
    `);
  }

  async get(conversationId: string): Promise<ConversationState | undefined> {
    this.removeExpired();
    return this.readState(conversationId);
  }

  async appendTurn(conversationId: string, turn: ConversationTurn): Promise<ConversationState> {
    this.removeExpired();
    const timestamp = this.now().toISOString();
    const append = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO legal_rag_conversations (id, created_at, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET updated_at = excluded.updated_at`
        )
        .run(conversationId, timestamp, timestamp);
      const next = this.db
        .prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS seq FROM legal_rag_turns WHERE conversation_id = ?')
        .pluck()
        .get(conversationId);
      this.db
        .prepare(
          `INSERT INTO legal_rag_turns (conversation_id, seq, query, answer, citations, is_grounded, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          conversationId,
          typeof next === 'number' ? next : 1,
          turn.query,
          turn.answer,
          JSON.stringify(turn.citations),
          turn.isGrounded ? 1 : 0,
          turn.createdAt,
        );
      this.db
        .prepare(
          `DELETE FROM legal_rag_turns WHERE conversation_id = ? AND seq NOT IN (
             SELECT seq FROM legal_rag_turns WHERE conversation_id = ? ORDER BY seq DESC LIMIT ?
           )`
        )
        .run(conversationId, conversationId, this.maxTurns);
    });
    append();

    const state = this.readState(conversationId);
    if (!state) {
      throw new Error(`Conversation ${conversationId} missing after write`);
    }
    return state;
  }

  async clear(conversationId: string): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM legal_rag_conversations WHERE id = ?').run(conversationId);
    return result.changes > 0;
  }

  async count(): Promise<number> {
    this.removeExpired();
    const total = this.db.prepare('SELECT COUNT(*) FROM legal_rag_conversations').pluck().get();
    return typeof total === 'number' ? total : 0;
  }

  close(): void {
    if (this.ownsDatabase && this.db.open) {
      this.db.close();
    }
  }

  private readState(conversationId: string): ConversationState | undefined {
    const row = this.db
      .prepare('SELECT id, created_at, updated_at FROM legal_rag_conversations WHERE id = ?')
      .get(conversationId);
    if (row === undefined) return undefined;
    const conversation = ConversationRowSchema.parse(row);

    const turnRows = this.db
      .prepare(
        `SELECT query, answer, citations, is_grounded, created_at
         FROM legal_rag_turns WHERE conversation_id = ? ORDER BY seq ASC`
      )
      .all(conversationId);
    const turns = turnRows.map((raw) => {
      const turn = TurnRowSchema.parse(raw);
      const citations: Citation[] = CitationRowSchema.parse(JSON.parse(turn.citations));
      return {
        query: turn.query,
        answer: turn.answer,
        citations,
        isGrounded: turn.is_grounded === 1,
        createdAt: turn.created_at,
      };
    });

    return {
      conversationId: conversation.id,
      turns,
      createdAt: conversation.created_at,
      updatedAt: conversation.updated_at,
    };
  }

  private removeExpired(): void {
    const cutoff = new Date(this.now().getTime() - this.ttlMs).toISOString();
    const result = this.db.prepare('DELETE FROM legal_rag_conversations WHERE updated_at < ?').run(cutoff);
    if (result.changes > 0) {
      logDebug('Expired conversations removed', { count: result.changes });
    }
  }
}
