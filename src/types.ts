/**
 * @fileoverview Core types for the legal RAG pipeline
 */

// ============================================================================
// CORPUS TYPES
// ============================================================================

export interface Chunk {
  /** `${documentId}#${chunkIndex}` */
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  filename: string;
  pageNumber: number;
  text: string;
  embedding: Float32Array;
  termFrequencies: ReadonlyMap<string, number>;
  /** Content-token length used for BM25 length normalization */
  tokenCount: number;
}

export interface Document {
  documentId: string;
  filename: string;
  chunks: readonly Chunk[];
  totalChunks: number;
  indexedAt: string;
}

export interface DocumentSummary {
  documentId: string;
  filename: string;
  totalChunks: number;
  indexedAt: string;
}

export interface ChunkInput {
  pageNumber: number;
  text: string;
  /** Precomputed embedding; computed by the embedding model when absent */
  embedding?: Float32Array | readonly number[];
}

export interface DocumentInput {
  documentId: string;
  filename: string;
  chunks: readonly ChunkInput[];
}

export function chunkIdFor(documentId: string, chunkIndex: number): string {
  return `${documentId}#${chunkIndex}`;
}

/** Identity order: documentId ascending, then chunkIndex ascending. */
export function compareChunkIdentity(
  a: Pick<Chunk, 'documentId' | 'chunkIndex'>,
  b: Pick<Chunk, 'documentId' | 'chunkIndex'>
): number {
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  return a.chunkIndex - b.chunkIndex;
}

// ============================================================================
// QUERY TYPES
// ============================================================================

export const ENTITY_TYPES = [
  'concept',
  'statute',
  'article',
  'court',
  'organization',
  'person',
  'date',
  'other',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export interface ExtractedEntity {
  text: string;
  type: EntityType;
}

export type RelationLabel =
  | 'defines'
  | 'is-part-of'
  | 'is-amended-by'
  | 'related-to'
  | 'synonym-of'
  | 'broader-than'
  | 'narrower-than';

export interface ExpansionTerm {
  term: string;
  weight: number;
  distance: number;
  /** Label of the last edge on the winning path */
  relation: RelationLabel;
  sourceEntity: string;
}

export interface ExpandedQuery {
  originalQuery: string;
  entities: ExtractedEntity[];
  expansionTerms: ExpansionTerm[];
  /** Entity text → expansion terms it produced */
  provenance: Record<string, string[]>;
}

// ============================================================================
// RETRIEVAL TYPES
// ============================================================================

export type CandidateSource = 'sparse' | 'dense' | 'both';

export interface RetrievalCandidate {
  chunk: Chunk;
  sparseScore: number;
  denseScore: number;
  normalizedSparse: number;
  normalizedDense: number;
  fusedScore: number;
  source: CandidateSource;
  /** 1-based */
  fusedRank: number;
}

export type RerankSource = 'cross_encoder' | 'fusion_fallback';

export interface RerankedCandidate extends RetrievalCandidate {
  relevanceScore: number;
  /** 1-based */
  rank: number;
  scoredBy: RerankSource;
}

// ============================================================================
// GENERATION TYPES
// ============================================================================

export interface ContextPassage {
  /** 1-based marker the model cites as [n] */
  citationIndex: number;
  candidate: RerankedCandidate;
}

export interface DraftAnswer {
  text: string;
  passages: ContextPassage[];
  citations: ContextPassage[];
  invalidCitations: number[];
  /** 1-based count of generator calls for this answer */
  attempt: number;
  declined: boolean;
}

export type SupportLevel = 'exact' | 'partial' | 'none';

export interface ClaimAssessment {
  text: string;
  citedIndices: number[];
  support: SupportLevel;
  coverage: number;
  reason: string;
}

export type VerdictClassification = 'supported' | 'partially_unsupported' | 'unsupported';

export interface ValidationVerdict {
  classification: VerdictClassification;
  claims: ClaimAssessment[];
  flaggedSpans: string[];
  confidence: number;
}

// ============================================================================
// CONVERSATION TYPES
// ============================================================================

export interface Citation {
  chunkId: string;
  documentId: string;
  filename: string;
  chunkIndex: number;
  pageNumber: number;
  excerpt: string;
  relevanceScore: number;
  citationIndex: number;
}

export interface ConversationTurn {
  query: string;
  answer: string;
  citations: Citation[];
  isGrounded: boolean;
  createdAt: string;
}

export interface ConversationState {
  conversationId: string;
  turns: ConversationTurn[];
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// STAGE REPORTING
// ============================================================================

export type StageName =
  | 'contextualize'
  | 'entity_extraction'
  | 'expansion'
  | 'retrieval'
  | 'reranking'
  | 'generation'
  | 'validation';

export const PIPELINE_STAGES: readonly StageName[] = [
  'contextualize',
  'entity_extraction',
  'expansion',
  'retrieval',
  'reranking',
  'generation',
  'validation',
];

export type StageStatus = 'success' | 'partial' | 'failed' | 'skipped';
export type StageIssueSeverity = 'minor' | 'moderate' | 'significant';

export interface StageIssue {
  message: string;
  severity: StageIssueSeverity;
  remediation?: string;
}

export interface StageResults {
  inputCount: number;
  outputCount: number;
  filteredCount: number;
}

export interface StageReport {
  stage: StageName;
  status: StageStatus;
  results: StageResults;
  issues: StageIssue[];
  durationMs: number;
}

export type StageObserver = (report: StageReport) => void;

// ============================================================================
// ANSWER
// ============================================================================

export type AnswerOutcome = 'accepted' | 'suppressed' | 'insufficient';

export interface AnswerResult {
  answerText: string;
  citations: Citation[];
  conversationId: string;
  isGrounded: boolean;
  outcome: AnswerOutcome;
  verdict?: ValidationVerdict;
  generationCalls: number;
  stages: StageReport[];
  /** Standalone query used for retrieval when a follow-up was rewritten */
  rewrittenQuery?: string;
  /** Set when the turn could not be written to conversation history */
  historyError?: string;
}

export interface AnswerOptions {
  conversationId?: string;
  signal?: AbortSignal;
  onStage?: StageObserver;
}

export interface PipelineStats {
  indexVersion: number;
  documents: number;
  chunks: number;
  conversations: number;
}
