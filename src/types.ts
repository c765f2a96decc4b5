/**
 * Hybrid RAG API - Shared Types
 */

// ============================================
// Documents & Chunks
// ============================================

/** Output of the text extraction collaborator */
export interface ParsedDocument {
  documentId: string;
  filename: string;
  text: string;
  sourceUrl: string;
  charCount: number;
  extractionSuccess: boolean;
}

/** A bounded segment of a document, the unit of indexing and retrieval */
export interface Chunk {
  chunkId: number;
  documentId: string;
  filename: string;
  sourceUrl: string;
  text: string;
  tokenCount: number;
  charCount: number;
}

/** Chunk document as persisted in the search store */
export interface ChunkDocument {
  text: string;
  /** Same value as `text`, kept for lexical-search compatibility */
  content: string;
  chunkId: number;
  documentId: string;
  filename: string;
  sourceUrl: string;
  tokenCount: number;
  charCount: number;
  denseEmbedding?: number[];
  denseModel?: string;
  sparseEmbedding?: SparseVector;
  sparseModel?: string;
  indexedAt: string;
}

/** Composite store key for a chunk */
export function makeChunkKey(documentId: string, chunkId: number): string {
  return `${documentId}_${chunkId}`;
}

// ============================================
// Embeddings
// ============================================

export type DenseVector = number[];
export type SparseVector = Record<string, number>;

export type AbsentReason = 'model_unavailable' | 'inference_failed';

/** Best-effort embedding: callers must handle the absent case */
export type EmbeddingResult<T> =
  | { kind: 'present'; value: T }
  | { kind: 'absent'; reason: AbsentReason };

export function present<T>(value: T): EmbeddingResult<T> {
  return { kind: 'present', value };
}

export function absent<T>(reason: AbsentReason): EmbeddingResult<T> {
  return { kind: 'absent', reason };
}

// ============================================
// Retrieval
// ============================================

export const SEARCH_MODES = ['lexical_only', 'dense_only', 'sparse_only', 'dense_lexical', 'full_hybrid'] as const;
export type SearchMode = typeof SEARCH_MODES[number];

export function isSearchMode(value: unknown): value is SearchMode {
  return typeof value === 'string' && (SEARCH_MODES as readonly string[]).includes(value);
}

export type Signal = 'lexical' | 'dense' | 'sparse';

/** One ranked result handed to answer generation and citation display */
export interface RetrievedChunk {
  id: string;
  chunkId: number;
  documentId: string;
  content: string;
  filename: string;
  sourceUrl: string;
  score: number;
  signals: Signal[];
  /** 1-based rank within each contributing signal */
  signalRanks: Partial<Record<Signal, number>>;
  signalScores: Partial<Record<Signal, number>>;
}

export interface RetrievalResponse {
  mode: SearchMode;
  results: RetrievedChunk[];
  signalsQueried: Signal[];
  failedSignals: Signal[];
  elapsedMs: number;
}

export interface Retriever {
  retrieve(query: string, topK: number, mode: SearchMode): Promise<RetrievalResponse>;
}

// ============================================
// Indexing & Ingestion
// ============================================

export interface IndexingResult {
  indexed: number;
  errors: number;
}

export interface IngestionResult extends IndexingResult {
  documentsProcessed: number;
  documentsSkipped: number;
  chunksCreated: number;
}
