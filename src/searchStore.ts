/** Search Store Abstraction - Unified interface over the document store (Elasticsearch + in-memory) */

import { ChunkDocument, DenseVector, SparseVector } from "./types";

/** Persisted fields returned with a hit (vectors are not read back) */
export type ChunkSource = Omit<ChunkDocument, 'denseEmbedding' | 'sparseEmbedding'>;

export interface StoreHit {
  id: string;
  /** The store's native relevance score */
  score: number;
  source: ChunkSource;
}

export type UpsertResult = 'created' | 'updated' | 'noop';
export type IndexStatus = 'created' | 'exists';

export interface StoreHealth {
  status: 'green' | 'yellow' | 'red' | 'unavailable';
  error?: string;
}

export interface SearchStore {
  getName(): string;
  /** Create the index with its schema if absent; an existing index is left untouched */
  ensureIndex(): Promise<IndexStatus>;
  /** Insert or overwrite the document stored under `id` */
  upsert(id: string, doc: ChunkDocument): Promise<UpsertResult>;
  get(id: string): Promise<ChunkDocument | null>;
  count(): Promise<number>;
  /** All search methods return hits ordered by native score, descending */
  searchLexical(query: string, size: number): Promise<StoreHit[]>;
  searchDense(vector: DenseVector, size: number): Promise<StoreHit[]>;
  searchSparse(vector: SparseVector, size: number): Promise<StoreHit[]>;
  healthCheck(): Promise<StoreHealth>;
}

export function toChunkSource(doc: ChunkDocument): ChunkSource {
  const { denseEmbedding: _dense, sparseEmbedding: _sparse, ...source } = doc;
  return source;
}
