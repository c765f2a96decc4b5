/**
 * Elasticsearch request builders and response mapping.
 *
 * Pure functions so the request shapes can be checked without a cluster.
 */

import type { estypes } from "@elastic/elasticsearch";
import { DenseVector, SparseVector } from "./types";
import { ChunkSource, StoreHit } from "./searchStore";

export const DENSE_FIELD = 'denseEmbedding';
export const SPARSE_FIELD = 'sparseEmbedding';
const VECTOR_FIELDS = [DENSE_FIELD, SPARSE_FIELD];

/** kNN candidate pool: 10x the requested hits, within the engine's 10k limit */
const KNN_CANDIDATE_FACTOR = 10;
const KNN_MIN_CANDIDATES = 100;
const KNN_MAX_CANDIDATES = 10000;

/** Index schema for chunk documents */
export function buildIndexMappings(dimensions: number): estypes.MappingTypeMapping {
  return {
    dynamic: 'strict',
    properties: {
      text: { type: 'text' },
      content: { type: 'text' },
      chunkId: { type: 'integer' },
      documentId: { type: 'keyword' },
      filename: { type: 'keyword' },
      sourceUrl: { type: 'keyword' },
      tokenCount: { type: 'integer' },
      charCount: { type: 'integer' },
      // dot_product requires unit-length vectors, which the embedder guarantees
      [DENSE_FIELD]: { type: 'dense_vector', dims: dimensions, index: true, similarity: 'dot_product' },
      denseModel: { type: 'keyword' },
      [SPARSE_FIELD]: { type: 'sparse_vector' },
      sparseModel: { type: 'keyword' },
      indexedAt: { type: 'date' },
    },
  };
}

export function buildLexicalSearch(index: string, query: string, size: number): estypes.SearchRequest {
  return {
    index,
    size,
    query: { match: { text: { query } } },
    _source: { excludes: VECTOR_FIELDS },
  };
}

export function buildDenseSearch(index: string, vector: DenseVector, size: number): estypes.SearchRequest {
  const numCandidates = Math.min(KNN_MAX_CANDIDATES, Math.max(size * KNN_CANDIDATE_FACTOR, KNN_MIN_CANDIDATES, size));
  return {
    index,
    size,
    knn: { field: DENSE_FIELD, query_vector: vector, k: size, num_candidates: numCandidates },
    _source: { excludes: VECTOR_FIELDS },
  };
}

export function buildSparseSearch(index: string, vector: SparseVector, size: number): estypes.SearchRequest {
  return {
    index,
    size,
    query: { sparse_vector: { field: SPARSE_FIELD, query_vector: vector } },
    _source: { excludes: VECTOR_FIELDS },
  };
}

/** Hits in response order; hits without a source are dropped */
export function mapSearchHits(response: estypes.SearchResponse<ChunkSource>): StoreHit[] {
  const hits: StoreHit[] = [];
  for (const hit of response.hits.hits) {
    if (!hit._source || hit._id === undefined) continue;
    hits.push({ id: hit._id, score: hit._score ?? 0, source: hit._source });
  }
  return hits;
}
