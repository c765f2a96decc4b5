/**
 * Elasticsearch Request Builder Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { estypes } from '@elastic/elasticsearch';
import {
  buildDenseSearch,
  buildIndexMappings,
  buildLexicalSearch,
  buildSparseSearch,
  mapSearchHits,
} from './elasticQueries';
import { normalizeHealthStatus } from './elasticStore';
import { ChunkSource } from './searchStore';

const SOURCE: ChunkSource = {
  text: 'chunk text',
  content: 'chunk text',
  chunkId: 0,
  documentId: 'doc',
  filename: 'doc.txt',
  sourceUrl: '',
  tokenCount: 3,
  charCount: 10,
  indexedAt: '2024-01-01T00:00:00.000Z',
};

describe('buildIndexMappings', () => {
  it('declares dense and sparse vector fields', () => {
    const mappings = buildIndexMappings(768);

    assert.strictEqual(mappings.dynamic, 'strict');
    assert.deepStrictEqual(mappings.properties?.denseEmbedding, {
      type: 'dense_vector', dims: 768, index: true, similarity: 'dot_product',
    });
    assert.deepStrictEqual(mappings.properties?.sparseEmbedding, { type: 'sparse_vector' });
    assert.deepStrictEqual(mappings.properties?.content, { type: 'text' });
    assert.deepStrictEqual(mappings.properties?.documentId, { type: 'keyword' });
  });
});

describe('search request builders', () => {
  it('matches lexical queries against text and leaves vectors out', () => {
    assert.deepStrictEqual(buildLexicalSearch('rag', 'rank fusion', 20), {
      index: 'rag',
      size: 20,
      query: { match: { text: { query: 'rank fusion' } } },
      _source: { excludes: ['denseEmbedding', 'sparseEmbedding'] },
    });
  });

  it('sizes the kNN candidate pool from the requested hits', () => {
    assert.deepStrictEqual(buildDenseSearch('rag', [0.6, 0.8], 5).knn, {
      field: 'denseEmbedding', query_vector: [0.6, 0.8], k: 5, num_candidates: 100,
    });
    assert.deepStrictEqual(buildDenseSearch('rag', [1], 20).knn, {
      field: 'denseEmbedding', query_vector: [1], k: 20, num_candidates: 200,
    });
    assert.deepStrictEqual(buildDenseSearch('rag', [1], 5000).knn, {
      field: 'denseEmbedding', query_vector: [1], k: 5000, num_candidates: 10000,
    });
  });

  it('sends the precomputed query expansion for sparse search', () => {
    assert.deepStrictEqual(buildSparseSearch('rag', { rank: 1.2, fusion: 0.4 }, 20).query, {
      sparse_vector: { field: 'sparseEmbedding', query_vector: { rank: 1.2, fusion: 0.4 } },
    });
  });
});

describe('mapSearchHits', () => {
  it('keeps response order and drops hits without a source', () => {
    const response: estypes.SearchResponse<ChunkSource> = {
      took: 1,
      timed_out: false,
      _shards: { total: 1, successful: 1, failed: 0 },
      hits: {
        hits: [
          { _index: 'rag', _id: 'doc_0', _score: 2.5, _source: SOURCE },
          { _index: 'rag', _id: 'doc_1', _score: 1.5 },
          { _index: 'rag', _id: 'doc_2', _score: null, _source: { ...SOURCE, chunkId: 2 } },
        ],
      },
    };

    assert.deepStrictEqual(mapSearchHits(response), [
      { id: 'doc_0', score: 2.5, source: SOURCE },
      { id: 'doc_2', score: 0, source: { ...SOURCE, chunkId: 2 } },
    ]);
  });
});

describe('normalizeHealthStatus', () => {
  it('maps cluster colors and treats anything else as unavailable', () => {
    assert.strictEqual(normalizeHealthStatus('green'), 'green');
    assert.strictEqual(normalizeHealthStatus('YELLOW'), 'yellow');
    assert.strictEqual(normalizeHealthStatus('red'), 'red');
    assert.strictEqual(normalizeHealthStatus('unknown'), 'unavailable');
  });
});
