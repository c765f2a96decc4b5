/**
 * Configuration Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('uses development defaults for an empty environment', () => {
    const config = loadConfig({});

    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.store.backend, 'elasticsearch');
    assert.strictEqual(config.store.index, 'rag_documents');
    assert.strictEqual(config.dense.model, 'text-embedding-004');
    assert.strictEqual(config.sparse.modelId, '.elser_model_2');
    assert.deepStrictEqual(config.retrieval, { rrfK: 60, minCandidatesPerSignal: 20, signalTimeoutMs: 10000 });
    assert.deepStrictEqual(config.cache, { ttlMs: 300000, maxSize: 200 });
    assert.strictEqual(config.genai.mode, 'apikey');
  });

  it('reads overrides and falls back on unparseable numbers', () => {
    const config = loadConfig({
      STORE_BACKEND: 'memory',
      RRF_K: '30',
      INDEX_CONCURRENCY: '0',
      EMBEDDING_DIMENSIONS: 'many',
      EMBEDDINGS_ENABLED: 'false',
      GEMINI_API_KEY: 'test-secret',
      ALLOWED_ORIGINS: 'http://a.test,http://b.test',
    });

    assert.strictEqual(config.store.backend, 'memory');
    assert.strictEqual(config.retrieval.rrfK, 30);
    assert.strictEqual(config.indexing.concurrency, 1);
    assert.strictEqual(config.dense.dimensions, 768);
    assert.strictEqual(config.dense.enabled, false);
    assert.strictEqual(config.genai.apiKey, 'test-secret');
    assert.deepStrictEqual(config.allowedOrigins, ['http://a.test', 'http://b.test']);
  });
});
