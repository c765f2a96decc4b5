/**
 * In-Memory Search Store Tests
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { InMemorySearchStore } from './memoryStore';
import { ChunkDocument } from './types';

function doc(documentId: string, chunkId: number, text: string, extra: Partial<ChunkDocument> = {}): ChunkDocument {
  return {
    text,
    content: text,
    chunkId,
    documentId,
    filename: `${documentId}.txt`,
    sourceUrl: '',
    tokenCount: Math.ceil(text.length / 4),
    charCount: text.length,
    indexedAt: '2024-01-01T00:00:00.000Z',
    ...extra,
  };
}

describe('InMemorySearchStore', () => {
  let store: InMemorySearchStore;

  beforeEach(() => {
    store = new InMemorySearchStore();
  });

  it('creates the index once', async () => {
    assert.strictEqual(await store.ensureIndex(), 'created');
    assert.strictEqual(await store.ensureIndex(), 'exists');
  });

  it('inserts then overwrites under the same key', async () => {
    assert.strictEqual(await store.upsert('d_0', doc('d', 0, 'first version')), 'created');
    assert.strictEqual(await store.upsert('d_0', doc('d', 0, 'second version')), 'updated');

    assert.strictEqual(await store.count(), 1);
    assert.strictEqual((await store.get('d_0'))?.text, 'second version');
  });

  it('returns null for unknown keys and isolates stored copies', async () => {
    const original = doc('d', 0, 'stored text');
    await store.upsert('d_0', original);
    original.text = 'mutated';

    assert.strictEqual(await store.get('missing'), null);
    assert.strictEqual((await store.get('d_0'))?.text, 'stored text');
  });

  it('ranks lexical matches by BM25 and skips non-matching documents', async () => {
    await store.upsert('a_0', doc('a', 0, 'elasticsearch stores documents'));
    await store.upsert('b_0', doc('b', 0, 'elasticsearch elasticsearch ranking'));
    await store.upsert('c_0', doc('c', 0, 'unrelated cooking recipe'));

    const hits = await store.searchLexical('Elasticsearch ranking', 10);

    assert.deepStrictEqual(hits.map(h => h.id), ['b_0', 'a_0']);
    assert.ok(hits[0].score > hits[1].score);
    assert.strictEqual(hits[0].source.text, 'elasticsearch elasticsearch ranking');
  });

  it('limits results to the requested size', async () => {
    for (let i = 0; i < 5; i++) await store.upsert(`d_${i}`, doc('d', i, `shared term ${i}`));
    assert.strictEqual((await store.searchLexical('shared', 3)).length, 3);
  });

  it('orders dense hits by similarity and leaves vectors out of the source', async () => {
    await store.upsert('x_0', doc('x', 0, 'x', { denseEmbedding: [1, 0], denseModel: 'm' }));
    await store.upsert('y_0', doc('y', 0, 'y', { denseEmbedding: [0.6, 0.8], denseModel: 'm' }));
    await store.upsert('z_0', doc('z', 0, 'z'));

    const hits = await store.searchDense([0, 1], 10);

    assert.deepStrictEqual(hits.map(h => h.id), ['y_0', 'x_0']);
    assert.ok(Math.abs(hits[0].score - 0.8) < 1e-12);
    assert.strictEqual('denseEmbedding' in hits[0].source, false);
  });

  it('scores sparse hits by weighted term overlap', async () => {
    await store.upsert('p_0', doc('p', 0, 'p', { sparseEmbedding: { search: 2, engine: 1 } }));
    await store.upsert('q_0', doc('q', 0, 'q', { sparseEmbedding: { search: 0.5 } }));
    await store.upsert('r_0', doc('r', 0, 'r', { sparseEmbedding: { cooking: 3 } }));

    const hits = await store.searchSparse({ search: 1, engine: 2 }, 10);

    assert.deepStrictEqual(hits.map(h => [h.id, h.score]), [['p_0', 4], ['q_0', 0.5]]);
  });

  it('returns no hits from an empty store or an empty query', async () => {
    assert.deepStrictEqual(await store.searchLexical('anything', 5), []);
    assert.deepStrictEqual(await store.searchDense([1, 0], 5), []);
    assert.deepStrictEqual(await store.searchSparse({}, 5), []);
    await store.upsert('d_0', doc('d', 0, 'text'));
    assert.deepStrictEqual(await store.searchLexical('  ?! ', 5), []);
  });

  it('reports healthy', async () => {
    assert.deepStrictEqual(await store.healthCheck(), { status: 'green' });
  });
});
