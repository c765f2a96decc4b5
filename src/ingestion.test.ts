/**
 * Ingestion Pipeline Tests
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { defaultDocumentId, IngestionPipeline, SAMPLE_DOCUMENT_ID, toParsedDocument } from './ingestion';
import { ChunkIndexer } from './indexer';
import { EmbeddingGenerator } from './embeddings';
import { InMemorySearchStore } from './memoryStore';
import { hashText } from './utils';

const FAST = { denseTimeoutMs: 1000, denseMaxRetries: 0, sparseTimeoutMs: 1000 };

describe('IngestionPipeline', () => {
  let store: InMemorySearchStore;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    store = new InMemorySearchStore();
    pipeline = new IngestionPipeline(new ChunkIndexer(store, new EmbeddingGenerator(null, null, FAST)));
  });

  it('reports zero work for a document without text', async () => {
    const result = await pipeline.ingestDocuments([toParsedDocument({ filename: 'empty.txt', text: '' })]);
    assert.deepStrictEqual(result, { documentsProcessed: 1, documentsSkipped: 0, chunksCreated: 0, indexed: 0, errors: 0 });
    assert.strictEqual(await store.count(), 0);
  });

  it('skips documents whose extraction failed', async () => {
    const result = await pipeline.ingestDocuments([
      toParsedDocument({ filename: 'broken.pdf', text: 'garbled', extractionSuccess: false }),
      toParsedDocument({ filename: 'ok.txt', text: 'A short readable document.' }),
    ]);
    assert.deepStrictEqual(result, { documentsProcessed: 1, documentsSkipped: 1, chunksCreated: 1, indexed: 1, errors: 0 });
  });

  it('stores sample text under the sample document id', async () => {
    const result = await pipeline.ingestSampleText('Sample text for the pipeline.');

    assert.strictEqual(result.indexed, 1);
    const stored = await store.get(`${SAMPLE_DOCUMENT_ID}_0`);
    assert.ok(stored);
    assert.strictEqual(stored.filename, 'sample.txt');
    assert.strictEqual(stored.text, 'Sample text for the pipeline.');
  });
});

describe('toParsedDocument', () => {
  it('fills defaults from the filename and text', () => {
    assert.deepStrictEqual(toParsedDocument({ filename: 'guide.md', text: 'Body' }), {
      documentId: `doc_${hashText('guide.md')}`,
      filename: 'guide.md',
      text: 'Body',
      sourceUrl: '',
      charCount: 4,
      extractionSuccess: true,
    });
    assert.strictEqual(defaultDocumentId('guide.md'), `doc_${hashText('guide.md')}`);
  });

  it('keeps explicit values', () => {
    const doc = toParsedDocument({ filename: 'a.txt', text: 'Body', documentId: 'custom', sourceUrl: 'https://example.com/a', charCount: 10 });
    assert.strictEqual(doc.documentId, 'custom');
    assert.strictEqual(doc.sourceUrl, 'https://example.com/a');
    assert.strictEqual(doc.charCount, 10);
  });
});
