/**
 * Request Schema Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { IngestRequestSchema, QueryRequestSchema } from './schemas';
import { formatFieldPath, formatZodError } from './middleware/validation';

describe('QueryRequestSchema', () => {
  it('applies defaults for top_k and search_mode', () => {
    assert.deepStrictEqual(QueryRequestSchema.parse({ question: 'What is hybrid search?' }), {
      question: 'What is hybrid search?',
      top_k: 5,
      search_mode: 'full_hybrid',
    });
  });

  it('accepts every search mode', () => {
    for (const mode of ['lexical_only', 'dense_only', 'sparse_only', 'dense_lexical', 'full_hybrid']) {
      assert.ok(QueryRequestSchema.safeParse({ question: 'abc', search_mode: mode }).success, mode);
    }
  });

  it('rejects an unknown search mode', () => {
    const result = QueryRequestSchema.safeParse({ question: 'abc', search_mode: 'semantic' });
    assert.strictEqual(result.success, false);
    if (result.success) return;
    assert.deepStrictEqual(result.error.issues.map(i => i.path), [['search_mode']]);
  });

  it('enforces question length and top_k bounds', () => {
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'ab' }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'x'.repeat(1001) }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: '     ' }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'abc', top_k: 0 }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'abc', top_k: 21 }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'abc', top_k: 2.5 }).success, false);
    assert.strictEqual(QueryRequestSchema.safeParse({ question: 'abc', top_k: 20 }).success, true);
  });
});

describe('IngestRequestSchema', () => {
  it('accepts sample ingestion with optional text', () => {
    assert.deepStrictEqual(IngestRequestSchema.parse({ source: 'sample' }), { source: 'sample' });
  });

  it('accepts a document batch', () => {
    const body = { source: 'documents', documents: [{ filename: 'a.txt', text: 'Alpha', extraction_success: true }] };
    assert.deepStrictEqual(IngestRequestSchema.parse(body), body);
  });

  it('rejects unknown sources and empty batches', () => {
    assert.strictEqual(IngestRequestSchema.safeParse({ source: 'google_drive' }).success, false);
    assert.strictEqual(IngestRequestSchema.safeParse({ source: 'documents', documents: [] }).success, false);
  });
});

describe('formatZodError', () => {
  it('reports field paths for nested issues', () => {
    const result = IngestRequestSchema.safeParse({ source: 'documents', documents: [{ text: 'no name' }] });
    assert.strictEqual(result.success, false);
    if (result.success) return;

    const error = formatZodError(result.error);
    assert.strictEqual(error.code, 'VALIDATION_ERROR');
    assert.deepStrictEqual(error.details.map(d => d.field), ['documents[0].filename']);
  });

  it('formats root and nested paths', () => {
    assert.strictEqual(formatFieldPath([]), '(root)');
    assert.strictEqual(formatFieldPath(['documents', 2, 'text']), 'documents[2].text');
  });
});
