/**
 * Utility Function Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  cosineSimilarity,
  hashText,
  l2Norm,
  l2Normalize,
  sanitizeText,
  TimeoutError,
  tokenize,
  withTimeout,
} from './utils';

describe('sanitizeText', () => {
  it('removes control characters and trims', () => {
    assert.strictEqual(sanitizeText('  hello\x00 world\x07  '), 'hello world');
  });

  it('truncates to max length', () => {
    assert.strictEqual(sanitizeText('abcdef', 3), 'abc');
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    assert.ok(Math.abs(cosineSimilarity([1, 2, 3, 4, 5], [2, 4, 6, 8, 10]) - 1) < 1e-12);
    assert.strictEqual(cosineSimilarity([1, 0], [0, 1]), 0);
  });

  it('returns 0 for mismatched or empty vectors', () => {
    assert.strictEqual(cosineSimilarity([1, 2], [1, 2, 3]), 0);
    assert.strictEqual(cosineSimilarity([], []), 0);
    assert.strictEqual(cosineSimilarity([0, 0], [1, 1]), 0);
  });
});

describe('l2Normalize', () => {
  it('scales to unit length', () => {
    assert.deepStrictEqual(l2Normalize([3, 4]), [0.6, 0.8]);
    const v = l2Normalize([1, 2, 3, 4, 5, 6, 7]);
    assert.ok(v);
    assert.ok(Math.abs(l2Norm(v) - 1) < 1e-12);
  });

  it('returns null for zero or non-finite vectors', () => {
    assert.strictEqual(l2Normalize([0, 0, 0]), null);
    assert.strictEqual(l2Normalize([Infinity, 1]), null);
  });
});

describe('tokenize', () => {
  it('lowercases and splits on non-word characters', () => {
    assert.deepStrictEqual(tokenize('Hybrid-Search, v2: RRF!'), ['hybrid', 'search', 'v2', 'rrf']);
    assert.deepStrictEqual(tokenize('Über café'), ['über', 'café']);
    assert.deepStrictEqual(tokenize(' ?! '), []);
  });
});

describe('hashText', () => {
  it('is stable and 16 hex characters', () => {
    assert.strictEqual(hashText('file.txt'), hashText('file.txt'));
    assert.notStrictEqual(hashText('file.txt'), hashText('other.txt'));
    assert.match(hashText('file.txt'), /^[0-9a-f]{16}$/);
  });
});

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    assert.strictEqual(await withTimeout(Promise.resolve(42), 100), 42);
  });

  it('rejects with TimeoutError when the promise takes too long', async () => {
    await assert.rejects(withTimeout(new Promise(() => {}), 10, 'Slow call'), (err: unknown) => {
      assert.ok(err instanceof TimeoutError);
      assert.strictEqual(err.message, 'Slow call timed out after 10ms');
      return true;
    });
  });
});
