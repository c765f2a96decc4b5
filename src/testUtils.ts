/**
 * In-process model stand-ins shared by the test suites.
 */

import { DenseModel, SparseModel } from "./embeddings";
import { LanguageModel } from "./generation";
import { loadConfig, AppConfig } from "./config";
import { SparseVector } from "./types";
import { tokenize } from "./utils";

function bucket(token: string, dimensions: number): number {
  let h = 0;
  for (let i = 0; i < token.length; i++) h = (h * 31 + token.charCodeAt(i)) >>> 0;
  return h % dimensions;
}

/**
 * Bag-of-words vectors (not normalized). With a vocabulary each known token
 * gets its own dimension; otherwise tokens are hashed into `dimensions` buckets.
 */
export class FakeDenseModel implements DenseModel {
  calls: string[][] = [];
  failure: Error | null = null;
  readonly dimensions: number;
  private readonly vocabulary: Map<string, number> | null;

  constructor(dimensionsOrVocabulary: number | string[] = 16, readonly name = 'fake-dense') {
    if (typeof dimensionsOrVocabulary === 'number') {
      this.dimensions = dimensionsOrVocabulary;
      this.vocabulary = null;
    } else {
      this.vocabulary = new Map(dimensionsOrVocabulary.map((token, i) => [token, i]));
      this.dimensions = this.vocabulary.size;
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failure) throw this.failure;
    return texts.map(text => {
      const v = new Array<number>(this.dimensions).fill(0);
      for (const token of tokenize(text)) {
        const index = this.vocabulary ? this.vocabulary.get(token) : bucket(token, this.dimensions);
        if (index !== undefined) v[index] += 1;
      }
      return v;
    });
  }
}

/** Term-count expansion: every token weighted by its frequency */
export class FakeSparseModel implements SparseModel {
  calls: string[][] = [];
  failure: Error | null = null;
  /** Drop this many results from the end of every batch */
  truncate = 0;

  constructor(readonly name = 'fake-sparse') {}

  async expand(texts: string[]): Promise<SparseVector[]> {
    this.calls.push(texts);
    if (this.failure) throw this.failure;
    const vectors = texts.map(text => {
      const weights: SparseVector = {};
      for (const token of tokenize(text)) weights[token] = (weights[token] ?? 0) + 1;
      return weights;
    });
    return vectors.slice(0, vectors.length - this.truncate);
  }
}

export class FakeLanguageModel implements LanguageModel {
  prompts: string[] = [];
  failure: Error | null = null;

  constructor(private readonly reply = 'ANSWER: Test answer.', readonly name = 'fake-chat') {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.failure) throw this.failure;
    return this.reply;
  }
}

/** Memory-backed configuration with fast timeouts and no retries */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    STORE_BACKEND: 'memory',
    EMBEDDING_DIMENSIONS: '16',
    EMBEDDING_MAX_RETRIES: '0',
    EMBEDDING_TIMEOUT_MS: '1000',
    SPARSE_TIMEOUT_MS: '1000',
    RETRIEVAL_SIGNAL_TIMEOUT_MS: '1000',
    ...overrides,
  });
}
