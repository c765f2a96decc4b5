/**
 * Hybrid RAG API - Embedding Generation
 *
 * Produces the two learned representations of a chunk:
 * - dense: fixed-length vector from a Gemini embedding model, L2-normalized
 *   so cosine similarity equals the dot product at query time
 * - sparse: term -> weight expansion from an ELSER model hosted in
 *   Elasticsearch, requested once per batch
 *
 * Both are best-effort. Failures resolve to an absent embedding and are
 * logged; nothing here throws into the indexing batch.
 */

import type { GoogleGenAI } from "@google/genai";
import type { Client } from "@elastic/elasticsearch";
import { DenseVector, EmbeddingResult, SparseVector, absent, present } from "./types";
import { errorMessage, l2Normalize, logInfo, logWarn, withTimeout } from "./utils";

// =============================================================================
// Model Interfaces
// =============================================================================

export interface DenseModel {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

export interface SparseModel {
  readonly name: string;
  /** One request for the whole batch; results in input order */
  expand(texts: string[]): Promise<SparseVector[]>;
}

// =============================================================================
// Gemini Dense Model
// =============================================================================

export class GeminiDenseModel implements DenseModel {
  constructor(
    private readonly client: GoogleGenAI,
    readonly name: string,
    readonly dimensions: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    const result = await this.client.models.embedContent({
      model: this.name,
      contents: texts,
      config: { outputDimensionality: this.dimensions },
    });
    const vectors = (result.embeddings ?? []).map(e => e.values ?? []);
    if (vectors.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    return vectors;
  }
}

// =============================================================================
// ELSER Sparse Model
// =============================================================================

/** Keep positive finite weights of an inference result; throws on any other shape */
export function parseTokenWeights(value: unknown): SparseVector {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('Expansion result is not a token-weight map');
  }
  const weights: SparseVector = {};
  for (const [token, weight] of Object.entries(value)) {
    if (typeof weight === 'number' && Number.isFinite(weight) && weight > 0) {
      weights[token] = weight;
    }
  }
  return weights;
}

export class ElserSparseModel implements SparseModel {
  constructor(
    private readonly client: Client,
    readonly name: string,
    private readonly inputField: string,
    private readonly timeoutMs: number
  ) {}

  async expand(texts: string[]): Promise<SparseVector[]> {
    const response = await this.client.ml.inferTrainedModel({
      model_id: this.name,
      docs: texts.map(text => ({ [this.inputField]: text })),
      timeout: `${this.timeoutMs}ms`,
    });
    return response.inference_results.map(r => parseTokenWeights(r.predicted_value));
  }
}

// =============================================================================
// Retry
// =============================================================================

async function withRetry<T>(fn: () => Promise<T>, maxRetries: number, baseDelayMs = 500): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const msg = errorMessage(err);
      if (msg.includes('INVALID_ARGUMENT') || msg.includes('PERMISSION_DENIED')) throw err;

      if (attempt < maxRetries) {
        const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
        logWarn('Embedding API retry', { attempt: attempt + 1, delayMs: Math.round(delay) });
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }
  throw lastError;
}

// =============================================================================
// Embedding Generator
// =============================================================================

export interface EmbeddingGeneratorOptions {
  denseTimeoutMs: number;
  denseMaxRetries: number;
  sparseTimeoutMs: number;
}

/** A batch item paired with its sparse expansion */
export interface SparsePair<T> {
  item: T;
  sparse: EmbeddingResult<SparseVector>;
}

const DEFAULT_OPTIONS: EmbeddingGeneratorOptions = {
  denseTimeoutMs: 15000,
  denseMaxRetries: 2,
  sparseTimeoutMs: 30000,
};

export class EmbeddingGenerator {
  private readonly options: EmbeddingGeneratorOptions;

  /** Pass null for a model that failed to initialize */
  constructor(
    private readonly dense: DenseModel | null,
    private readonly sparse: SparseModel | null,
    options: Partial<EmbeddingGeneratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    logInfo('Embedding generator ready', {
      denseModel: dense?.name ?? null,
      sparseModel: sparse?.name ?? null,
    });
  }

  get denseModelName(): string | undefined { return this.dense?.name; }
  get sparseModelName(): string | undefined { return this.sparse?.name; }

  /** Unit-length dense vector for one text */
  async generateDense(text: string): Promise<EmbeddingResult<DenseVector>> {
    const model = this.dense;
    if (!model) return absent('model_unavailable');

    try {
      const [vector] = await withRetry(
        () => withTimeout(model.embed([text]), this.options.denseTimeoutMs, 'Dense embedding'),
        this.options.denseMaxRetries
      );
      if (!vector || vector.length !== model.dimensions) {
        logWarn('Dense embedding has unexpected dimensionality', {
          model: model.name,
          expected: model.dimensions,
          received: vector?.length ?? 0,
        });
        return absent('inference_failed');
      }
      const normalized = l2Normalize(vector);
      if (!normalized) {
        logWarn('Dense embedding could not be normalized', { model: model.name });
        return absent('inference_failed');
      }
      return present(normalized);
    } catch (err) {
      logWarn('Dense embedding failed', { model: model.name, error: errorMessage(err) });
      return absent('inference_failed');
    }
  }

  /**
   * Sparse expansions for a batch in a single model request.
   * Every item gets an entry; a failed or misaligned batch leaves all absent.
   */
  async generateSparseBatch<T extends { text: string }>(items: readonly T[]): Promise<SparsePair<T>[]> {
    const model = this.sparse;
    if (items.length === 0) return [];
    if (!model) return items.map(item => ({ item, sparse: absent<SparseVector>('model_unavailable') }));

    const startTime = Date.now();
    try {
      const vectors = await withTimeout(
        model.expand(items.map(i => i.text)),
        this.options.sparseTimeoutMs,
        'Sparse expansion'
      );
      if (vectors.length !== items.length) {
        logWarn('Sparse expansion batch misaligned', { model: model.name, expected: items.length, received: vectors.length });
        return items.map(item => ({ item, sparse: absent<SparseVector>('inference_failed') }));
      }
      logInfo('Sparse expansions generated', { model: model.name, count: items.length, elapsedMs: Date.now() - startTime });
      return items.map((item, i) => ({ item, sparse: present(vectors[i]) }));
    } catch (err) {
      logWarn('Sparse expansion batch failed', { model: model.name, batchSize: items.length, error: errorMessage(err) });
      return items.map(item => ({ item, sparse: absent<SparseVector>('inference_failed') }));
    }
  }

  async embedQueryDense(query: string): Promise<EmbeddingResult<DenseVector>> {
    return this.generateDense(query);
  }

  async embedQuerySparse(query: string): Promise<EmbeddingResult<SparseVector>> {
    const [pair] = await this.generateSparseBatch([{ text: query }]);
    return pair ? pair.sparse : absent('inference_failed');
  }
}
