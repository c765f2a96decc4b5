/**
 * Hybrid RAG API - Hybrid Retrieval
 *
 * Runs the signals a search mode asks for against the store and merges them:
 * single-signal modes keep the store's native ordering and score, fused modes
 * combine per-signal lists with reciprocal rank fusion.
 *
 * Signals fail independently. Survivors still produce results; only a query
 * where every signal failed is an error.
 */

import { RetrievalResponse, RetrievedChunk, Retriever, SearchMode, Signal, isSearchMode } from "./types";
import { EmbeddingGenerator } from "./embeddings";
import { SearchStore, StoreHit } from "./searchStore";
import { DEFAULT_RRF_K, FusedResult, RankedList, reciprocalRankFusion } from "./rankFusion";
import { Errors, RetrievalFailedError } from "./errors";
import { errorMessage, logInfo, logWarn, sanitizeForLogging, withTimeout } from "./utils";

export interface HybridRetrieverOptions {
  rrfK: number;
  /** Per-signal depth floor for fused modes */
  minCandidatesPerSignal: number;
  signalTimeoutMs: number;
}

const DEFAULT_OPTIONS: HybridRetrieverOptions = {
  rrfK: DEFAULT_RRF_K,
  minCandidatesPerSignal: 20,
  signalTimeoutMs: 10000,
};

export const SIGNALS_BY_MODE: Record<SearchMode, Signal[]> = {
  lexical_only: ['lexical'],
  dense_only: ['dense'],
  sparse_only: ['sparse'],
  dense_lexical: ['lexical', 'dense'],
  full_hybrid: ['lexical', 'dense', 'sparse'],
};

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

function isFusedMode(mode: SearchMode): boolean {
  switch (mode) {
    case 'lexical_only':
    case 'dense_only':
    case 'sparse_only':
      return false;
    case 'dense_lexical':
    case 'full_hybrid':
      return true;
    default:
      return assertNever(mode);
  }
}

/** Results are only handed out with their text, never their vectors */
function toRetrievedChunk(
  hit: StoreHit,
  score: number,
  signals: Signal[],
  signalRanks: Partial<Record<Signal, number>>,
  signalScores: Partial<Record<Signal, number>>
): RetrievedChunk {
  const { source } = hit;
  return {
    id: hit.id,
    chunkId: source.chunkId,
    documentId: source.documentId,
    content: source.content || source.text,
    filename: source.filename,
    sourceUrl: source.sourceUrl,
    score,
    signals,
    signalRanks,
    signalScores,
  };
}

function fromFused(result: FusedResult<StoreHit>): RetrievedChunk {
  return toRetrievedChunk(result.item, result.score, result.signals, result.signalRanks, result.signalScores);
}

export class HybridRetriever implements Retriever {
  private readonly options: HybridRetrieverOptions;

  constructor(
    private readonly store: SearchStore,
    private readonly embeddings: EmbeddingGenerator,
    options: Partial<HybridRetrieverOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async retrieve(query: string, topK: number, mode: SearchMode): Promise<RetrievalResponse> {
    // Callers outside the HTTP layer are not schema-validated
    if (!isSearchMode(mode)) {
      throw Errors.badRequest(`Unknown search mode: ${String(mode)}`, { searchMode: mode });
    }
    if (typeof query !== 'string' || query.trim().length === 0) {
      throw Errors.badRequest('Query must not be empty');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw Errors.badRequest('topK must be a positive integer', { topK });
    }

    const startTime = Date.now();
    const signals = SIGNALS_BY_MODE[mode];
    const fused = isFusedMode(mode);
    const depth = fused ? Math.max(topK, this.options.minCandidatesPerSignal) : topK;

    const settled = await Promise.allSettled(
      signals.map(signal =>
        withTimeout(this.runSignal(signal, query, depth), this.options.signalTimeoutMs, `${signal} search`)
      )
    );

    const lists: RankedList<StoreHit>[] = [];
    const failedSignals: Signal[] = [];
    const causes: Partial<Record<Signal, string>> = {};
    settled.forEach((outcome, i) => {
      const signal = signals[i];
      if (outcome.status === 'fulfilled') {
        lists.push({ signal, items: outcome.value.map(hit => ({ id: hit.id, score: hit.score, item: hit })) });
      } else {
        failedSignals.push(signal);
        causes[signal] = errorMessage(outcome.reason);
      }
    });

    if (lists.length === 0) {
      logWarn('All retrieval signals failed', { mode, causes });
      throw new RetrievalFailedError(failedSignals, causes);
    }
    if (failedSignals.length > 0) {
      logWarn('Retrieval degraded', { mode, failedSignals, causes });
    }

    const results = fused
      ? reciprocalRankFusion(lists, this.options.rrfK).slice(0, topK).map(fromFused)
      : this.nativeOrder(lists[0], topK);

    const elapsedMs = Date.now() - startTime;
    logInfo('Retrieval complete', {
      query: sanitizeForLogging(query),
      mode,
      topK,
      depth,
      results: results.length,
      failedSignals,
      elapsedMs,
    });

    return { mode, results, signalsQueried: signals, failedSignals, elapsedMs };
  }

  private nativeOrder(list: RankedList<StoreHit>, topK: number): RetrievedChunk[] {
    return list.items.slice(0, topK).map(({ item, score }, index) =>
      toRetrievedChunk(item, score, [list.signal], { [list.signal]: index + 1 }, { [list.signal]: score })
    );
  }

  private async runSignal(signal: Signal, query: string, size: number): Promise<StoreHit[]> {
    switch (signal) {
      case 'lexical':
        return this.store.searchLexical(query, size);
      case 'dense': {
        const embedding = await this.embeddings.embedQueryDense(query);
        if (embedding.kind === 'absent') throw new Error(`Query embedding unavailable: ${embedding.reason}`);
        return this.store.searchDense(embedding.value, size);
      }
      case 'sparse': {
        const expansion = await this.embeddings.embedQuerySparse(query);
        if (expansion.kind === 'absent') throw new Error(`Query expansion unavailable: ${expansion.reason}`);
        return this.store.searchSparse(expansion.value, size);
      }
      default:
        return assertNever(signal);
    }
  }
}
