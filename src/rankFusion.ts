/**
 * Hybrid RAG API - Rank Fusion
 *
 * Reciprocal Rank Fusion over the per-signal result lists:
 *   score(d) = Σ 1 / (k + rank_i(d))
 * with 1-based ranks and lists that miss d contributing nothing.
 * Only ranks matter, so lexical, cosine and expansion scores never need
 * to be put on a common scale.
 */

import { Signal } from "./types";

export const DEFAULT_RRF_K = 60;

/** One signal's hits in the order the store returned them */
export interface RankedList<T> {
  signal: Signal;
  items: { id: string; score: number; item: T }[];
}

export interface FusedResult<T> {
  id: string;
  item: T;
  score: number;
  signals: Signal[];
  signalRanks: Partial<Record<Signal, number>>;
  signalScores: Partial<Record<Signal, number>>;
  bestRank: number;
}

/**
 * Fuse ranked lists into one ordering, highest fused score first.
 * Ties break by best single-signal rank, then by id.
 */
export function reciprocalRankFusion<T>(lists: RankedList<T>[], k: number = DEFAULT_RRF_K): FusedResult<T>[] {
  const fused = new Map<string, FusedResult<T>>();

  for (const { signal, items } of lists) {
    items.forEach(({ id, score, item }, index) => {
      const rank = index + 1;
      let entry = fused.get(id);
      if (!entry) {
        entry = { id, item, score: 0, signals: [], signalRanks: {}, signalScores: {}, bestRank: rank };
        fused.set(id, entry);
      }
      // A store may repeat an id within one list; only its first rank counts
      if (entry.signalRanks[signal] !== undefined) return;
      entry.score += 1 / (k + rank);
      entry.signals.push(signal);
      entry.signalRanks[signal] = rank;
      entry.signalScores[signal] = score;
      entry.bestRank = Math.min(entry.bestRank, rank);
    });
  }

  return [...fused.values()].sort(compareFused);
}

function compareFused<T>(a: FusedResult<T>, b: FusedResult<T>): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.bestRank !== b.bestRank) return a.bestRank - b.bestRank;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
