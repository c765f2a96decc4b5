/**
 * Retrieval result caching.
 *
 * `TTLCache` is a process-local map with per-entry expiry and a bounded size;
 * `CachedRetriever` puts it in front of a `Retriever`.
 */

import { RetrievalResponse, Retriever, SearchMode } from './types';
import { logInfo } from './utils';

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  /** Percentage, 0-100 */
  hitRate: number;
  evictions: number;
  ttlMs: number;
}

interface Slot<T> {
  value: T;
  expiresAt: number;
  reads: number;
  lastReadAt: number;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 200;
const SWEEP_INTERVAL_MS = 60 * 1000;
/** Share of capacity freed when a full cache takes a new key */
const EVICTION_SHARE = 0.1;
const READS_WEIGHT = 0.6;
const FRESHNESS_WEIGHT = 0.4;

/**
 * Map with per-entry expiry. When full, expired slots go first, then the
 * slots ranked lowest by read count and time since last read. Map order is
 * kept as least to most recently used, so ties drop the stalest slot.
 */
export class TTLCache<T> {
  private readonly slots = new Map<string, Slot<T>>();
  private sweeper: NodeJS.Timeout | null;
  private counters = { hits: 0, misses: 0, evictions: 0 };

  constructor(
    private readonly name: string,
    readonly ttlMs: number = DEFAULT_TTL_MS,
    private readonly maxSize: number = DEFAULT_MAX_ENTRIES,
    private readonly now: () => number = Date.now
  ) {
    this.sweeper = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  get(key: string): T | undefined {
    const slot = this.slots.get(key);
    const at = this.now();
    if (slot === undefined || at >= slot.expiresAt) {
      if (slot) this.slots.delete(key);
      this.counters.misses++;
      return undefined;
    }

    this.touch(key, slot, at);
    this.counters.hits++;
    return slot.value;
  }

  set(key: string, value: T): void {
    const at = this.now();
    const slot = this.slots.get(key);
    if (slot) {
      slot.value = value;
      slot.expiresAt = at + this.ttlMs;
      this.touch(key, slot, at);
      return;
    }

    if (this.slots.size >= this.maxSize) this.makeRoom(at);
    this.slots.set(key, { value, expiresAt: at + this.ttlMs, reads: 1, lastReadAt: at });
  }

  /** Count a hit served without a stored entry (a joined in-flight load) */
  recordHit(): void {
    this.counters.hits++;
  }

  clear(): void {
    this.slots.clear();
    this.counters = { hits: 0, misses: 0, evictions: 0 };
  }

  getStats(): CacheStats {
    const { hits, misses, evictions } = this.counters;
    const lookups = hits + misses;
    return {
      size: this.slots.size,
      hits,
      misses,
      hitRate: lookups === 0 ? 0 : Math.round((hits / lookups) * 100),
      evictions,
      ttlMs: this.ttlMs,
    };
  }

  stop(): void {
    if (this.sweeper === null) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }

  /** Re-insert so the key moves to the most recently used end */
  private touch(key: string, slot: Slot<T>, at: number): void {
    slot.reads++;
    slot.lastReadAt = at;
    this.slots.delete(key);
    this.slots.set(key, slot);
  }

  private sweep(): void {
    const dropped = this.dropExpired(this.now());
    if (dropped > 0) logInfo(`Cache ${this.name} swept`, { dropped, remaining: this.slots.size });
  }

  private dropExpired(at: number): number {
    const stale = [...this.slots].filter(([, slot]) => at >= slot.expiresAt).map(([key]) => key);
    stale.forEach(key => this.slots.delete(key));
    return stale.length;
  }

  private makeRoom(at: number): void {
    const wanted = Math.max(1, Math.ceil(this.maxSize * EVICTION_SHARE));
    const expired = this.dropExpired(at);
    this.counters.evictions += expired;
    if (expired >= wanted) return;

    const retention = (slot: Slot<T>): number => {
      const idle = at - slot.lastReadAt;
      const freshness = idle >= this.ttlMs ? 0 : 1 - idle / this.ttlMs;
      return Math.log2(slot.reads + 1) * READS_WEIGHT + freshness * FRESHNESS_WEIGHT;
    };
    // Array.prototype.sort is stable, so equal scores keep map order
    const victims = [...this.slots]
      .map(([key, slot]) => ({ key, score: retention(slot) }))
      .sort((a, b) => a.score - b.score)
      .slice(0, wanted - expired);
    for (const { key } of victims) {
      this.slots.delete(key);
      this.counters.evictions++;
    }
  }
}

export interface CachedRetrieverOptions {
  ttlMs: number;
  maxSize: number;
}

/** Exact (query, mode, topK) triple; no case or whitespace folding */
export function makeRetrievalCacheKey(query: string, mode: SearchMode, topK: number): string {
  return JSON.stringify([query, mode, topK]);
}

/**
 * Retriever decorator that memoizes complete responses.
 * Errors and degraded responses (some signal failed) pass through uncached.
 */
export class CachedRetriever implements Retriever {
  private readonly cache: TTLCache<RetrievalResponse>;
  private readonly inFlight = new Map<string, Promise<RetrievalResponse>>();
  /** Bumped by clear(); loads started before a clear never write back */
  private generation = 0;

  constructor(
    private readonly retriever: Retriever,
    options: Partial<CachedRetrieverOptions> = {},
    now?: () => number
  ) {
    this.cache = new TTLCache<RetrievalResponse>(
      'retrieval_results',
      options.ttlMs ?? DEFAULT_TTL_MS,
      options.maxSize ?? DEFAULT_MAX_ENTRIES,
      now
    );
  }

  retrieve(query: string, topK: number, mode: SearchMode): Promise<RetrievalResponse> {
    const key = makeRetrievalCacheKey(query, mode, topK);

    const pending = this.inFlight.get(key);
    if (pending) {
      this.cache.recordHit();
      return pending;
    }

    const cached = this.cache.get(key);
    if (cached) return Promise.resolve(cached);

    const generation = this.generation;
    const load = this.retriever.retrieve(query, topK, mode).then(response => {
      if (response.failedSignals.length === 0 && generation === this.generation) {
        this.cache.set(key, response);
      }
      return response;
    });
    const tracked = load.finally(() => {
      if (this.inFlight.get(key) === tracked) this.inFlight.delete(key);
    });
    this.inFlight.set(key, tracked);
    return tracked;
  }

  clear(): void {
    this.generation++;
    this.inFlight.clear();
    this.cache.clear();
    logInfo('Retrieval cache cleared');
  }

  getStats(): CacheStats {
    return this.cache.getStats();
  }

  stop(): void {
    this.cache.stop();
  }
}
