import type { CacheStats } from '@cadence/shared';
import { isAbortError } from '../errors';

// ---------------------------------------------------------------------------
// StreamCache
//
// Process-wide store of resolved stream sources, keyed by TrackDescriptor.id
// and shared by every guild session. Two bounds apply:
//
//   capacity  When the summed sizeBytes exceeds capacityBytes, entries are
//             evicted least-recently-accessed first (ties: oldest insertedAt,
//             then insertion order) until the total fits again.
//   TTL       An entry older than ttlMs (by insertedAt) is dead. Dead entries
//             are dropped lazily when looked up and by a periodic sweep.
//
// getOrFetch() is single-flight per key: while one fetch for a key is in
// progress, every other caller for that key awaits the same promise instead
// of starting a second resolve. That in-flight map is the only per-key
// critical section; plain get() never waits on anything.
// ---------------------------------------------------------------------------

export interface CacheEntry<T> {
  readonly key: string;
  readonly payloadRef: T;
  readonly insertedAt: number;
  lastAccessedAt: number;
  readonly sizeBytes: number;
}

export interface FetchResult<T> {
  payload: T;
  sizeBytes: number;
}

export type CacheFetcher<T> = (signal?: AbortSignal) => Promise<FetchResult<T>>;

export interface StreamCacheOptions {
  capacityBytes: number;
  ttlMs: number;
  sweepIntervalMs?: number;
  /** Clock, injectable so tests can age entries without waiting. */
  now?: () => number;
}

export class StreamCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<CacheEntry<T>>>();
  private readonly capacityBytes: number;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;

  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: StreamCacheOptions) {
    this.capacityBytes = options.capacityBytes;
    this.ttlMs = options.ttlMs;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Look up a live entry. A hit refreshes lastAccessedAt.
   */
  get(key: string): CacheEntry<T> | undefined {
    const entry = this.live(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    entry.lastAccessedAt = this.now();
    return entry;
  }

  /**
   * Whether a live entry exists, without counting as an access.
   */
  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  /**
   * Insert or replace an entry, then evict down to capacity.
   */
  put(key: string, payloadRef: T, sizeBytes: number): CacheEntry<T> {
    this.remove(key);

    const now = this.now();
    const entry: CacheEntry<T> = {
      key,
      payloadRef,
      insertedAt: now,
      lastAccessedAt: now,
      sizeBytes: Math.max(0, sizeBytes),
    };
    this.entries.set(key, entry);
    this.totalBytes += entry.sizeBytes;

    this.evictIfNeeded();
    return entry;
  }

  /**
   * Return the cached entry for `key`, or run `fetch` to populate it.
   * Concurrent callers for the same key share a single fetch.
   *
   * If the shared fetch was aborted through its owner's signal, a joined
   * caller whose own signal is still live retries with a fetch of its own
   * rather than inheriting someone else's cancellation.
   */
  async getOrFetch(key: string, fetch: CacheFetcher<T>, signal?: AbortSignal): Promise<CacheEntry<T>> {
    const cached = this.get(key);
    if (cached) return cached;

    const pending = this.inFlight.get(key);
    if (pending) {
      try {
        return await pending;
      } catch (error) {
        if (isAbortError(error) && !signal?.aborted) {
          return this.getOrFetch(key, fetch, signal);
        }
        throw error;
      }
    }

    const flight = (async () => {
      const { payload, sizeBytes } = await fetch(signal);
      return this.put(key, payload, sizeBytes);
    })();
    this.inFlight.set(key, flight);

    try {
      return await flight;
    } finally {
      if (this.inFlight.get(key) === flight) this.inFlight.delete(key);
    }
  }

  /**
   * Drop an entry, e.g. after its stream URL turned out to be dead.
   */
  invalidate(key: string): boolean {
    return this.remove(key);
  }

  /**
   * Evict least-recently-accessed entries until the total size fits.
   * Returns the evicted keys, oldest first.
   */
  evictIfNeeded(): string[] {
    const evicted: string[] = [];
    this.sweep(evicted);
    if (this.totalBytes <= this.capacityBytes) return evicted;

    // Map iteration follows insertion order and sort is stable, so equal
    // timestamps fall back to insertion order.
    const candidates = [...this.entries.values()].sort(
      (a, b) => a.lastAccessedAt - b.lastAccessedAt || a.insertedAt - b.insertedAt,
    );

    for (const entry of candidates) {
      if (this.totalBytes <= this.capacityBytes) break;
      this.remove(entry.key);
      this.evictions++;
      evicted.push(entry.key);
    }

    return evicted;
  }

  /**
   * Drop every entry past its TTL. Returns the number removed.
   */
  sweep(expired: string[] = []): number {
    const now = this.now();
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (now - entry.insertedAt >= this.ttlMs) {
        this.remove(entry.key);
        this.evictions++;
        expired.push(entry.key);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.info(`[StreamCache] Swept ${removed} expired entr${removed === 1 ? 'y' : 'ies'}.`);
      }
    }, this.sweepIntervalMs);
    // The sweep alone must never keep the process alive.
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      totalBytes: this.totalBytes,
      capacityBytes: this.capacityBytes,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private live(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      this.remove(key);
      this.evictions++;
      return undefined;
    }
    return entry;
  }

  private remove(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.totalBytes -= entry.sizeBytes;
    return true;
  }
}
