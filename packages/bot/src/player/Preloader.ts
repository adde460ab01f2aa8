import type { Semaphore } from 'async-mutex';
import type { TrackDescriptor } from '@cadence/shared';
import { describeError, isAbortError } from '../errors';
import type { StreamCache } from './StreamCache';
import type { ResolvedStream, TrackResolver } from './types';

// ---------------------------------------------------------------------------
// Preloader
//
// Keeps the stream cache warm for the tracks right after the one playing, so
// that auto-advance starts on a cache hit instead of waiting for yt-dlp.
//
// One per session. A pass reads the upcoming entries through a callback and
// resolves the uncached ones strictly one at a time. poke() during a pass
// marks the session dirty so one more pass runs once the current one ends;
// queue mutations never wait on it. A resolve that is in flight when the
// queue changes is left to finish and populate the cache.
//
// An optional semaphore is shared across every session's preloader to cap
// concurrent background resolves process-wide.
// ---------------------------------------------------------------------------

export interface PreloaderOptions {
  guildId: string;
  cache: StreamCache<ResolvedStream>;
  resolver: TrackResolver;
  depth: number;
  /** Reads the entries after the current one; never includes the current. */
  upcoming: (count: number) => TrackDescriptor[];
  limiter?: Semaphore;
}

export class Preloader {
  private active = false;
  private running = false;
  private dirty = false;
  private controller: AbortController | null = null;
  private pass: Promise<void> = Promise.resolve();

  private readonly guildId: string;
  private readonly cache: StreamCache<ResolvedStream>;
  private readonly resolver: TrackResolver;
  private readonly depth: number;
  private readonly upcoming: (count: number) => TrackDescriptor[];
  private readonly limiter: Semaphore | undefined;

  constructor(options: PreloaderOptions) {
    this.guildId = options.guildId;
    this.cache = options.cache;
    this.resolver = options.resolver;
    this.depth = options.depth;
    this.upcoming = options.upcoming;
    this.limiter = options.limiter;
  }

  get isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.controller = new AbortController();
    this.poke();
  }

  /**
   * Abort the in-flight resolve (if any) and stop scheduling passes.
   */
  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.dirty = false;
    this.controller?.abort();
    this.controller = null;
  }

  /**
   * Ask for a pass over the upcoming entries. Cheap; coalesces while a pass
   * is already running.
   */
  poke(): void {
    if (!this.active || this.depth <= 0) return;
    if (this.running) {
      this.dirty = true;
      return;
    }
    this.pass = this.runPasses();
  }

  /** Resolves when no pass is running. Used on teardown and by tests. */
  idle(): Promise<void> {
    return this.pass;
  }

  private async runPasses(): Promise<void> {
    this.running = true;
    try {
      do {
        this.dirty = false;
        const signal = this.controller?.signal;
        if (!signal) return;
        await this.warm(signal);
      } while (this.active && this.dirty);
    } finally {
      this.running = false;
    }
  }

  private async warm(signal: AbortSignal): Promise<void> {
    for (const track of this.upcoming(this.depth)) {
      if (signal.aborted) return;
      if (this.cache.has(track.id)) continue;

      try {
        if (this.limiter) {
          await this.limiter.runExclusive(() => this.resolveInto(track, signal));
        } else {
          await this.resolveInto(track, signal);
        }
      } catch (error) {
        if (isAbortError(error) || signal.aborted) return;
        console.warn(
          `[Preloader:${this.guildId}] Could not preload "${track.title}": ${describeError(error)}`,
        );
      }
    }
  }

  private async resolveInto(track: TrackDescriptor, signal: AbortSignal): Promise<void> {
    // Re-check after waiting on the limiter: another session may have
    // warmed the same track meanwhile.
    if (signal.aborted || this.cache.has(track.id)) return;
    await this.cache.getOrFetch(
      track.id,
      async (fetchSignal) => {
        const stream = await this.resolver.resolveStream(track, fetchSignal);
        return { payload: stream, sizeBytes: stream.sizeBytes };
      },
      signal,
    );
  }
}
