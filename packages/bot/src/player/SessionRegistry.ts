import { Semaphore } from 'async-mutex';
import type {
  CacheStats,
  GuildSessionSnapshot,
  SessionCloseReason,
  TrackDescriptor,
} from '@cadence/shared';
import type { EngineConfig } from '../config';
import { InvalidStateError, TrackNotFoundError, VoiceConnectionError, describeError } from '../errors';
import type { EngineEventBus } from '../lib/broadcast';
import { GuildSession } from './GuildSession';
import type { EnqueueResult } from './GuildSession';
import type { StreamCache } from './StreamCache';
import type {
  ResolvedStream,
  SessionSnapshotStore,
  TrackRequest,
  TrackResolver,
  Transcoder,
  VoiceLink,
  VoiceTarget,
  VoiceTransport,
} from './types';

// ---------------------------------------------------------------------------
// SessionRegistry
//
// Holds one GuildSession per guild for the lifetime of a voice session. The
// API routes and the membership listener act on sessions through here rather
// than keeping references of their own.
//
// Creation is create-if-absent and atomic: the first caller for a guild
// registers a pending promise before it awaits the voice connection, and
// every concurrent caller for the same guild awaits that promise instead of
// connecting a second time. A guild whose session is still tearing down is
// waited out before a new one is created.
// ---------------------------------------------------------------------------

export interface SessionRegistryOptions {
  config: EngineConfig;
  cache: StreamCache<ResolvedStream>;
  resolver: TrackResolver;
  transcoder: Transcoder;
  transport: VoiceTransport;
  events: EngineEventBus;
  snapshotStore?: SessionSnapshotStore;
}

export interface PlayRequest extends TrackRequest {
  target: VoiceTarget;
}

export interface PlayResult extends EnqueueResult {
  /** The first enqueued track. */
  track: TrackDescriptor;
  /** Every enqueued track; more than one for a playlist. */
  tracks: TrackDescriptor[];
  /** Playlist title, or null for a single track. */
  playlist: string | null;
  snapshot: GuildSessionSnapshot;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, GuildSession>();
  private readonly pending = new Map<string, Promise<GuildSession>>();
  private readonly closing = new Map<string, Promise<void>>();
  private readonly preloadLimiter: Semaphore | undefined;
  private started = false;
  private shuttingDown = false;

  private readonly config: EngineConfig;
  private readonly cache: StreamCache<ResolvedStream>;
  private readonly resolver: TrackResolver;
  private readonly transcoder: Transcoder;
  private readonly transport: VoiceTransport;
  private readonly events: EngineEventBus;
  private readonly snapshotStore: SessionSnapshotStore | undefined;

  constructor(options: SessionRegistryOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.resolver = options.resolver;
    this.transcoder = options.transcoder;
    this.transport = options.transport;
    this.events = options.events;
    this.snapshotStore = options.snapshotStore;

    const limit = options.config.preload.globalConcurrency;
    this.preloadLimiter = limit > 0 ? new Semaphore(limit) : undefined;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  start(): void {
    if (this.started) return;
    this.started = true;
    this.shuttingDown = false;
    this.cache.startSweeper();
  }

  /**
   * Close every session and wait until all of them (and their snapshot
   * writes) are done. New sessions are refused from here on.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.cache.stopSweeper();

    // Sessions still connecting are finished first so they can be closed too.
    await Promise.allSettled([...this.pending.values()]);

    const sessions = [...this.sessions.values()];
    await Promise.allSettled(sessions.map((session) => session.close('shutdown')));
    await Promise.allSettled([...this.closing.values()]);

    this.started = false;
    console.info(`[SessionRegistry] Shut down ${sessions.length} session(s).`);
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  get(guildId: string): GuildSession | undefined {
    return this.sessions.get(guildId);
  }

  /**
   * Return the guild's session, creating it (and joining `target.channelId`)
   * if there is none. Concurrent calls for one guild share a single creation.
   */
  async getOrCreate(target: VoiceTarget): Promise<GuildSession> {
    const existing = this.sessions.get(target.guildId);
    if (existing && !existing.isClosed) return existing;

    const pending = this.pending.get(target.guildId);
    if (pending) return pending;

    const creation = this.create(target);
    this.pending.set(target.guildId, creation);
    try {
      return await creation;
    } finally {
      if (this.pending.get(target.guildId) === creation) {
        this.pending.delete(target.guildId);
      }
    }
  }

  /**
   * Resolve a query, then enqueue it on the guild's session. Resolution runs
   * before any session exists, so a query that finds nothing never joins a
   * voice channel.
   *
   * A playlist URL enqueues up to maxQueueSize of its entries in one batch;
   * if they do not all fit behind the current queue, none are added.
   */
  async play(request: PlayRequest): Promise<PlayResult> {
    const trackRequest: TrackRequest = {
      query: request.query,
      platformHint: request.platformHint,
      requestedBy: request.requestedBy,
    };

    const playlist = await this.resolver.resolvePlaylist(trackRequest, this.config.session.maxQueueSize);
    const tracks = playlist ? playlist.tracks : [await this.resolver.resolve(trackRequest)];
    const [track] = tracks;
    if (!track) {
      throw new TrackNotFoundError(`No playable entries in playlist "${request.query}".`);
    }

    const session = await this.getOrCreate(request.target);
    const result = await session.enqueue(tracks);
    if (playlist) {
      console.info(
        `[SessionRegistry] Queued ${tracks.length} track(s) from "${playlist.title}" in guild ${session.guildId}.`,
      );
    }
    return {
      ...result,
      track,
      tracks,
      playlist: playlist?.title ?? null,
      snapshot: session.snapshot(),
    };
  }

  /**
   * Close the guild's session. Resolves with its final snapshot, or null if
   * there was none.
   */
  async leave(guildId: string, reason: SessionCloseReason = 'leave'): Promise<GuildSessionSnapshot | null> {
    const session = this.sessions.get(guildId);
    if (!session) return null;
    return session.close(reason);
  }

  updateMembership(guildId: string, listenerCount: number): void {
    this.sessions.get(guildId)?.updateMembership(listenerCount);
  }

  getSessionState(guildId: string): GuildSessionSnapshot | null {
    return this.sessions.get(guildId)?.snapshot() ?? null;
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }

  /** The voice channel the guild's session is connected to, if any. */
  channelOf(guildId: string): string | null {
    return this.sessions.get(guildId)?.channelId ?? null;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  private async create(target: VoiceTarget): Promise<GuildSession> {
    if (this.shuttingDown) {
      throw new InvalidStateError('The engine is shutting down.');
    }

    // A previous session for this guild may still be releasing its voice
    // connection; joining again before that finishes would race it.
    const previous = this.sessions.get(target.guildId);
    if (previous) await previous.whenClosed();
    const persisting = this.closing.get(target.guildId);
    if (persisting) await persisting;

    let link: VoiceLink;
    try {
      link = await this.transport.connect(target);
    } catch (error) {
      if (error instanceof VoiceConnectionError) throw error;
      throw new VoiceConnectionError(
        `Could not join voice channel ${target.channelId}: ${describeError(error)}`,
        { cause: error },
      );
    }

    const session = new GuildSession({
      guildId: target.guildId,
      link,
      transport: this.transport,
      resolver: this.resolver,
      transcoder: this.transcoder,
      cache: this.cache,
      events: this.events,
      config: this.config,
      preloadLimiter: this.preloadLimiter,
      onClosed: (closed, snapshot) => this.onSessionClosed(closed, snapshot),
    });

    this.sessions.set(target.guildId, session);
    console.info(
      `[SessionRegistry] Session created for guild ${target.guildId} in channel ${target.channelId}.`,
    );
    return session;
  }

  private onSessionClosed(session: GuildSession, snapshot: GuildSessionSnapshot): void {
    // Only drop the entry if it still belongs to this session.
    if (this.sessions.get(session.guildId) === session) {
      this.sessions.delete(session.guildId);
    }

    if (!this.snapshotStore) return;

    const write = this.snapshotStore
      .saveFinalSnapshot(snapshot)
      .catch((err) =>
        console.error(
          `[SessionRegistry] Failed to persist the final snapshot of guild ${session.guildId}:`,
          err,
        ),
      )
      .finally(() => {
        if (this.closing.get(session.guildId) === write) {
          this.closing.delete(session.guildId);
        }
      });
    this.closing.set(session.guildId, write);
  }
}
