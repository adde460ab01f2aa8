import { Mutex } from 'async-mutex';
import type { Semaphore } from 'async-mutex';
import { LOOP_MODES, TOGGLE_EFFECTS } from '@cadence/shared';
import type {
  EffectState,
  GuildSessionSnapshot,
  LoopMode,
  SessionCloseReason,
  SessionStatus,
  ToggleEffect,
  TrackDescriptor,
} from '@cadence/shared';
import type { EngineConfig } from '../config';
import { InvalidParameterError, InvalidStateError } from '../errors';
import type { EngineEventBus } from '../lib/broadcast';
import { formatDuration, formatLoopMode } from '../utils/format';
import {
  DEFAULT_EFFECTS,
  buildFilterGraph,
  presetEffects,
  setBassBoost,
  setEffect,
  setVolume,
} from './effects';
import { PlaybackPipeline } from './PlaybackPipeline';
import type { PipelineEvent } from './PlaybackPipeline';
import { Preloader } from './Preloader';
import type { StreamCache } from './StreamCache';
import { TrackQueue } from './TrackQueue';
import type {
  ResolvedStream,
  TrackResolver,
  Transcoder,
  VoiceLink,
  VoiceTransport,
} from './types';

export interface GuildSessionOptions {
  guildId: string;
  link: VoiceLink;
  transport: VoiceTransport;
  resolver: TrackResolver;
  transcoder: Transcoder;
  cache: StreamCache<ResolvedStream>;
  events: EngineEventBus;
  config: Pick<EngineConfig, 'pipeline' | 'preload' | 'session'>;
  preloadLimiter?: Semaphore;
  /**
   * Called once the session has torn itself down, with its final snapshot.
   * The registry uses it to drop its map entry, which avoids a circular
   * import between GuildSession and SessionRegistry.
   */
  onClosed: (session: GuildSession, snapshot: GuildSessionSnapshot) => void;
  now?: () => number;
  random?: () => number;
}

/** Several effect changes applied as one update (one restart, one event). */
export type EffectPatch = Partial<EffectState>;

export interface EnqueueResult {
  /** Queue index of the first enqueued track. */
  position: number;
  /** True when the session was idle and playback started with this call. */
  startedPlayback: boolean;
}

export class GuildSession {
  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  // Invariant: status is 'active' exactly when the queue has a current track.
  // Every operation below restores it before releasing the mutex.
  private status: SessionStatus = 'idle';
  private effects: EffectState = DEFAULT_EFFECTS;
  private lastActivityAt: number;

  // Set synchronously by close() so operations already waiting on the mutex
  // are rejected instead of restarting playback on a dying session.
  private closeReason: SessionCloseReason | null = null;
  private closing: Promise<GuildSessionSnapshot> | null = null;

  private emptyChannelTimer: NodeJS.Timeout | null = null;
  private idleTimer: NodeJS.Timeout | null = null;

  // Serializes every operation and every pipeline event, in arrival order.
  private readonly mutex = new Mutex();

  private readonly queue: TrackQueue;
  private readonly pipeline: PlaybackPipeline;
  private readonly preloader: Preloader;

  readonly guildId: string;
  private readonly link: VoiceLink;
  private readonly transport: VoiceTransport;
  private readonly events: EngineEventBus;
  private readonly config: Pick<EngineConfig, 'pipeline' | 'preload' | 'session'>;
  private readonly onClosed: (session: GuildSession, snapshot: GuildSessionSnapshot) => void;
  private readonly now: () => number;

  // ---------------------------------------------------------------------------
  // Constructor
  // ---------------------------------------------------------------------------
  constructor(options: GuildSessionOptions) {
    this.guildId = options.guildId;
    this.link = options.link;
    this.transport = options.transport;
    this.events = options.events;
    this.config = options.config;
    this.onClosed = options.onClosed;
    this.now = options.now ?? Date.now;
    this.lastActivityAt = this.now();

    this.queue = new TrackQueue({
      maxSize: options.config.session.maxQueueSize,
      random: options.random,
    });

    this.pipeline = new PlaybackPipeline({
      guildId: options.guildId,
      link: options.link,
      transcoder: options.transcoder,
      resolver: options.resolver,
      cache: options.cache,
      config: options.config.pipeline,
      onEvent: (event) => this.onPipelineEvent(event),
    });

    this.preloader = new Preloader({
      guildId: options.guildId,
      cache: options.cache,
      resolver: options.resolver,
      depth: options.config.preload.enabled ? options.config.preload.depth : 0,
      upcoming: (count) => this.queue.upcoming(count),
      limiter: options.preloadLimiter,
    });

    // The voice link gave up on its own (bot kicked, channel deleted, network
    // never recovered). Nothing can play any more, so the session goes too.
    this.link.onLost(() => {
      console.warn(`[GuildSession:${this.guildId}] Voice connection lost; tearing down.`);
      this.close('voice-lost').catch((err) =>
        console.error(`[GuildSession:${this.guildId}] Teardown after voice loss failed:`, err),
      );
    });

    // A fresh session has nothing queued yet.
    this.armIdleTimer();
  }

  // ---------------------------------------------------------------------------
  // Queue operations
  // ---------------------------------------------------------------------------

  /**
   * Append tracks to the queue. If the session was idle, playback of the
   * first one starts immediately.
   */
  enqueue(tracks: readonly TrackDescriptor[]): Promise<EnqueueResult> {
    return this.exclusive(() => {
      if (tracks.length === 0) {
        throw new InvalidParameterError('Nothing to enqueue.');
      }

      const position = this.queue.enqueueMany(tracks);
      this.publishQueue();

      if (this.status === 'idle') {
        this.startCurrent();
        return { position, startedPlayback: true };
      }

      this.preloader.poke();
      return { position, startedPlayback: false };
    });
  }

  /**
   * Skip the current track regardless of loop mode. Returns the new current
   * track, or null when the queue ran out.
   */
  skip(): Promise<TrackDescriptor | null> {
    return this.exclusive(() => {
      const skipped = this.requireCurrent();
      console.info(`[GuildSession:${this.guildId}] Skipping "${skipped.title}".`);

      this.pipeline.stop();
      const next = this.queue.skip();
      this.publishQueue();
      this.startCurrentOrIdle();
      return next;
    });
  }

  /**
   * Clear the queue and stop playback. The voice connection stays up, so the
   * next enqueue starts playing without rejoining.
   */
  stop(): Promise<void> {
    return this.exclusive(() => {
      this.queue.clear();
      this.pipeline.stop();
      this.publishQueue();
      this.goIdle();
    });
  }

  setLoopMode(mode: LoopMode): Promise<LoopMode> {
    return this.exclusive(() => {
      if (!LOOP_MODES.includes(mode)) {
        throw new InvalidParameterError(`Unknown loop mode "${String(mode)}".`);
      }
      this.queue.setLoopMode(mode);
      console.info(`[GuildSession:${this.guildId}] Loop mode: ${formatLoopMode(mode)}.`);
      this.publishQueue();
      this.preloader.poke();
      return mode;
    });
  }

  shuffle(): Promise<void> {
    return this.exclusive(() => {
      this.queue.shuffle();
      this.publishQueue();
      this.preloader.poke();
    });
  }

  removeAt(index: number): Promise<TrackDescriptor> {
    return this.exclusive(() => {
      const removed = this.queue.removeAt(index);
      this.publishQueue();
      this.preloader.poke();
      return removed;
    });
  }

  move(from: number, to: number): Promise<void> {
    return this.exclusive(() => {
      this.queue.move(from, to);
      this.publishQueue();
      this.preloader.poke();
    });
  }

  /**
   * Drop every queued track except the one playing. Returns how many went.
   */
  clearUpcoming(): Promise<number> {
    return this.exclusive(() => {
      const removed = this.queue.clearUpcoming();
      this.publishQueue();
      return removed;
    });
  }

  // ---------------------------------------------------------------------------
  // Playback control
  // ---------------------------------------------------------------------------

  pause(): Promise<void> {
    return this.exclusive(() => {
      this.requireCurrent();
      this.pipeline.pause();
    });
  }

  resume(): Promise<void> {
    return this.exclusive(() => {
      this.requireCurrent();
      this.pipeline.resume();
    });
  }

  seek(positionMs: number): Promise<void> {
    return this.exclusive(() => {
      this.requireCurrent();
      this.pipeline.seek(positionMs);
    });
  }

  // ---------------------------------------------------------------------------
  // Effects
  //
  // Each setter validates first (leaving state untouched on rejection), then
  // swaps the live pipeline onto the new filter graph.
  // ---------------------------------------------------------------------------

  setBassBoost(level: number): Promise<EffectState> {
    return this.exclusive(() => this.applyEffects(setBassBoost(this.effects, level)));
  }

  setEffect(name: ToggleEffect, enabled: boolean): Promise<EffectState> {
    return this.exclusive(() => this.applyEffects(setEffect(this.effects, name, enabled)));
  }

  toggleEffect(name: ToggleEffect): Promise<EffectState> {
    return this.exclusive(() =>
      this.applyEffects(setEffect(this.effects, name, !this.effects[name])),
    );
  }

  setVolume(volume: number): Promise<EffectState> {
    return this.exclusive(() => this.applyEffects(setVolume(this.effects, volume)));
  }

  /**
   * Apply several effect changes at once. Every value is validated before
   * anything is committed, so a bad field leaves all effects as they were.
   */
  updateEffects(patch: EffectPatch): Promise<EffectState> {
    return this.exclusive(() => {
      let next = this.effects;
      if (patch.bassBoostLevel !== undefined) next = setBassBoost(next, patch.bassBoostLevel);
      if (patch.volume !== undefined) next = setVolume(next, patch.volume);
      for (const name of TOGGLE_EFFECTS) {
        const enabled = patch[name];
        if (enabled !== undefined) next = setEffect(next, name, enabled);
      }
      return this.applyEffects(next);
    });
  }

  resetEffects(): Promise<EffectState> {
    return this.exclusive(() => this.applyEffects(DEFAULT_EFFECTS));
  }

  /** Switch to a named preset, replacing every current effect. */
  applyPreset(name: string): Promise<EffectState> {
    return this.exclusive(() => this.applyEffects(presetEffects(name)));
  }

  // ---------------------------------------------------------------------------
  // Membership & lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Report how many listeners (bots excluded) are in the session's channel.
   * An empty channel arms the teardown timer; anyone rejoining cancels it.
   */
  updateMembership(listenerCount: number): void {
    if (this.closeReason) return;

    if (listenerCount > 0) {
      if (this.emptyChannelTimer) {
        console.info(`[GuildSession:${this.guildId}] Listener rejoined; teardown cancelled.`);
        clearTimeout(this.emptyChannelTimer);
        this.emptyChannelTimer = null;
      }
      return;
    }

    if (this.emptyChannelTimer) return;
    const graceMs = this.config.session.emptyChannelGraceMs;
    console.info(
      `[GuildSession:${this.guildId}] Voice channel is empty; leaving in ${graceMs / 1000} s.`,
    );
    this.emptyChannelTimer = setTimeout(() => {
      this.emptyChannelTimer = null;
      this.close('channel-empty').catch((err) =>
        console.error(`[GuildSession:${this.guildId}] Teardown of empty channel failed:`, err),
      );
    }, graceMs);
  }

  get channelId(): string {
    return this.link.channelId;
  }

  get isClosed(): boolean {
    return this.closeReason !== null;
  }

  /**
   * Tear the session down. Playback and preloading stop right away, even if
   * an operation is mid-flight; the rest runs once the mutex is free.
   * Resolves with the final snapshot. Calling it again returns the same
   * promise.
   */
  close(reason: SessionCloseReason): Promise<GuildSessionSnapshot> {
    if (!this.closing) {
      this.closing = this.teardown(reason);
    }
    return this.closing;
  }

  /** Resolves once a teardown in progress has finished; at once otherwise. */
  async whenClosed(): Promise<void> {
    if (this.closing) await this.closing;
  }

  snapshot(): GuildSessionSnapshot {
    return {
      guildId: this.guildId,
      channelId: this.link.channelId,
      status: this.status,
      playback: this.pipeline.currentState,
      positionMs: this.pipeline.positionMs(),
      current: this.queue.current,
      queue: this.queue.snapshot(),
      effects: { ...this.effects },
      filterGraph: buildFilterGraph(this.effects),
      lastActivityAt: new Date(this.lastActivityAt).toISOString(),
    };
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` under the session mutex, rejecting if the session is closing.
   * Errors thrown by `fn` reach the caller; state is left as `fn` left it,
   * which every operation keeps consistent by validating before mutating.
   */
  private exclusive<T>(fn: () => T): Promise<T> {
    return this.mutex.runExclusive(() => {
      this.assertOpen();
      const result = fn();
      this.lastActivityAt = this.now();
      return result;
    });
  }

  private assertOpen(): void {
    if (this.closeReason) {
      throw new InvalidStateError(`The session for guild ${this.guildId} is closed.`);
    }
  }

  private requireCurrent(): TrackDescriptor {
    const current = this.queue.current;
    if (!current) {
      throw new InvalidStateError('Nothing is playing.');
    }
    return current;
  }

  /**
   * Start the pipeline on the queue's current track.
   */
  private startCurrent(): void {
    const track = this.queue.current;
    if (!track) {
      this.goIdle();
      return;
    }

    this.status = 'active';
    this.clearIdleTimer();

    console.info(
      `[GuildSession:${this.guildId}] Now playing "${track.title}" (${formatDuration(track.durationMs)}), ` +
        `requested by ${track.requestedBy}.`,
    );
    this.pipeline.start(track, buildFilterGraph(this.effects));

    this.preloader.start();
    this.preloader.poke();
  }

  private startCurrentOrIdle(): void {
    if (this.queue.current) {
      this.startCurrent();
    } else {
      this.goIdle();
    }
  }

  private goIdle(): void {
    // Also clears a finished or errored run, so the snapshot reads idle at 0.
    this.pipeline.stop();
    this.preloader.stop();
    if (this.status !== 'idle') {
      console.info(`[GuildSession:${this.guildId}] Queue finished; session is idle.`);
    }
    this.status = 'idle';
    this.armIdleTimer();
  }

  private applyEffects(next: EffectState): EffectState {
    this.effects = next;
    const filterGraph = buildFilterGraph(next);
    this.pipeline.applyEffects(filterGraph);
    this.events.publish(this.guildId, {
      type: 'EffectsChanged',
      payload: { effects: { ...next }, filterGraph },
    });
    return next;
  }

  private publishQueue(): void {
    this.events.publish(this.guildId, {
      type: 'QueueChanged',
      payload: { queue: this.queue.snapshot() },
    });
  }

  // ---------------------------------------------------------------------------
  // Pipeline events
  //
  // The pipeline reports from its own drive loop; each event is queued onto
  // the session mutex so it is handled in order with user operations. By the
  // time it runs, the run that raised it may have been replaced (skip, stop,
  // a seek): those events are dropped by run id.
  // ---------------------------------------------------------------------------

  private onPipelineEvent(event: PipelineEvent): void {
    this.mutex
      .runExclusive(() => this.handlePipelineEvent(event))
      .catch((err) =>
        console.error(
          `[GuildSession:${this.guildId}] Failed to handle pipeline ${event.type} event:`,
          err,
        ),
      );
  }

  private handlePipelineEvent(event: PipelineEvent): void {
    if (this.closeReason) return;
    if (event.runId !== this.pipeline.currentRunId) return;

    switch (event.type) {
      case 'started':
        this.events.publish(this.guildId, {
          type: 'TrackStarted',
          payload: { track: event.track, positionMs: event.positionMs },
        });
        return;

      case 'finished': {
        this.events.publish(this.guildId, {
          type: 'TrackFinished',
          payload: { track: event.track },
        });
        this.queue.advance();
        this.publishQueue();
        this.startCurrentOrIdle();
        return;
      }

      case 'errored': {
        this.events.publish(this.guildId, {
          type: 'TrackErrored',
          payload: { track: event.track, code: event.error.code, reason: event.error.message },
        });
        // skip(), not advance(): under 'track' loop a broken track would
        // otherwise be retried forever.
        this.queue.skip();
        this.publishQueue();
        this.startCurrentOrIdle();
        return;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Timers & teardown
  // ---------------------------------------------------------------------------

  private armIdleTimer(): void {
    this.clearIdleTimer();
    const idleMs = this.config.session.idleTimeoutMs;
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      console.info(
        `[GuildSession:${this.guildId}] Idle for ${idleMs / 1000} s; leaving the voice channel.`,
      );
      this.close('idle-timeout').catch((err) =>
        console.error(`[GuildSession:${this.guildId}] Idle teardown failed:`, err),
      );
    }, idleMs);
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private async teardown(reason: SessionCloseReason): Promise<GuildSessionSnapshot> {
    this.closeReason = reason;
    const snapshot: GuildSessionSnapshot = { ...this.snapshot(), status: 'closed' };

    // Immediate part: no more audio, no more resolves, no more timers.
    this.clearIdleTimer();
    if (this.emptyChannelTimer) {
      clearTimeout(this.emptyChannelTimer);
      this.emptyChannelTimer = null;
    }
    this.preloader.stop();
    this.pipeline.stop();

    // Serialized part: wait for any operation already holding the lock.
    await this.mutex.runExclusive(() => {
      this.status = 'closed';
      try {
        this.transport.disconnect(this.link);
      } catch (err) {
        console.error(`[GuildSession:${this.guildId}] Failed to release the voice connection:`, err);
      }
      this.events.publish(this.guildId, {
        type: 'SessionClosed',
        payload: { reason, snapshot },
      });
    });

    console.info(`[GuildSession:${this.guildId}] Session closed (${reason}).`);
    this.onClosed(this, snapshot);
    return snapshot;
  }
}
