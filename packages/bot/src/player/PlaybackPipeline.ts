import type { FilterGraphSpec, PipelineState, TrackDescriptor } from '@cadence/shared';
import type { PipelineConfig } from '../config';
import {
  InvalidParameterError,
  InvalidStateError,
  PlaybackFailedError,
  ResourceBusyError,
  StreamStalledError,
  describeError,
} from '../errors';
import type { PipelineFailure } from '../errors';
import { createDeferred, delay, raceAbort } from '../lib/async';
import type { Deferred } from '../lib/async';
import { backoffDelay } from '../lib/retry';
import { playbackRate } from './effects';
import type { StreamCache } from './StreamCache';
import type {
  ResolvedStream,
  TrackResolver,
  TranscodeRun,
  Transcoder,
  VoiceLink,
} from './types';

// ---------------------------------------------------------------------------
// PlaybackPipeline
//
// Owns at most one transcoding run for one guild and pumps its frames into
// the voice link.
//
//   idle ─start()─▶ starting ─first frame─▶ playing ⇄ paused
//                       │                     │
//                       └──── read failure ───┴─▶ stalled ─reattach─▶ playing
//                                                    │
//                                 retries exhausted ─┴─▶ errored
//                             end of stream ─▶ finished
//   stop() from anywhere ─▶ idle
//
// No frame for readTimeoutMs after the run has played counts as a read
// failure.
//
// A "run" is one track at one filter graph. Reattaching after a failure stays
// within the run (same position, fresh process); changing effects or seeking
// replaces the run. Every async step checks that its run is still the live
// one before touching state, so a stop() or restart can never be undone by a
// stale continuation finishing late.
//
// Events are delivered through `onEvent` synchronously; the GuildSession
// queues them onto its own serialized task.
// ---------------------------------------------------------------------------

// `runId` identifies the run that produced the event, so a consumer can drop
// events from a run that was replaced before it got to handle them.
export type PipelineEvent =
  | { type: 'started'; runId: number; track: TrackDescriptor; positionMs: number }
  | { type: 'finished'; runId: number; track: TrackDescriptor }
  | { type: 'errored'; runId: number; track: TrackDescriptor; error: PipelineFailure };

export interface PlaybackPipelineOptions {
  guildId: string;
  link: VoiceLink;
  transcoder: Transcoder;
  resolver: TrackResolver;
  cache: StreamCache<ResolvedStream>;
  config: PipelineConfig;
  onEvent: (event: PipelineEvent) => void;
}

interface LaunchOptions {
  fromMs: number;
  paused: boolean;
  /** Emit 'started' on the first frame. False for effect/seek restarts. */
  announce: boolean;
}

interface PipelineRun {
  readonly id: number;
  readonly track: TrackDescriptor;
  readonly filters: FilterGraphSpec;
  readonly rate: number;
  readonly startOffsetMs: number;
  readonly controller: AbortController;
  readonly announce: boolean;
  /** Resolves once the run leaves 'starting' (first frame, failure or stop). */
  readonly ready: Deferred<void>;
  framesSent: number;
  hasPlayed: boolean;
  timedOut: boolean;
  paused: boolean;
  resumeGate: Deferred<void> | null;
  process: TranscodeRun | null;
  settled: Promise<void>;
}

// States in which a run is alive and start() must be refused.
const BUSY_STATES: ReadonlySet<PipelineState> = new Set(['starting', 'playing', 'paused', 'stalled']);

export class PlaybackPipeline {
  private state: PipelineState = 'idle';
  private run: PipelineRun | null = null;
  private runCounter = 0;

  private readonly guildId: string;
  private readonly link: VoiceLink;
  private readonly transcoder: Transcoder;
  private readonly resolver: TrackResolver;
  private readonly cache: StreamCache<ResolvedStream>;
  private readonly config: PipelineConfig;
  private readonly onEvent: (event: PipelineEvent) => void;

  constructor(options: PlaybackPipelineOptions) {
    this.guildId = options.guildId;
    this.link = options.link;
    this.transcoder = options.transcoder;
    this.resolver = options.resolver;
    this.cache = options.cache;
    this.config = options.config;
    this.onEvent = options.onEvent;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  get currentState(): PipelineState {
    return this.state;
  }

  /** The track of the live run, or null when idle. */
  get currentTrack(): TrackDescriptor | null {
    return this.run?.track ?? null;
  }

  /** Id of the live run, or null when idle. */
  get currentRunId(): number | null {
    return this.run?.id ?? null;
  }

  get isBusy(): boolean {
    return BUSY_STATES.has(this.state);
  }

  /**
   * Begin playing `track` from `fromMs`. Returns immediately; the run reports
   * back through events. Throws ResourceBusyError while another run is live.
   */
  start(track: TrackDescriptor, filters: FilterGraphSpec, fromMs = 0): void {
    if (this.isBusy) {
      throw new ResourceBusyError(
        `Cannot start "${track.title}": the pipeline is ${this.state}.`,
      );
    }
    this.launch(track, filters, { fromMs, paused: false, announce: true });
  }

  pause(): void {
    if (this.state === 'paused') return;
    const run = this.run;
    if (this.state !== 'playing' || !run) {
      throw new InvalidStateError(`Cannot pause while ${this.state}.`);
    }
    run.paused = true;
    this.link.setPaused(true);
    this.setState('paused');
  }

  resume(): void {
    if (this.state === 'playing') return;
    const run = this.run;
    if (this.state !== 'paused' || !run) {
      throw new InvalidStateError(`Cannot resume while ${this.state}.`);
    }
    run.paused = false;
    this.link.setPaused(false);
    this.openGate(run);
    this.setState('playing');
  }

  /**
   * Terminate the current run from any state. Kills the transcoder, drops
   * buffered audio and returns to idle. Idempotent.
   */
  stop(): void {
    const run = this.run;
    this.run = null;
    if (run) {
      this.abortRun(run);
      if (run.paused) this.link.setPaused(false);
    }
    this.link.flush();
    this.setState('idle');
  }

  /**
   * Jump to `positionMs` within the current track. Implemented as a restart
   * of the run at the new input offset.
   */
  seek(positionMs: number): void {
    const run = this.run;
    if (!run || (this.state !== 'playing' && this.state !== 'paused')) {
      throw new InvalidStateError(`Cannot seek while ${this.state}.`);
    }
    if (run.track.durationMs <= 0) {
      throw new InvalidStateError(`"${run.track.title}" is a live stream and cannot be seeked.`);
    }
    if (!Number.isFinite(positionMs) || positionMs < 0 || positionMs > run.track.durationMs) {
      throw new InvalidParameterError(
        `Seek position must be between 0 and ${run.track.durationMs} ms (got ${positionMs}).`,
      );
    }
    this.restart(run, run.filters, Math.round(positionMs));
  }

  /**
   * Swap the filter graph of the live run. FFmpeg cannot reconfigure a
   * running graph, so this stops the run and starts a new one at the
   * position the listener has actually heard (frames sent minus frames still
   * buffered in the voice link). The gap is one transcoder start-up; the
   * position error is under one frame. Returns false when nothing is playing,
   * in which case the new graph simply applies to the next start().
   */
  applyEffects(filters: FilterGraphSpec): boolean {
    const run = this.run;
    if (!run || !this.isBusy) return false;
    this.restart(run, filters, this.positionMs());
    return true;
  }

  /**
   * Current playback position in track time.
   */
  positionMs(): number {
    const run = this.run;
    if (!run) return 0;
    const played = Math.max(0, run.framesSent - this.link.pendingFrames());
    return this.trackTime(run, played);
  }

  /**
   * Resolves once the live run has left 'starting': it produced its first
   * frame, failed, or was stopped.
   */
  untilSettled(): Promise<void> {
    return this.run ? this.run.ready.promise : Promise.resolve();
  }

  /**
   * Resolves once the live run's drive loop has fully exited, i.e. its
   * process is gone. Used on teardown and by tests.
   */
  whenDone(): Promise<void> {
    return this.run ? this.run.settled : Promise.resolve();
  }

  // ---------------------------------------------------------------------------
  // Run lifecycle
  // ---------------------------------------------------------------------------

  private launch(track: TrackDescriptor, filters: FilterGraphSpec, options: LaunchOptions): void {
    const run: PipelineRun = {
      id: ++this.runCounter,
      track,
      filters,
      rate: playbackRate(filters),
      startOffsetMs: options.fromMs,
      controller: new AbortController(),
      announce: options.announce,
      ready: createDeferred(),
      framesSent: 0,
      hasPlayed: false,
      timedOut: false,
      paused: options.paused,
      resumeGate: null,
      process: null,
      settled: Promise.resolve(),
    };

    this.run = run;
    this.setState('starting');
    run.settled = this.drive(run);
  }

  private restart(run: PipelineRun, filters: FilterGraphSpec, fromMs: number): void {
    const announce = run.announce && !run.hasPlayed;
    this.abortRun(run);
    this.link.flush();
    this.launch(run.track, filters, { fromMs, paused: run.paused, announce });
  }

  private abortRun(run: PipelineRun): void {
    run.controller.abort();
    run.process?.kill();
    run.process = null;
    run.ready.resolve();
    this.openGate(run);
  }

  private isLive(run: PipelineRun): boolean {
    return this.run === run && !run.controller.signal.aborted;
  }

  /**
   * Attempt loop of one run. Never rejects: every outcome ends in finished,
   * errored, or a silent exit because the run was replaced.
   */
  private async drive(run: PipelineRun): Promise<void> {
    const { maxAttempts, backoffBaseMs } = this.config;
    let failures = 0;

    while (this.isLive(run)) {
      const framesBefore = run.framesSent;
      try {
        await this.attempt(run);
        if (!this.isLive(run)) return;
        if (run.framesSent === 0) {
          throw new Error('The stream ended before producing any audio.');
        }
        this.finish(run);
        return;
      } catch (error) {
        if (!this.isLive(run)) return;

        // Progress since the last failure means the source recovered; only
        // consecutive failures count against the budget.
        if (run.framesSent > framesBefore) failures = 0;
        failures++;

        if (run.timedOut) {
          this.setState('stalled');
          this.fail(
            run,
            new PlaybackFailedError(
              `"${run.track.title}" produced no audio within ${this.config.startTimeoutMs} ms.`,
              { cause: error },
            ),
          );
          return;
        }

        if (failures >= maxAttempts) {
          this.fail(
            run,
            new PlaybackFailedError(
              `Playback of "${run.track.title}" failed after ${failures} attempt(s): ${describeError(error)}`,
              { cause: error },
            ),
          );
          return;
        }

        const wait = backoffDelay(backoffBaseMs, failures);
        this.setState('stalled');
        console.warn(
          `[Pipeline:${this.guildId}] Stream read failed for "${run.track.title}" ` +
            `(attempt ${failures}/${maxAttempts}): ${describeError(error)}; reattaching in ${wait} ms.`,
        );

        // The cached URL may be the thing that broke (expired CDN link), so
        // the reattach resolves a fresh one.
        this.cache.invalidate(run.track.id);
        if (!(await delay(wait, run.controller.signal))) return;
      }
    }
  }

  /**
   * One process lifetime: acquire the source, spawn the transcoder, pump
   * frames until the stream ends. Throws on any failure.
   */
  private async attempt(run: PipelineRun): Promise<void> {
    const attempt = new AbortController();
    const forwardAbort = () => attempt.abort(run.controller.signal.reason);
    run.controller.signal.addEventListener('abort', forwardAbort, { once: true });

    // Bounded wait for the first frame of the run, covering resolution and
    // process start-up. Firing kills the attempt with a StreamStalledError.
    let timer: NodeJS.Timeout | null = null;
    if (!run.hasPlayed) {
      timer = setTimeout(() => {
        const reason = new StreamStalledError(
          `No audio from "${run.track.title}" after ${this.config.startTimeoutMs} ms.`,
        );
        run.timedOut = true;
        attempt.abort(reason);
        run.process?.kill(reason);
      }, this.config.startTimeoutMs);
    }

    // Once the run has played, each wait for the next frame is bounded by
    // readTimeoutMs. Firing kills the process with a StreamStalledError, which
    // drive() handles like any other read failure: back off, then reattach.
    let readTimer: NodeJS.Timeout | null = null;
    const disarmRead = () => {
      if (readTimer) clearTimeout(readTimer);
      readTimer = null;
    };
    const armRead = (source: TranscodeRun) => {
      disarmRead();
      readTimer = setTimeout(() => {
        readTimer = null;
        console.warn(
          `[Pipeline:${this.guildId}] No frame from "${run.track.title}" ` +
            `for ${this.config.readTimeoutMs} ms; killing the transcoder.`,
        );
        source.kill(
          new StreamStalledError(
            `"${run.track.title}" went silent for ${this.config.readTimeoutMs} ms.`,
          ),
        );
      }, this.config.readTimeoutMs);
    };

    let process: TranscodeRun | null = null;
    try {
      const entry = await raceAbort(
        this.cache.getOrFetch(
          run.track.id,
          async (signal) => {
            const stream = await this.resolver.resolveStream(run.track, signal);
            return { payload: stream, sizeBytes: stream.sizeBytes };
          },
          attempt.signal,
        ),
        attempt.signal,
      );
      if (!this.isLive(run)) return;

      const source = this.transcoder.open({
        source: entry.payloadRef,
        filters: run.filters,
        seekMs: this.trackTime(run, run.framesSent),
      });
      process = source;
      run.process = source;
      if (run.hasPlayed) armRead(source);

      for await (const frame of source.frames) {
        disarmRead();
        if (!this.isLive(run)) return;

        if (!run.hasPlayed) {
          run.hasPlayed = true;
          if (timer) clearTimeout(timer);
          this.setState(run.paused ? 'paused' : 'playing');
          run.ready.resolve();
          if (run.announce) {
            this.onEvent({
              type: 'started',
              runId: run.id,
              track: run.track,
              positionMs: run.startOffsetMs,
            });
          }
        } else if (this.state === 'stalled') {
          this.setState(run.paused ? 'paused' : 'playing');
        }

        if (run.paused) {
          await this.waitForResume(run);
          if (!this.isLive(run)) return;
        }

        await this.link.sendFrame(frame);
        run.framesSent++;
        armRead(source);
      }
    } finally {
      disarmRead();
      if (timer) clearTimeout(timer);
      run.controller.signal.removeEventListener('abort', forwardAbort);
      if (process) {
        process.kill();
        if (run.process === process) run.process = null;
      }
    }
  }

  private finish(run: PipelineRun): void {
    this.setState('finished');
    run.ready.resolve();
    console.info(`[Pipeline:${this.guildId}] Finished "${run.track.title}".`);
    this.onEvent({ type: 'finished', runId: run.id, track: run.track });
  }

  private fail(run: PipelineRun, error: PipelineFailure): void {
    this.setState('errored');
    run.ready.resolve();
    console.error(`[Pipeline:${this.guildId}] ${error.message}`);
    this.onEvent({ type: 'errored', runId: run.id, track: run.track, error });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private waitForResume(run: PipelineRun): Promise<void> {
    if (!run.resumeGate) run.resumeGate = createDeferred();
    return run.resumeGate.promise;
  }

  private openGate(run: PipelineRun): void {
    run.resumeGate?.resolve();
    run.resumeGate = null;
  }

  private trackTime(run: PipelineRun, frames: number): number {
    const ms = run.startOffsetMs + frames * this.config.frameDurationMs * run.rate;
    const bounded = run.track.durationMs > 0 ? Math.min(ms, run.track.durationMs) : ms;
    return Math.round(bounded);
  }

  private setState(next: PipelineState): void {
    this.state = next;
  }
}
