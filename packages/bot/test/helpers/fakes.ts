import type { GuildSessionSnapshot, TrackDescriptor } from '@cadence/shared';
import type { EngineConfig } from '../../src/config';
import { TrackNotFoundError } from '../../src/errors';
import type {
  ResolvedPlaylist,
  ResolvedStream,
  SessionSnapshotStore,
  TrackRequest,
  TrackResolver,
  TranscodeRequest,
  TranscodeRun,
  Transcoder,
  VoiceLink,
  VoiceTarget,
  VoiceTransport,
} from '../../src/player/types';

// ---------------------------------------------------------------------------
// In-process stand-ins for yt-dlp, FFmpeg and the Discord voice connection.
// ---------------------------------------------------------------------------

export function makeTrack(overrides: Partial<TrackDescriptor> = {}): TrackDescriptor {
  const id = overrides.id ?? 'track-a';
  return {
    id,
    title: `Title ${id}`,
    durationMs: 180_000,
    streamHandle: `https://www.youtube.com/watch?v=${id}`,
    platform: 'youtube',
    requestedBy: 'tester',
    thumbnailUrl: null,
    ...overrides,
  };
}

export function testConfig(overrides: {
  pipeline?: Partial<EngineConfig['pipeline']>;
  preload?: Partial<EngineConfig['preload']>;
  session?: Partial<EngineConfig['session']>;
  cache?: Partial<EngineConfig['cache']>;
} = {}): EngineConfig {
  return {
    cache: {
      capacityBytes: 10 * 1024 * 1024,
      ttlMs: 60_000,
      sweepIntervalMs: 60_000,
      ...overrides.cache,
    },
    pipeline: {
      startTimeoutMs: 1_000,
      readTimeoutMs: 1_000,
      maxAttempts: 3,
      backoffBaseMs: 5,
      frameDurationMs: 20,
      ...overrides.pipeline,
    },
    preload: {
      enabled: true,
      depth: 2,
      globalConcurrency: 0,
      ...overrides.preload,
    },
    session: {
      emptyChannelGraceMs: 60_000,
      idleTimeoutMs: 60_000,
      maxQueueSize: 100,
      ...overrides.session,
    },
    media: {
      ffmpegPath: 'ffmpeg',
      ytdlpPath: 'yt-dlp',
      bitrateKbps: 96,
    },
  };
}

/**
 * Poll `predicate` until it holds, failing after `timeoutMs`.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs} ms.`);
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// FakeResolver
// ---------------------------------------------------------------------------

export class FakeResolver implements TrackResolver {
  /** Track ids passed to resolveStream, in call order. */
  readonly streamCalls: string[] = [];
  readonly resolveCalls: TrackRequest[] = [];
  readonly failStreamsFor = new Set<string>();
  streamDelayMs = 0;
  /** resolveStream never settles unless its signal aborts. */
  hangStreams = false;
  maxConcurrentStreams = 0;

  /** `limit` passed to each resolvePlaylist call. */
  readonly playlistLimits: number[] = [];

  private readonly tracks = new Map<string, TrackDescriptor>();
  private readonly playlists = new Map<string, ResolvedPlaylist>();
  private activeStreams = 0;

  add(query: string, track: TrackDescriptor): this {
    this.tracks.set(query, track);
    return this;
  }

  addPlaylist(query: string, title: string, tracks: TrackDescriptor[]): this {
    this.playlists.set(query, { title, tracks });
    return this;
  }

  async resolvePlaylist(request: TrackRequest, limit: number): Promise<ResolvedPlaylist | null> {
    const playlist = this.playlists.get(request.query);
    if (!playlist) return null;
    this.playlistLimits.push(limit);
    return {
      title: playlist.title,
      tracks: playlist.tracks
        .slice(0, limit)
        .map((track) => ({ ...track, requestedBy: request.requestedBy })),
    };
  }

  async resolve(request: TrackRequest): Promise<TrackDescriptor> {
    this.resolveCalls.push(request);
    const track = this.tracks.get(request.query);
    if (!track) {
      throw new TrackNotFoundError(`Nothing playable found for "${request.query}".`);
    }
    return { ...track, requestedBy: request.requestedBy };
  }

  async resolveStream(track: TrackDescriptor, signal?: AbortSignal): Promise<ResolvedStream> {
    this.streamCalls.push(track.id);
    this.activeStreams++;
    this.maxConcurrentStreams = Math.max(this.maxConcurrentStreams, this.activeStreams);
    try {
      if (this.hangStreams) {
        await new Promise<never>((_resolve, reject) => {
          if (!signal) return;
          const aborting = signal;
          aborting.addEventListener('abort', () => reject(aborting.reason), { once: true });
        });
      }
      if (this.streamDelayMs > 0) await sleep(this.streamDelayMs);
      if (this.failStreamsFor.has(track.id)) {
        throw new Error(`No stream for ${track.id}.`);
      }
      return { url: `https://media.test/${track.id}`, sizeBytes: 1_000, resolvedAt: 0 };
    } finally {
      this.activeStreams--;
    }
  }

  streamCallsFor(trackId: string): number {
    return this.streamCalls.filter((id) => id === trackId).length;
  }
}

// ---------------------------------------------------------------------------
// FakeTranscoder
//
// Each open() takes the next scripted behaviour, or `fallback` once the
// script runs out:
//   frames   yield `count` frames, then end cleanly
//   endless  yield frames until killed
//   fail     yield `afterFrames` frames, then reject with "source dropped"
//   hang     yield nothing until killed
//   stall    yield `afterFrames` frames, then nothing until killed
// ---------------------------------------------------------------------------

export type RunBehaviour =
  | { kind: 'frames'; count: number }
  | { kind: 'endless' }
  | { kind: 'fail'; afterFrames: number }
  | { kind: 'hang' }
  | { kind: 'stall'; afterFrames: number };

export class FakeRun implements TranscodeRun {
  readonly frames: AsyncIterable<Buffer>;
  killed = false;
  private killReason: Error | undefined;
  private wake: (() => void) | null = null;

  constructor(
    private readonly behaviour: RunBehaviour,
    private readonly intervalMs: number,
  ) {
    this.frames = this.generate();
  }

  kill(reason?: Error): void {
    if (this.killed) return;
    this.killed = true;
    this.killReason = reason;
    this.wake?.();
  }

  private isSilent(sent: number): boolean {
    if (this.behaviour.kind === 'hang') return true;
    return this.behaviour.kind === 'stall' && sent >= this.behaviour.afterFrames;
  }

  private pause(silent: boolean): Promise<void> {
    return new Promise((resolve) => {
      const timer = silent
        ? null
        : setTimeout(() => {
            this.wake = null;
            resolve();
          }, this.intervalMs);
      this.wake = () => {
        if (timer) clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private async *generate(): AsyncGenerator<Buffer> {
    let sent = 0;
    for (;;) {
      if (!this.killed) await this.pause(this.isSilent(sent));
      if (this.killed) {
        if (this.killReason) throw this.killReason;
        return;
      }
      if (this.behaviour.kind === 'frames' && sent >= this.behaviour.count) return;
      if (this.behaviour.kind === 'fail' && sent >= this.behaviour.afterFrames) {
        throw new Error('source dropped');
      }
      sent++;
      yield Buffer.from([sent % 256]);
    }
  }
}

export class FakeTranscoder implements Transcoder {
  readonly requests: TranscodeRequest[] = [];
  readonly runs: FakeRun[] = [];
  readonly script: RunBehaviour[];

  constructor(
    script: RunBehaviour[] = [],
    private readonly fallback: RunBehaviour = { kind: 'endless' },
    private readonly intervalMs = 2,
  ) {
    this.script = [...script];
  }

  open(request: TranscodeRequest): TranscodeRun {
    this.requests.push(request);
    const run = new FakeRun(this.script.shift() ?? this.fallback, this.intervalMs);
    this.runs.push(run);
    return run;
  }
}

// ---------------------------------------------------------------------------
// Voice
// ---------------------------------------------------------------------------

export class FakeVoiceLink implements VoiceLink {
  readonly frames: Buffer[] = [];
  paused = false;
  flushCount = 0;
  /** What pendingFrames() reports. */
  pending = 0;
  private readonly lostListeners: Array<() => void> = [];

  constructor(
    readonly guildId: string,
    readonly channelId: string,
  ) {}

  async sendFrame(frame: Buffer): Promise<void> {
    this.frames.push(frame);
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  pendingFrames(): number {
    return this.pending;
  }

  flush(): void {
    this.flushCount++;
  }

  onLost(listener: () => void): void {
    this.lostListeners.push(listener);
  }

  /** Simulate an unrecoverable disconnect. */
  lose(): void {
    for (const listener of this.lostListeners) listener();
  }
}

export class FakeVoiceTransport implements VoiceTransport {
  readonly links: FakeVoiceLink[] = [];
  readonly disconnected: VoiceLink[] = [];
  connectCalls = 0;
  connectDelayMs = 0;
  failWith: Error | null = null;

  async connect(target: VoiceTarget): Promise<VoiceLink> {
    this.connectCalls++;
    if (this.connectDelayMs > 0) await sleep(this.connectDelayMs);
    if (this.failWith) throw this.failWith;
    const link = new FakeVoiceLink(target.guildId, target.channelId);
    this.links.push(link);
    return link;
  }

  disconnect(link: VoiceLink): void {
    this.disconnected.push(link);
  }
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export class MemorySnapshotStore implements SessionSnapshotStore {
  readonly saved: GuildSessionSnapshot[] = [];

  async saveFinalSnapshot(snapshot: GuildSessionSnapshot): Promise<void> {
    this.saved.push(snapshot);
  }
}
