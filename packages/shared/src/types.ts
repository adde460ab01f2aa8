// ---------------------------------------------------------------------------
// @cadence/shared: types
//
// This is the single source of truth for types that cross package boundaries.
// The engine (bot package) and the API both import from here. Never duplicate
// these types.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Platform
//
// Where a track's stream handle points. 'direct' covers plain media URLs that
// FFmpeg can open without any platform-specific resolution.
// ---------------------------------------------------------------------------
export type Platform = 'youtube' | 'soundcloud' | 'direct';

export const PLATFORMS: readonly Platform[] = ['youtube', 'soundcloud', 'direct'];

// ---------------------------------------------------------------------------
// TrackDescriptor
//
// A resolved, playable track. Immutable once the resolver hands it out.
// `id` is a stable hash of platform + stream handle, so the same source always
// maps to the same cache key regardless of who requested it.
// ---------------------------------------------------------------------------
export interface TrackDescriptor {
  readonly id: string;
  readonly title: string;
  readonly durationMs: number;
  readonly streamHandle: string;
  readonly platform: Platform;
  readonly requestedBy: string;
  readonly thumbnailUrl: string | null;
}

// ---------------------------------------------------------------------------
// LoopMode
//
// off    Queue plays through once, then the session goes idle.
// track  Current track repeats until explicitly skipped.
// queue  After the last track the queue wraps back to the first.
// ---------------------------------------------------------------------------
export type LoopMode = 'off' | 'track' | 'queue';

export const LOOP_MODES: readonly LoopMode[] = ['off', 'track', 'queue'];

// ---------------------------------------------------------------------------
// EffectState
//
// Per-session audio effects. bassBoostLevel is an integer in [0, 20] and
// volume an integer percentage in [0, 200]; anything else is rejected.
// ---------------------------------------------------------------------------
export interface EffectState {
  readonly bassBoostLevel: number;
  readonly karaoke: boolean;
  readonly nightcore: boolean;
  readonly threeD: boolean;
  readonly echo: boolean;
  readonly volume: number;
}

/** The on/off effects, i.e. every EffectState key holding a boolean. */
export type ToggleEffect = 'karaoke' | 'nightcore' | 'threeD' | 'echo';

export const TOGGLE_EFFECTS: readonly ToggleEffect[] = ['karaoke', 'nightcore', 'threeD', 'echo'];

/** Named effect states a session can switch to in one step. */
export type EffectPreset = 'gaming' | 'movie' | 'party';

export const EFFECT_PRESETS: readonly EffectPreset[] = ['gaming', 'movie', 'party'];

// ---------------------------------------------------------------------------
// FilterGraphSpec
//
// Ordered, transcoder-agnostic description of the audio-transform stages.
// Built from an EffectState by the effect chain builder.
// ---------------------------------------------------------------------------
export type FilterStageName = 'bass' | 'karaoke' | 'nightcore' | 'echo' | 'rotation' | 'volume';

export interface FilterStage {
  readonly name: FilterStageName;
  readonly params: Readonly<Record<string, number>>;
}

export interface FilterGraphSpec {
  readonly stages: readonly FilterStage[];
}

// ---------------------------------------------------------------------------
// Playback / session state
// ---------------------------------------------------------------------------
export type PipelineState =
  | 'idle'
  | 'starting'
  | 'playing'
  | 'paused'
  | 'stalled'
  | 'finished'
  | 'errored';

export type SessionStatus = 'active' | 'idle' | 'closed';

export interface QueueSnapshot {
  entries: TrackDescriptor[];
  /** null iff entries is empty. */
  currentIndex: number | null;
  loopMode: LoopMode;
}

// ---------------------------------------------------------------------------
// GuildSessionSnapshot
//
// Read-only view of one guild's session. Returned by the administrative
// surface and handed to the persistence hook when the session is torn down.
// ---------------------------------------------------------------------------
export interface GuildSessionSnapshot {
  guildId: string;
  channelId: string;
  status: SessionStatus;
  playback: PipelineState;
  positionMs: number;
  current: TrackDescriptor | null;
  queue: QueueSnapshot;
  effects: EffectState;
  filterGraph: FilterGraphSpec;
  lastActivityAt: string;
}

// ---------------------------------------------------------------------------
// Engine events
//
// Payload of the event sink relayed to the dashboard.
// Delivery is at-least-once: `sequence` increases per guild so a consumer can
// drop anything it has already seen.
// ---------------------------------------------------------------------------
export type SessionCloseReason = 'leave' | 'channel-empty' | 'idle-timeout' | 'voice-lost' | 'shutdown';

export interface EngineEventPayloads {
  TrackStarted: { track: TrackDescriptor; positionMs: number };
  TrackFinished: { track: TrackDescriptor };
  TrackErrored: { track: TrackDescriptor; code: string; reason: string };
  QueueChanged: { queue: QueueSnapshot };
  EffectsChanged: { effects: EffectState; filterGraph: FilterGraphSpec };
  SessionClosed: { reason: SessionCloseReason; snapshot: GuildSessionSnapshot };
}

export type EngineEventType = keyof EngineEventPayloads;

/** The type + payload part of an event, discriminated on `type`. */
export type EngineEventBody = {
  [K in EngineEventType]: { type: K; payload: EngineEventPayloads[K] };
}[EngineEventType];

export type EngineEvent = EngineEventBody & {
  guildId: string;
  sequence: number;
  emittedAt: string;
};

// ---------------------------------------------------------------------------
// CacheStats
//
// Exposed on GET /api/cache for the dashboard's diagnostics panel.
// ---------------------------------------------------------------------------
export interface CacheStats {
  entries: number;
  totalBytes: number;
  capacityBytes: number;
  inFlight: number;
  hits: number;
  misses: number;
  evictions: number;
}
