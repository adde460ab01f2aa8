import type {
  FilterGraphSpec,
  GuildSessionSnapshot,
  Platform,
  TrackDescriptor,
} from '@cadence/shared';

// ---------------------------------------------------------------------------
// Collaborator interfaces
//
// The engine only talks to the outside world through these. Production
// implementations live in utils/ytdlp.ts (resolver), utils/ffmpeg.ts
// (transcoder), voice/DiscordVoiceTransport.ts (voice) and
// lib/snapshotStore.ts (persistence); tests substitute in-process fakes.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * A playable media source behind a track's stream handle. For YouTube, the
 * short-lived CDN URL yt-dlp prints with -g. This is what the stream cache
 * stores and what the transcoder opens.
 */
export interface ResolvedStream {
  url: string;
  /** Best estimate of the media size, used for cache accounting. */
  sizeBytes: number;
  resolvedAt: number;
}

export interface TrackRequest {
  query: string;
  platformHint?: Platform;
  requestedBy: string;
}

export interface ResolvedPlaylist {
  title: string;
  tracks: TrackDescriptor[];
}

export interface TrackResolver {
  /**
   * Turn a user query into a track. Rejects with TrackNotFoundError or
   * PlatformUnavailableError.
   */
  resolve(request: TrackRequest): Promise<TrackDescriptor>;

  /**
   * Expand a playlist URL into at most `limit` tracks, in playlist order.
   * Resolves null when the query is not a playlist.
   */
  resolvePlaylist(request: TrackRequest, limit: number): Promise<ResolvedPlaylist | null>;

  /**
   * Turn a track's stream handle into something the transcoder can open.
   */
  resolveStream(track: TrackDescriptor, signal?: AbortSignal): Promise<ResolvedStream>;
}

// ---------------------------------------------------------------------------
// Transcoder
// ---------------------------------------------------------------------------

export interface TranscodeRequest {
  source: ResolvedStream;
  filters: FilterGraphSpec;
  /** Input seek, in track time. */
  seekMs: number;
}

/**
 * One running transcoding process. `frames` yields encoded Opus packets, one
 * per 20 ms frame, and ends when the source ends. A read failure surfaces as
 * a rejection from the iterator.
 */
export interface TranscodeRun {
  readonly frames: AsyncIterable<Buffer>;
  /**
   * Terminate the process. With a reason, the frame iterator rejects with it;
   * without one it simply ends. Safe to call more than once.
   */
  kill(reason?: Error): void;
}

export interface Transcoder {
  open(request: TranscodeRequest): TranscodeRun;
}

// ---------------------------------------------------------------------------
// Voice transport
// ---------------------------------------------------------------------------

export interface VoiceTarget {
  guildId: string;
  channelId: string;
}

export interface VoiceLink {
  readonly guildId: string;
  readonly channelId: string;
  /**
   * Queue one encoded frame for sending. Resolves once the transport has room
   * for more, so a caller awaiting it is paced by the voice connection.
   */
  sendFrame(frame: Buffer): Promise<void>;
  setPaused(paused: boolean): void;
  /** Frames accepted by sendFrame() but not yet played out. */
  pendingFrames(): number;
  /** Drop any buffered frames immediately. */
  flush(): void;
  /** Register a callback for an unexpected, unrecoverable disconnect. */
  onLost(listener: () => void): void;
}

export interface VoiceTransport {
  connect(target: VoiceTarget): Promise<VoiceLink>;
  disconnect(link: VoiceLink): void;
}

// ---------------------------------------------------------------------------
// Persistence hook
// ---------------------------------------------------------------------------

export interface SessionSnapshotStore {
  saveFinalSnapshot(snapshot: GuildSessionSnapshot): Promise<void>;
}
