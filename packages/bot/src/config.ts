// ---------------------------------------------------------------------------
// Engine configuration
//
// Every tuning knob of the engine, read from environment variables. The API
// entry point loads dotenv before calling startBot(), so by the time this
// runs the values are already on process.env.
//
// Malformed values throw; there is no fallback to the default.
// ---------------------------------------------------------------------------

export interface CacheConfig {
  capacityBytes: number;
  ttlMs: number;
  sweepIntervalMs: number;
}

export interface PipelineConfig {
  /** Max wait for the first audio frame of a run. */
  startTimeoutMs: number;
  /**
   * Max wait for the next frame once a run has played. Also handed to FFmpeg
   * as -rw_timeout.
   */
  readTimeoutMs: number;
  /** Consecutive failing attempts (first launch included) before Errored. */
  maxAttempts: number;
  /** Reattach delay is backoffBaseMs * 2^(failures - 1). */
  backoffBaseMs: number;
  /** Duration of one encoded frame; FFmpeg is told to emit 20 ms Opus frames. */
  frameDurationMs: number;
}

export interface PreloadConfig {
  enabled: boolean;
  depth: number;
  /** Process-wide cap on concurrent preload resolves. 0 = per-session only. */
  globalConcurrency: number;
}

export interface SessionConfig {
  emptyChannelGraceMs: number;
  idleTimeoutMs: number;
  maxQueueSize: number;
}

export interface MediaConfig {
  ffmpegPath: string;
  ytdlpPath: string;
  bitrateKbps: number;
}

export interface EngineConfig {
  cache: CacheConfig;
  pipeline: PipelineConfig;
  preload: PreloadConfig;
  session: SessionConfig;
  media: MediaConfig;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}").`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`${name} must be true or false (got "${raw}").`);
  }
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Builds the engine configuration from an environment map (process.env by
 * default). Defaults mirror a small self-hosted deployment.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    cache: {
      capacityBytes: readInt(env, 'CACHE_CAPACITY_MB', 500, 1) * 1024 * 1024,
      ttlMs: readInt(env, 'CACHE_TTL_MS', 30 * 60_000, 1),
      sweepIntervalMs: readInt(env, 'CACHE_SWEEP_INTERVAL_MS', 60_000, 1),
    },
    pipeline: {
      startTimeoutMs: readInt(env, 'PIPELINE_START_TIMEOUT_MS', 10_000, 1),
      readTimeoutMs: readInt(env, 'PIPELINE_READ_TIMEOUT_MS', 15_000, 1),
      maxAttempts: readInt(env, 'PIPELINE_MAX_ATTEMPTS', 3, 1),
      backoffBaseMs: readInt(env, 'PIPELINE_BACKOFF_BASE_MS', 500),
      frameDurationMs: 20,
    },
    preload: {
      enabled: readBool(env, 'PRELOAD_ENABLED', true),
      depth: readInt(env, 'PRELOAD_DEPTH', 2, 1),
      globalConcurrency: readInt(env, 'PRELOAD_GLOBAL_CONCURRENCY', 0),
    },
    session: {
      emptyChannelGraceMs: readInt(env, 'VOICE_EMPTY_GRACE_MS', 60_000),
      idleTimeoutMs: readInt(env, 'SESSION_IDLE_TIMEOUT_MS', 300_000),
      maxQueueSize: readInt(env, 'MAX_QUEUE_SIZE', 1000, 1),
    },
    media: {
      ffmpegPath: readString(env, 'FFMPEG_PATH', 'ffmpeg'),
      ytdlpPath: readString(env, 'YTDLP_PATH', 'yt-dlp'),
      bitrateKbps: readInt(env, 'AUDIO_BITRATE_KBPS', 96, 8),
    },
  };
}
