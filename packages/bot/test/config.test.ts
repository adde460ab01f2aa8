import { describe, it, expect } from 'vitest';
import { loadEngineConfig } from '../src/config';

describe('loadEngineConfig', () => {
  it('falls back to defaults for unset variables', () => {
    const config = loadEngineConfig({});
    expect(config.cache).toEqual({
      capacityBytes: 500 * 1024 * 1024,
      ttlMs: 1_800_000,
      sweepIntervalMs: 60_000,
    });
    expect(config.pipeline).toEqual({
      startTimeoutMs: 10_000,
      readTimeoutMs: 15_000,
      maxAttempts: 3,
      backoffBaseMs: 500,
      frameDurationMs: 20,
    });
    expect(config.preload).toEqual({ enabled: true, depth: 2, globalConcurrency: 0 });
    expect(config.session).toEqual({
      emptyChannelGraceMs: 60_000,
      idleTimeoutMs: 300_000,
      maxQueueSize: 1000,
    });
    expect(config.media).toEqual({ ffmpegPath: 'ffmpeg', ytdlpPath: 'yt-dlp', bitrateKbps: 96 });
  });

  it('reads overrides from the environment', () => {
    const config = loadEngineConfig({
      CACHE_CAPACITY_MB: '64',
      PIPELINE_MAX_ATTEMPTS: '5',
      PIPELINE_READ_TIMEOUT_MS: '4000',
      PRELOAD_ENABLED: 'no',
      PRELOAD_DEPTH: '4',
      YTDLP_PATH: '/opt/bin/yt-dlp',
    });
    expect(config.cache.capacityBytes).toBe(64 * 1024 * 1024);
    expect(config.pipeline.maxAttempts).toBe(5);
    expect(config.pipeline.readTimeoutMs).toBe(4_000);
    expect(config.preload).toEqual({ enabled: false, depth: 4, globalConcurrency: 0 });
    expect(config.media.ytdlpPath).toBe('/opt/bin/yt-dlp');
  });

  it('treats blank values as unset', () => {
    const config = loadEngineConfig({ FFMPEG_PATH: '   ', MAX_QUEUE_SIZE: '' });
    expect(config.media.ffmpegPath).toBe('ffmpeg');
    expect(config.session.maxQueueSize).toBe(1000);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadEngineConfig({ CACHE_CAPACITY_MB: 'lots' })).toThrow(
      'CACHE_CAPACITY_MB must be an integer >= 1 (got "lots").',
    );
    expect(() => loadEngineConfig({ PIPELINE_MAX_ATTEMPTS: '0' })).toThrow(
      'PIPELINE_MAX_ATTEMPTS must be an integer >= 1 (got "0").',
    );
  });

  it('rejects malformed booleans', () => {
    expect(() => loadEngineConfig({ PRELOAD_ENABLED: 'maybe' })).toThrow(
      'PRELOAD_ENABLED must be true or false (got "maybe").',
    );
  });
});
