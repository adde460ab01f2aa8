import { describe, it, expect } from 'vitest';
import { buildFfmpegArgs } from '../src/utils/ffmpeg';
import { DEFAULT_EFFECTS, buildFilterGraph, setVolume } from '../src/player/effects';

const source = { url: 'https://media.test/a', sizeBytes: 1_000, resolvedAt: 0 };

const OUTPUT = [
  '-ar', '48000',
  '-ac', '2',
  '-c:a', 'libopus',
  '-b:a', '96k',
  '-application', 'audio',
  '-frame_duration', '20',
  '-f', 'ogg',
  'pipe:1',
];

const RECONNECT = [
  '-reconnect', '1',
  '-reconnect_streamed', '1',
  '-reconnect_on_network_error', '1',
  '-reconnect_delay_max', '2',
  '-rw_timeout', '15000000',
];

const MEDIA = { bitrateKbps: 96, readTimeoutMs: 15_000 };

describe('buildFfmpegArgs', () => {
  it('runs without -af or -ss for a plain start', () => {
    const args = buildFfmpegArgs({ source, filters: buildFilterGraph(DEFAULT_EFFECTS), seekMs: 0 }, MEDIA);
    expect(args).toEqual([
      ...RECONNECT,
      '-i', 'https://media.test/a',
      '-analyzeduration', '0',
      '-loglevel', 'warning',
      '-vn',
      ...OUTPUT,
    ]);
  });

  it('seeks on the input and applies the filter graph', () => {
    const args = buildFfmpegArgs(
      { source, filters: buildFilterGraph(setVolume(DEFAULT_EFFECTS, 50)), seekMs: 61_500 },
      MEDIA,
    );
    expect(args).toEqual([
      ...RECONNECT,
      '-ss', '61.500',
      '-i', 'https://media.test/a',
      '-analyzeduration', '0',
      '-loglevel', 'warning',
      '-vn',
      '-af', 'volume=0.5',
      ...OUTPUT,
    ]);
  });
});
