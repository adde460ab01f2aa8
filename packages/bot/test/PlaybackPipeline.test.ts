import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { TrackDescriptor } from '@cadence/shared';
import { PlaybackPipeline } from '../src/player/PlaybackPipeline';
import type { PipelineEvent } from '../src/player/PlaybackPipeline';
import { StreamCache } from '../src/player/StreamCache';
import { DEFAULT_EFFECTS, buildFilterGraph, setEffect } from '../src/player/effects';
import {
  InvalidParameterError,
  InvalidStateError,
  PlaybackFailedError,
  ResourceBusyError,
  StreamStalledError,
} from '../src/errors';
import type { ResolvedStream } from '../src/player/types';
import {
  FakeResolver,
  FakeTranscoder,
  FakeVoiceLink,
  makeTrack,
  testConfig,
  waitFor,
  sleep,
} from './helpers/fakes';
import type { RunBehaviour } from './helpers/fakes';

const NO_EFFECTS = buildFilterGraph(DEFAULT_EFFECTS);

interface Harness {
  pipeline: PlaybackPipeline;
  link: FakeVoiceLink;
  resolver: FakeResolver;
  transcoder: FakeTranscoder;
  cache: StreamCache<ResolvedStream>;
  events: PipelineEvent[];
}

function setup(
  script: RunBehaviour[] = [],
  fallback: RunBehaviour = { kind: 'endless' },
  pipelineConfig: Parameters<typeof testConfig>[0] = {},
): Harness {
  const link = new FakeVoiceLink('g1', 'c1');
  const resolver = new FakeResolver();
  const transcoder = new FakeTranscoder(script, fallback);
  const cache = new StreamCache<ResolvedStream>({ capacityBytes: 1_000_000, ttlMs: 60_000 });
  const events: PipelineEvent[] = [];
  const pipeline = new PlaybackPipeline({
    guildId: 'g1',
    link,
    transcoder,
    resolver,
    cache,
    config: testConfig(pipelineConfig).pipeline,
    onEvent: (event) => events.push(event),
  });
  return { pipeline, link, resolver, transcoder, cache, events };
}

let harness: Harness | null = null;

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  if (harness) {
    harness.pipeline.stop();
    await harness.pipeline.whenDone();
    harness = null;
  }
  vi.restoreAllMocks();
});

function eventTypes(events: PipelineEvent[]): string[] {
  return events.map((e) => e.type);
}

async function startPlaying(h: Harness, track: TrackDescriptor = makeTrack()): Promise<void> {
  h.pipeline.start(track, NO_EFFECTS);
  await h.pipeline.untilSettled();
  expect(h.pipeline.currentState).toBe('playing');
}

describe('PlaybackPipeline', () => {
  it('plays a track to the end and reports started then finished', async () => {
    harness = setup([{ kind: 'frames', count: 3 }]);
    const track = makeTrack();

    harness.pipeline.start(track, NO_EFFECTS);
    expect(harness.pipeline.currentState).toBe('starting');
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('finished');
    expect(harness.link.frames).toHaveLength(3);
    expect(eventTypes(harness.events)).toEqual(['started', 'finished']);
    expect(harness.events[0]).toMatchObject({ type: 'started', track, positionMs: 0 });
    expect(harness.resolver.streamCalls).toEqual([track.id]);
    expect(harness.transcoder.requests[0]).toMatchObject({
      source: { url: `https://media.test/${track.id}` },
      seekMs: 0,
    });
  });

  it('refuses a second start while a run is live', async () => {
    harness = setup();
    await startPlaying(harness);
    expect(() => harness?.pipeline.start(makeTrack({ id: 'b' }), NO_EFFECTS)).toThrow(
      ResourceBusyError,
    );
  });

  it('reattaches at the position reached after a read failure', async () => {
    harness = setup([
      { kind: 'fail', afterFrames: 5 },
      { kind: 'frames', count: 3 },
    ]);
    const track = makeTrack();

    harness.pipeline.start(track, NO_EFFECTS);
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('finished');
    expect(harness.transcoder.requests.map((r) => r.seekMs)).toEqual([0, 100]);
    expect(harness.link.frames).toHaveLength(8);
    // A reattach is not a new track.
    expect(eventTypes(harness.events)).toEqual(['started', 'finished']);
    // The stream URL is re-resolved in case it was the thing that broke.
    expect(harness.resolver.streamCalls).toEqual([track.id, track.id]);
  });

  it('reports errored after the attempt budget is spent', async () => {
    harness = setup([], { kind: 'fail', afterFrames: 0 });
    const track = makeTrack({ title: 'Broken Song' });

    harness.pipeline.start(track, NO_EFFECTS);
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('errored');
    expect(harness.transcoder.requests).toHaveLength(3);
    expect(eventTypes(harness.events)).toEqual(['errored']);

    const event = harness.events[0];
    if (event.type !== 'errored') throw new Error('expected an errored event');
    expect(event.error).toBeInstanceOf(PlaybackFailedError);
    expect(event.error.code).toBe('Errored');
    expect(event.error.message).toBe(
      'Playback of "Broken Song" failed after 3 attempt(s): source dropped',
    );
  });

  it('fails without retrying when no audio arrives before the start timeout', async () => {
    harness = setup([], { kind: 'hang' }, { pipeline: { startTimeoutMs: 40 } });
    const track = makeTrack({ title: 'Silent Song' });

    harness.pipeline.start(track, NO_EFFECTS);
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('errored');
    expect(harness.transcoder.requests).toHaveLength(1);
    const event = harness.events[0];
    if (event.type !== 'errored') throw new Error('expected an errored event');
    expect(event.error.message).toBe('"Silent Song" produced no audio within 40 ms.');
    expect(event.error.cause).toBeInstanceOf(StreamStalledError);
  });

  it('reattaches when the source goes silent mid-track', async () => {
    harness = setup(
      [
        { kind: 'stall', afterFrames: 5 },
        { kind: 'frames', count: 3 },
      ],
      { kind: 'endless' },
      { pipeline: { readTimeoutMs: 30 } },
    );
    const track = makeTrack({ title: 'Quiet Song' });

    harness.pipeline.start(track, NO_EFFECTS);
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('finished');
    expect(harness.transcoder.runs[0].killed).toBe(true);
    expect(harness.transcoder.requests.map((r) => r.seekMs)).toEqual([0, 100]);
    expect(harness.link.frames).toHaveLength(8);
    expect(eventTypes(harness.events)).toEqual(['started', 'finished']);
    expect(console.warn).toHaveBeenCalledWith(
      '[Pipeline:g1] No frame from "Quiet Song" for 30 ms; killing the transcoder.',
    );
  });

  it('reports errored when the source stays silent through every reattach', async () => {
    harness = setup(
      [{ kind: 'stall', afterFrames: 5 }],
      { kind: 'stall', afterFrames: 0 },
      { pipeline: { readTimeoutMs: 30 } },
    );
    const track = makeTrack({ title: 'Quiet Song' });

    harness.pipeline.start(track, NO_EFFECTS);
    await harness.pipeline.whenDone();

    expect(harness.pipeline.currentState).toBe('errored');
    expect(harness.transcoder.requests.map((r) => r.seekMs)).toEqual([0, 100, 100]);
    expect(eventTypes(harness.events)).toEqual(['started', 'errored']);

    const event = harness.events[1];
    if (event.type !== 'errored') throw new Error('expected an errored event');
    expect(event.error.message).toBe(
      'Playback of "Quiet Song" failed after 3 attempt(s): "Quiet Song" went silent for 30 ms.',
    );
    expect(event.error.cause).toBeInstanceOf(StreamStalledError);
  });

  it('does not count a pause as silence', async () => {
    harness = setup([], { kind: 'endless' }, { pipeline: { readTimeoutMs: 20 } });
    await startPlaying(harness);
    await waitFor(() => (harness?.link.frames.length ?? 0) >= 2);

    harness.pipeline.pause();
    await sleep(80);

    expect(harness.pipeline.currentState).toBe('paused');
    expect(harness.transcoder.requests).toHaveLength(1);
    expect(harness.transcoder.runs[0].killed).toBe(false);
  });

  it('pauses and resumes without losing frames', async () => {
    harness = setup();
    await startPlaying(harness);
    await waitFor(() => (harness?.link.frames.length ?? 0) >= 2);

    harness.pipeline.pause();
    expect(harness.pipeline.currentState).toBe('paused');
    expect(harness.link.paused).toBe(true);
    const sentAtPause = harness.link.frames.length;

    await sleep(30);
    expect(harness.link.frames.length).toBe(sentAtPause);

    // Pausing twice is a no-op.
    harness.pipeline.pause();

    harness.pipeline.resume();
    expect(harness.pipeline.currentState).toBe('playing');
    expect(harness.link.paused).toBe(false);
    await waitFor(() => (harness?.link.frames.length ?? 0) > sentAtPause);
  });

  it('rejects pause and resume while idle', () => {
    harness = setup();
    expect(() => harness?.pipeline.pause()).toThrow(InvalidStateError);
    expect(() => harness?.pipeline.resume()).toThrow('Cannot resume while idle.');
  });

  it('seeks by restarting the transcoder at the new offset', async () => {
    harness = setup();
    await startPlaying(harness);

    harness.pipeline.seek(60_000);
    expect(harness.transcoder.runs[0].killed).toBe(true);
    expect(harness.pipeline.positionMs()).toBe(60_000);

    await harness.pipeline.untilSettled();
    expect(harness.pipeline.currentState).toBe('playing');
    expect(harness.transcoder.requests).toHaveLength(2);
    expect(harness.transcoder.requests[1].seekMs).toBe(60_000);
    // A seek is not a new track either.
    expect(eventTypes(harness.events)).toEqual(['started']);
  });

  it('validates seek targets', async () => {
    harness = setup();
    await startPlaying(harness);
    expect(() => harness?.pipeline.seek(180_001)).toThrow(InvalidParameterError);
    expect(() => harness?.pipeline.seek(-1)).toThrow(
      'Seek position must be between 0 and 180000 ms (got -1).',
    );
  });

  it('refuses to seek in a live stream', async () => {
    harness = setup();
    await startPlaying(harness, makeTrack({ title: 'Radio', durationMs: 0 }));
    expect(() => harness?.pipeline.seek(1_000)).toThrow(
      '"Radio" is a live stream and cannot be seeked.',
    );
  });

  it('swaps effects at the position the listener has heard', async () => {
    harness = setup();
    await startPlaying(harness);
    await waitFor(() => (harness?.link.frames.length ?? 0) >= 10);

    harness.link.pending = 2;
    const heard = harness.pipeline.positionMs();
    const nightcore = buildFilterGraph(setEffect(DEFAULT_EFFECTS, 'nightcore', true));

    expect(harness.pipeline.applyEffects(nightcore)).toBe(true);
    expect(harness.link.flushCount).toBe(1);

    await harness.pipeline.untilSettled();
    expect(harness.transcoder.requests).toHaveLength(2);
    expect(harness.transcoder.requests[1].seekMs).toBe(heard);
    expect(harness.transcoder.requests[1].filters).toEqual(nightcore);
  });

  it('ignores effect changes while idle', () => {
    harness = setup();
    expect(harness.pipeline.applyEffects(NO_EFFECTS)).toBe(false);
    expect(harness.transcoder.requests).toHaveLength(0);
  });

  it('subtracts frames still buffered in the link from the position', async () => {
    harness = setup([{ kind: 'frames', count: 3 }]);
    harness.pipeline.start(makeTrack(), NO_EFFECTS);
    await harness.pipeline.whenDone();

    harness.link.pending = 1;
    expect(harness.pipeline.positionMs()).toBe(40);
  });

  it('stops from any state without emitting further events', async () => {
    harness = setup();
    await startPlaying(harness);

    harness.pipeline.stop();
    harness.pipeline.stop();
    await harness.pipeline.whenDone();
    await sleep(10);

    expect(harness.pipeline.currentState).toBe('idle');
    expect(harness.transcoder.runs[0].killed).toBe(true);
    expect(eventTypes(harness.events)).toEqual(['started']);
  });
});
