import { describe, it, expect, vi, afterEach } from 'vitest';
import type { EngineEvent, GuildSessionSnapshot } from '@cadence/shared';
import { EngineEventBus } from '../src/lib/broadcast';
import { DEFAULT_EFFECTS, buildFilterGraph } from '../src/player/effects';
import { makeTrack } from './helpers/fakes';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('EngineEventBus', () => {
  it('numbers events per guild', () => {
    const bus = new EngineEventBus();
    const seen: EngineEvent[] = [];
    bus.subscribe((event) => seen.push(event));

    const track = makeTrack();
    bus.publish('g1', { type: 'TrackFinished', payload: { track } });
    bus.publish('g2', { type: 'TrackFinished', payload: { track } });
    bus.publish('g1', { type: 'TrackFinished', payload: { track } });

    expect(seen.map((e) => [e.guildId, e.sequence])).toEqual([
      ['g1', 1],
      ['g2', 1],
      ['g1', 2],
    ]);
  });

  it('restarts numbering for a guild after its session closes', () => {
    const bus = new EngineEventBus();
    const seen: EngineEvent[] = [];
    bus.subscribe((event) => seen.push(event));
    const track = makeTrack();
    const snapshot: GuildSessionSnapshot = {
      guildId: 'g1',
      channelId: 'c1',
      status: 'closed',
      playback: 'idle',
      positionMs: 0,
      current: null,
      queue: { entries: [], currentIndex: null, loopMode: 'off' },
      effects: DEFAULT_EFFECTS,
      filterGraph: buildFilterGraph(DEFAULT_EFFECTS),
      lastActivityAt: '2026-01-01T00:00:00.000Z',
    };

    bus.publish('g1', { type: 'TrackFinished', payload: { track } });
    bus.publish('g2', { type: 'TrackFinished', payload: { track } });
    bus.publish('g1', { type: 'SessionClosed', payload: { reason: 'leave', snapshot } });
    expect(bus.trackedGuildCount).toBe(1);
    bus.publish('g1', { type: 'TrackFinished', payload: { track } });

    expect(seen.map((e) => [e.guildId, e.type, e.sequence])).toEqual([
      ['g1', 'TrackFinished', 1],
      ['g2', 'TrackFinished', 1],
      ['g1', 'SessionClosed', 2],
      ['g1', 'TrackFinished', 1],
    ]);
  });

  it('keeps delivering after a listener throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new EngineEventBus();
    const after = vi.fn();
    bus.subscribe(() => {
      throw new Error('broken consumer');
    });
    bus.subscribe(after);

    bus.publish('g1', { type: 'TrackFinished', payload: { track: makeTrack() } });

    expect(after).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new EngineEventBus();
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);
    unsubscribe();
    bus.publish('g1', { type: 'TrackFinished', payload: { track: makeTrack() } });
    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount).toBe(0);
  });
});
