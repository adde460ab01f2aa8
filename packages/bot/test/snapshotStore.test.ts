import { describe, it, expect } from 'vitest';
import type { GuildSessionSnapshot } from '@cadence/shared';
import { INSERT_SNAPSHOT_SQL, PgSessionSnapshotStore } from '../src/lib/snapshotStore';
import type { SnapshotQueryable } from '../src/lib/snapshotStore';
import { DEFAULT_EFFECTS } from '../src/player/effects';
import { formatDuration } from '../src/utils/format';
import { makeTrack } from './helpers/fakes';

class RecordingDb implements SnapshotQueryable {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];

  async query(text: string, values: unknown[]): Promise<unknown> {
    this.calls.push({ text, values });
    return { rowCount: 1 };
  }
}

describe('PgSessionSnapshotStore', () => {
  it('inserts one row per closed session', async () => {
    const db = new RecordingDb();
    const store = new PgSessionSnapshotStore(db, () => new Date('2024-05-01T12:00:00.000Z'));
    const track = makeTrack();
    const snapshot: GuildSessionSnapshot = {
      guildId: 'g1',
      channelId: 'c1',
      status: 'closed',
      playback: 'idle',
      positionMs: 0,
      current: track,
      queue: { entries: [track], currentIndex: 0, loopMode: 'off' },
      effects: DEFAULT_EFFECTS,
      filterGraph: { stages: [] },
      lastActivityAt: '2024-05-01T11:59:00.000Z',
    };

    await store.saveFinalSnapshot(snapshot);

    expect(db.calls).toEqual([
      {
        text: INSERT_SNAPSHOT_SQL,
        values: ['g1', 'c1', 1, '2024-05-01T12:00:00.000Z', JSON.stringify(snapshot)],
      },
    ]);
  });
});

describe('formatDuration', () => {
  it('renders minutes and padded seconds', () => {
    expect(formatDuration(90_000)).toBe('1:30');
    expect(formatDuration(3_661_000)).toBe('61:01');
    expect(formatDuration(5_999)).toBe('0:05');
  });

  it('renders live streams as live', () => {
    expect(formatDuration(0)).toBe('live');
  });
});
