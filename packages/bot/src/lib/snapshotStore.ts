import type { GuildSessionSnapshot } from '@cadence/shared';
import type { SessionSnapshotStore } from '../player/types';

// ---------------------------------------------------------------------------
// PgSessionSnapshotStore
//
// Persists the final snapshot of every closed session to Postgres, one row
// per teardown (schema in packages/bot/sql/session_snapshots.sql). Nothing in
// the engine reads these rows back; they exist for the dashboard's history
// and for debugging why a session ended.
//
// Only `query` is used: a pg Pool fits, and tests pass a fake with that one
// method.
// ---------------------------------------------------------------------------

export interface SnapshotQueryable {
  query(text: string, values: unknown[]): Promise<unknown>;
}

export const INSERT_SNAPSHOT_SQL = `
  INSERT INTO session_snapshots (guild_id, channel_id, track_count, closed_at, snapshot)
  VALUES ($1, $2, $3, $4, $5::jsonb)
`;

export class PgSessionSnapshotStore implements SessionSnapshotStore {
  constructor(
    private readonly db: SnapshotQueryable,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async saveFinalSnapshot(snapshot: GuildSessionSnapshot): Promise<void> {
    await this.db.query(INSERT_SNAPSHOT_SQL, [
      snapshot.guildId,
      snapshot.channelId,
      snapshot.queue.entries.length,
      this.now().toISOString(),
      JSON.stringify(snapshot),
    ]);
  }
}
