import { Pool } from 'pg';

// ---------------------------------------------------------------------------
// db.ts
//
// Lazily created pg Pool singleton. Only the session snapshot store talks to
// the database; when DATABASE_URL is unset the engine runs without
// persistence and this module is never touched.
// ---------------------------------------------------------------------------

let _pool: Pool | null = null;

export function getPool(connectionString: string): Pool {
  if (!_pool) {
    _pool = new Pool({ connectionString, max: 5 });
    _pool.on('error', (error) => {
      console.error('❌  Idle database client error:', error);
    });
  }
  return _pool;
}

/**
 * Run a trivial query so a bad DATABASE_URL fails at startup rather than on
 * the first session teardown.
 */
export async function verifyConnection(pool: Pool): Promise<void> {
  await pool.query('SELECT 1');
}

export async function closePool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
}
