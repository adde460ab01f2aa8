import 'dotenv/config';
import http from 'http';
import { EngineEventBus, PgSessionSnapshotStore, startBot } from '@cadence/bot';
import type { BotHandle, SessionSnapshotStore } from '@cadence/bot';
import { createApp } from './app';
import { closePool, getPool, verifyConnection } from './lib/db';
import { closeSocket, emitEngineEvent, initSocket } from './lib/socket';

// ---------------------------------------------------------------------------
// Validate required environment variables.
// ---------------------------------------------------------------------------
const requiredVars = ['DISCORD_BOT_TOKEN', 'JWT_SECRET'];
const missing = requiredVars.filter((v) => !process.env[v]);

if (missing.length > 0) {
  console.error(`❌  Missing required environment variables: ${missing.join(', ')}`);
  console.error('    Copy .env.example to .env and fill in all values.');
  process.exit(1);
}

const PORT = parseInt(process.env.PORT ?? '3001', 10);
const WEB_UI_ORIGIN = process.env.WEB_UI_ORIGIN ?? 'http://localhost:5173';
const { DATABASE_URL } = process.env;

// ---------------------------------------------------------------------------
// Startup sequence
//
// Order matters:
//   1. Verify the database is reachable (only when DATABASE_URL is set).
//   2. Subscribe the Socket.io relay to the engine's event bus.
//   3. Start the engine and the Discord client.
//   4. Start the HTTP server (Express + Socket.io on the same port).
// ---------------------------------------------------------------------------
async function main(): Promise<void> {
  // 1. Session snapshots are optional; without a database they are dropped.
  let snapshotStore: SessionSnapshotStore | undefined;
  if (DATABASE_URL) {
    const pool = getPool(DATABASE_URL);
    try {
      await verifyConnection(pool);
      console.log('✅  Connected to database.');
    } catch (error) {
      console.error('❌  Could not connect to the database:', error);
      console.error('    Is PostgreSQL running? Try: docker compose up -d');
      process.exit(1);
    }
    snapshotStore = new PgSessionSnapshotStore(pool);
  } else {
    console.warn('⚠️  DATABASE_URL is not set; final session snapshots will not be stored.');
  }

  // 2. Relay every engine event to the dashboards.
  const events = new EngineEventBus();
  events.subscribe(emitEngineEvent);

  // 3. Start the engine. Without it the API has nothing to control.
  let bot: BotHandle;
  try {
    bot = await startBot({ events, snapshotStore });
  } catch (error) {
    console.error('❌  Failed to start the Discord bot:', error);
    process.exit(1);
  }

  // 4. Start the HTTP server.
  //    We wrap Express in a plain http.Server so Socket.io can share the same
  //    port.
  const app = createApp({ registry: bot.registry, corsOrigin: WEB_UI_ORIGIN });
  const httpServer = http.createServer(app);
  initSocket(httpServer, WEB_UI_ORIGIN);

  httpServer.listen(PORT, () => {
    console.log(`✅  API + Socket.io listening on http://localhost:${PORT}`);
  });

  // -------------------------------------------------------------------------
  // Shutdown: close every session (persisting final snapshots), then
  // Socket.io with its HTTP server, then the pool.
  // -------------------------------------------------------------------------
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down...`);

    await bot.stop();
    await closeSocket();
    await closePool();
    console.log('👋  Shutdown complete.');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('❌  Shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

main().catch((error) => {
  console.error('❌  Fatal startup error:', error);
  process.exit(1);
});
