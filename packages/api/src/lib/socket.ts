import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type { EngineEvent } from '@cadence/shared';

// ---------------------------------------------------------------------------
// socket.ts
//
// Socket.io server singleton.
//
// Usage:
//   1. Call initSocket(httpServer) once in the API entry point after creating
//      the HTTP server. This attaches Socket.io and stores the instance.
//   2. Subscribe emitEngineEvent to the engine's event bus so every session
//      event reaches the dashboards watching that guild.
//
// Dashboards watch a guild by joining its room:
//   guild:subscribe    (guildId)  join   "guild:<guildId>"
//   guild:unsubscribe  (guildId)  leave  "guild:<guildId>"
//
// Every engine event goes out as "engine:event" to the guild's room only.
// ---------------------------------------------------------------------------

let _io: SocketIOServer | null = null;

export function guildRoom(guildId: string): string {
  return `guild:${guildId}`;
}

/**
 * Attach Socket.io to the HTTP server and store the instance.
 * Must be called before any events are emitted.
 */
export function initSocket(httpServer: HTTPServer, origin: string): SocketIOServer {
  _io = new SocketIOServer(httpServer, {
    cors: {
      origin,
      credentials: true,
    },
  });

  _io.on('connection', (socket) => {
    console.log(`🔌  Socket connected: ${socket.id}`);

    socket.on('guild:subscribe', (guildId: unknown) => {
      if (typeof guildId !== 'string' || !guildId) return;
      void socket.join(guildRoom(guildId));
    });

    socket.on('guild:unsubscribe', (guildId: unknown) => {
      if (typeof guildId !== 'string' || !guildId) return;
      void socket.leave(guildRoom(guildId));
    });

    socket.on('disconnect', (reason) => {
      console.log(`🔌  Socket disconnected: ${socket.id} (${reason})`);
    });
  });

  console.log(`✅  Socket.io initialised (CORS origin: ${origin})`);
  return _io;
}

/**
 * Disconnect every client and close the HTTP server Socket.io is attached to.
 */
export function closeSocket(): Promise<void> {
  const io = _io;
  _io = null;
  if (!io) return Promise.resolve();
  return new Promise((resolve) => {
    io.close(() => resolve());
  });
}

/**
 * Relay one engine event to the dashboards subscribed to its guild.
 */
export function emitEngineEvent(event: EngineEvent): void {
  _io?.to(guildRoom(event.guildId)).emit('engine:event', event);
}
