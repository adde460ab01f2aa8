import type { EngineEvent, EngineEventBody } from '@cadence/shared';

// ---------------------------------------------------------------------------
// EngineEventBus
//
// The engine's event sink. Sessions publish TrackStarted / QueueChanged / …
// here; the API subscribes once at startup and relays every event to the
// dashboard over Socket.io.
//
// The bus is an explicit object handed to the registry, not a module global.
// Sequences count per guild and restart at 1 after the guild's SessionClosed.
//
// A listener that throws is logged and skipped. One broken consumer must not
// stop the others from seeing the event, and must never unwind into the
// session that published it.
// ---------------------------------------------------------------------------

export type EngineEventListener = (event: EngineEvent) => void;

export class EngineEventBus {
  private readonly listeners = new Set<EngineEventListener>();
  private readonly sequences = new Map<string, number>();

  /**
   * Register a listener. Returns the matching unsubscribe function.
   */
  subscribe(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(guildId: string, body: EngineEventBody): EngineEvent {
    const sequence = (this.sequences.get(guildId) ?? 0) + 1;
    if (body.type === 'SessionClosed') {
      this.sequences.delete(guildId);
    } else {
      this.sequences.set(guildId, sequence);
    }

    const event: EngineEvent = {
      ...body,
      guildId,
      sequence,
      emittedAt: new Date().toISOString(),
    };

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(
          `[EngineEventBus] Listener failed on ${event.type} for guild ${guildId}:`,
          error,
        );
      }
    }

    return event;
  }

  /** Guilds with a running sequence. */
  get trackedGuildCount(): number {
    return this.sequences.size;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
