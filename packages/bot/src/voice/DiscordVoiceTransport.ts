import { PassThrough } from 'stream';
import {
  AudioPlayerStatus,
  StreamType,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from '@discordjs/voice';
import type { AudioPlayer, VoiceConnection } from '@discordjs/voice';
import { ChannelType } from 'discord.js';
import type { Client } from 'discord.js';
import { VoiceConnectionError, describeError } from '../errors';
import type { VoiceLink, VoiceTarget, VoiceTransport } from '../player/types';

// ---------------------------------------------------------------------------
// DiscordVoiceTransport
//
// VoiceTransport on top of @discordjs/voice. Each link owns one
// VoiceConnection and one AudioPlayer. Frames from the pipeline are written
// into an object-mode PassThrough that backs an AudioResource of
// StreamType.Opus, so @discordjs/voice sends the packets as they are; no
// Node.js Opus encoder is involved.
//
// The PassThrough's highWaterMark bounds how far ahead of the listener the
// pipeline can run (~1 s per side). That bound is what keeps effect changes
// and pauses responsive, and what pendingFrames() reports.
// ---------------------------------------------------------------------------

// 50 packets ≈ 1 second of audio at 20 ms per frame.
const BUFFER_FRAMES = 50;
const READY_TIMEOUT_MS = 20_000;
const RECOVERY_WINDOW_MS = 5_000;

export class DiscordVoiceLink implements VoiceLink {
  private input: PassThrough | null = null;
  private readonly lostListeners: Array<() => void> = [];

  // Set by destroy() before connection.destroy() is called, so the Destroyed
  // handler can tell an intentional teardown from an unexpected loss.
  private intentionallyDestroyed = false;

  // Guards against multiple simultaneous reconnect attempts when the
  // Disconnected event fires in quick succession.
  private isReconnecting = false;

  private readonly player: AudioPlayer;

  constructor(
    readonly guildId: string,
    readonly channelId: string,
    private readonly connection: VoiceConnection,
  ) {
    this.player = createAudioPlayer({
      behaviors: {
        // Allow up to ~1 second of missed frames before the player gives up
        // on the resource. The default of 5 frames turns any event-loop hiccup
        // into audible choppiness.
        maxMissedFrames: 50,
      },
    });
    this.connection.subscribe(this.player);

    this.player.on('error', (error) => {
      console.error(`[VoiceLink:${this.guildId}] AudioPlayer error:`, error.message);
    });

    this.player.on(AudioPlayerStatus.AutoPaused, () => {
      console.warn(
        `[VoiceLink:${this.guildId}] AudioPlayer AutoPaused; voice connection may be temporarily unavailable.`,
      );
    });

    // Workaround: clear the UDP keepAlive interval whenever the underlying
    // networking state changes. The keepAlive heartbeat fires roughly every
    // 5 seconds and can disrupt the timing of outgoing audio packets, which
    // listeners hear as periodic stutters. Discord's WebSocket gateway keeps
    // its own heartbeat independently.
    this.connection.on('stateChange', (oldState, newState) => {
      const oldNetworking = Reflect.get(oldState, 'networking');
      const newNetworking = Reflect.get(newState, 'networking');

      const networkStateChangeHandler = (_: unknown, newNetworkState: object) => {
        const newUdp = Reflect.get(newNetworkState, 'udp');
        clearInterval(newUdp?.keepAliveInterval);
      };

      oldNetworking?.off('stateChange', networkStateChangeHandler);
      newNetworking?.on('stateChange', networkStateChangeHandler);
    });

    // Disconnected can be a transient network blip. Give Discord 5 s to start
    // reconnecting on its own; if nothing happens, destroy the connection so
    // the Destroyed handler reports the loss.
    this.connection.on(VoiceConnectionStatus.Disconnected, () => {
      this.recover().catch((err) =>
        console.error(`[VoiceLink:${this.guildId}] Recovery failed:`, err),
      );
    });

    this.connection.on(VoiceConnectionStatus.Destroyed, () => {
      console.info(`[VoiceLink:${this.guildId}] Voice connection destroyed.`);
      this.dropInput();
      this.player.stop(true);
      if (!this.intentionallyDestroyed) {
        for (const listener of this.lostListeners) listener();
      }
    });
  }

  // ---------------------------------------------------------------------------
  // VoiceLink
  // ---------------------------------------------------------------------------

  async sendFrame(frame: Buffer): Promise<void> {
    if (this.connection.state.status === VoiceConnectionStatus.Destroyed) {
      throw new VoiceConnectionError(`The voice connection of guild ${this.guildId} is gone.`);
    }

    const input = this.ensureInput();
    if (input.write(frame)) return;

    // Backpressure: wait until the player has drawn the buffer down, or until
    // the stream is dropped by flush(). Never rejects.
    await new Promise<void>((resolve) => {
      const done = () => {
        input.off('drain', done);
        input.off('close', done);
        resolve();
      };
      input.on('drain', done);
      input.on('close', done);
    });
  }

  setPaused(paused: boolean): void {
    if (paused) {
      this.player.pause();
    } else {
      this.player.unpause();
    }
  }

  pendingFrames(): number {
    if (!this.input || this.input.destroyed) return 0;
    return this.input.writableLength + this.input.readableLength;
  }

  flush(): void {
    this.dropInput();
    this.player.stop(true);
  }

  onLost(listener: () => void): void {
    this.lostListeners.push(listener);
  }

  /**
   * Intentional teardown: stop audio and leave the channel. The Destroyed
   * handler runs synchronously inside connection.destroy(), so the flag has
   * to be set first.
   */
  destroy(): void {
    this.intentionallyDestroyed = true;
    this.flush();
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }

  // ---------------------------------------------------------------------------
  // Private methods
  // ---------------------------------------------------------------------------

  /**
   * The current input stream, or a fresh one (with a fresh resource) when
   * there is none or the player dropped the previous resource after running
   * dry between tracks.
   */
  private ensureInput(): PassThrough {
    const idle = this.player.state.status === AudioPlayerStatus.Idle;
    if (this.input && !this.input.destroyed && !idle) return this.input;

    this.dropInput();
    const input = new PassThrough({ objectMode: true, highWaterMark: BUFFER_FRAMES });
    input.on('error', (err) =>
      console.error(`[VoiceLink:${this.guildId}] Frame stream error:`, err.message),
    );
    this.input = input;
    this.player.play(createAudioResource(input, { inputType: StreamType.Opus }));
    return input;
  }

  private dropInput(): void {
    this.input?.destroy();
    this.input = null;
  }

  private async recover(): Promise<void> {
    if (this.isReconnecting) return;
    this.isReconnecting = true;
    console.warn(`[VoiceLink:${this.guildId}] Voice connection disconnected; attempting recovery.`);

    try {
      await Promise.race([
        entersState(this.connection, VoiceConnectionStatus.Signalling, RECOVERY_WINDOW_MS),
        entersState(this.connection, VoiceConnectionStatus.Connecting, RECOVERY_WINDOW_MS),
      ]);
      console.info(`[VoiceLink:${this.guildId}] Voice connection is reconnecting.`);
    } catch {
      // Nothing started a reconnect. Destroy unless something else (a
      // concurrent destroy()) already did.
      if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
        console.error(`[VoiceLink:${this.guildId}] Voice connection could not recover; destroying.`);
        this.connection.destroy();
      }
    } finally {
      this.isReconnecting = false;
    }
  }
}

export class DiscordVoiceTransport implements VoiceTransport {
  constructor(private readonly client: Client) {}

  async connect(target: VoiceTarget): Promise<VoiceLink> {
    const guild = this.client.guilds.cache.get(target.guildId);
    if (!guild) {
      throw new VoiceConnectionError(`The bot is not a member of guild ${target.guildId}.`);
    }

    // Only stage and regular voice channels are joinable.
    const channel = guild.channels.cache.get(target.channelId);
    if (
      !channel ||
      (channel.type !== ChannelType.GuildVoice && channel.type !== ChannelType.GuildStageVoice)
    ) {
      throw new VoiceConnectionError(`Channel ${target.channelId} is not a voice channel.`);
    }

    const connection = joinVoiceChannel({
      channelId: channel.id,
      guildId: guild.id,
      adapterCreator: guild.voiceAdapterCreator,
      selfDeaf: true,
    });

    // Wait until the connection is ready. Without this, the first frames
    // would be written before the voice handshake is complete.
    try {
      await entersState(connection, VoiceConnectionStatus.Ready, READY_TIMEOUT_MS);
    } catch (error) {
      connection.destroy();
      throw new VoiceConnectionError(
        `Could not join "${channel.name}": ${describeError(error)}`,
        { cause: error },
      );
    }

    console.info(`[VoiceLink:${guild.id}] Joined "${channel.name}".`);
    return new DiscordVoiceLink(guild.id, channel.id, connection);
  }

  disconnect(link: VoiceLink): void {
    if (link instanceof DiscordVoiceLink) {
      link.destroy();
    }
  }
}
