import { Client, GatewayIntentBits } from 'discord.js';
import { loadEngineConfig } from './config';
import type { EngineConfig } from './config';
import type { EngineEventBus } from './lib/broadcast';
import { SessionRegistry } from './player/SessionRegistry';
import { StreamCache } from './player/StreamCache';
import type { ResolvedStream, SessionSnapshotStore } from './player/types';
import { FfmpegTranscoder } from './utils/ffmpeg';
import { YtDlpResolver } from './utils/ytdlp';
import { DiscordVoiceTransport } from './voice/DiscordVoiceTransport';
import { registerMembershipBridge } from './voice/membership';

export * from './errors';
export { loadEngineConfig } from './config';
export type { EngineConfig } from './config';
export { EngineEventBus } from './lib/broadcast';
export type { EngineEventListener } from './lib/broadcast';
export { PgSessionSnapshotStore } from './lib/snapshotStore';
export type { SnapshotQueryable } from './lib/snapshotStore';
export {
  DEFAULT_EFFECTS,
  MAX_BASS_BOOST,
  MAX_VOLUME,
  buildFilterGraph,
  isToggleEffect,
  renderFilterGraph,
} from './player/effects';
export { GuildSession } from './player/GuildSession';
export type { EffectPatch, EnqueueResult } from './player/GuildSession';
export { SessionRegistry } from './player/SessionRegistry';
export type { PlayRequest, PlayResult } from './player/SessionRegistry';
export { StreamCache } from './player/StreamCache';
export type * from './player/types';
export { formatDuration } from './utils/format';

export interface BotOptions {
  events: EngineEventBus;
  config?: EngineConfig;
  snapshotStore?: SessionSnapshotStore;
}

export interface BotHandle {
  client: Client;
  registry: SessionRegistry;
  /** Close every session, then log the client out. */
  stop(): Promise<void>;
}

// ---------------------------------------------------------------------------
// startBot
//
// Builds the engine (cache, resolver, transcoder, voice transport, registry),
// wires voice membership into it and connects the Discord client. Called by
// the API's entry point, which owns the process and loads dotenv first, so
// DISCORD_BOT_TOKEN and the engine knobs are already on process.env.
//
// The registry is returned rather than stored in a module global; the API
// hands it to its routes explicitly.
// ---------------------------------------------------------------------------
export async function startBot(options: BotOptions): Promise<BotHandle> {
  const { DISCORD_BOT_TOKEN } = process.env;

  if (!DISCORD_BOT_TOKEN) {
    throw new Error('DISCORD_BOT_TOKEN is not set.');
  }

  const config = options.config ?? loadEngineConfig();

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildVoiceStates,
    ],
  });

  const registry = new SessionRegistry({
    config,
    cache: new StreamCache<ResolvedStream>(config.cache),
    resolver: new YtDlpResolver({ binary: config.media.ytdlpPath }),
    transcoder: new FfmpegTranscoder({
      binary: config.media.ffmpegPath,
      bitrateKbps: config.media.bitrateKbps,
      readTimeoutMs: config.pipeline.readTimeoutMs,
    }),
    transport: new DiscordVoiceTransport(client),
    events: options.events,
    snapshotStore: options.snapshotStore,
  });

  registerMembershipBridge(client, registry);

  client.once('clientReady', (readyClient) => {
    console.log(`✅  Bot logged in as ${readyClient.user.tag}`);
  });

  registry.start();
  await client.login(DISCORD_BOT_TOKEN);

  return {
    client,
    registry,
    async stop() {
      await registry.shutdown();
      await client.destroy();
    },
  };
}
