import type { Client, VoiceState } from 'discord.js';
import type { SessionRegistry } from '../player/SessionRegistry';

// ---------------------------------------------------------------------------
// Voice membership bridge
//
// Watches voiceStateUpdate and, whenever someone joins or leaves the channel
// a session is playing in, forwards the number of listeners (bots excluded)
// to the registry. The session decides what an empty channel means.
// ---------------------------------------------------------------------------

export function onVoiceStateUpdate(
  registry: SessionRegistry,
  oldState: VoiceState,
  newState: VoiceState,
): void {
  const guild = newState.guild;
  const channelId = registry.channelOf(guild.id);
  if (!channelId) return;

  // Only movements into or out of the session's channel matter.
  if (oldState.channelId !== channelId && newState.channelId !== channelId) return;

  const channel = guild.channels.cache.get(channelId);
  if (!channel || !channel.isVoiceBased()) return;

  const listeners = channel.members.filter((member) => !member.user.bot).size;
  registry.updateMembership(guild.id, listeners);
}

export function registerMembershipBridge(client: Client, registry: SessionRegistry): void {
  client.on('voiceStateUpdate', (oldState, newState) => {
    onVoiceStateUpdate(registry, oldState, newState);
  });
}
