import type { Client, GuildTextBasedChannel } from 'discord.js';
import type { MirrorChannelGateway, MirrorTarget } from '../types/starboard.js';
import { RemoteNotFoundError, toRemoteError } from '../utils/errors.js';

export function createDiscordGateway(client: Client): MirrorChannelGateway {
  async function textChannel({ guildId, channelId }: MirrorTarget): Promise<GuildTextBasedChannel> {
    const guild = client.guilds.cache.get(guildId);
    if (!guild) throw new RemoteNotFoundError(`Guild ${guildId} is not available`);

    const channel = guild.channels.cache.get(channelId) ?? (await guild.channels.fetch(channelId));
    if (!channel?.isTextBased()) {
      throw new RemoteNotFoundError(`Starboard channel ${channelId} does not exist or is not a text channel`);
    }
    return channel;
  }

  async function call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toRemoteError(err, action);
    }
  }

  return {
    send(target, payload) {
      return call('Send starboard message', async () => {
        const channel = await textChannel(target);
        const message = await channel.send({ content: payload.content, embeds: payload.embed ? [payload.embed] : [] });
        return message.id;
      });
    },

    edit(target, mirrorId, payload) {
      return call('Edit starboard message', async () => {
        const channel = await textChannel(target);
        await channel.messages.edit(
          mirrorId,
          payload.embed ? { content: payload.content, embeds: [payload.embed] } : { content: payload.content },
        );
      });
    },

    delete(target, mirrorId) {
      return call('Delete starboard message', async () => {
        const channel = await textChannel(target);
        await channel.messages.delete(mirrorId);
      });
    },

    react(target, mirrorId, emoji) {
      return call('Autoreact', async () => {
        const channel = await textChannel(target);
        await channel.messages.react(mirrorId, emoji);
      });
    },
  };
}
