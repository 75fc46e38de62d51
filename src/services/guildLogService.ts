import { type Client, EmbedBuilder } from 'discord.js';
import { config } from '../config.js';
import { guildRepository } from '../database/repositories/guildRepository.js';
import type { Notifier, NotifySeverity } from '../types/starboard.js';
import { logger } from '../utils/logger.js';

const ERROR_COLOR = 0xed4245;

const TITLES: Record<NotifySeverity, string> = {
  error: 'Error',
  info: 'Info',
};

export function buildLogEmbed(text: string, severity: NotifySeverity): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(TITLES[severity])
    .setDescription(text)
    .setColor(severity === 'error' ? ERROR_COLOR : config.bot.themeColor)
    .setTimestamp();
}

/**
 * Operator-facing notifications. Always logged; additionally posted to the guild's
 * log channel when one is configured. Delivery never throws back into the caller.
 */
export function createGuildLogNotifier(client: Client): Notifier {
  async function deliver(guildId: string, text: string, severity: NotifySeverity): Promise<void> {
    const logChannelId = guildRepository.findById(guildId)?.log_channel_id;
    if (!logChannelId) return;

    const guild = client.guilds.cache.get(guildId);
    const channel = guild?.channels.cache.get(logChannelId);
    if (!channel?.isTextBased()) return;

    await channel.send({ embeds: [buildLogEmbed(text, severity)] });
  }

  return (guildId, text, severity) => {
    if (severity === 'error') {
      logger.warn(`[guild ${guildId}] ${text}`);
    } else {
      logger.info(`[guild ${guildId}] ${text}`);
    }

    deliver(guildId, text, severity).catch(err => {
      logger.warn('Failed to deliver guild log message', { guildId, error: err });
    });
  };
}
