import type { Client, Guild } from 'discord.js';
import { guildRepository } from '../../database/repositories/guildRepository.js';
import { logger } from '../../utils/logger.js';

export async function onReady(client: Client<true>): Promise<void> {
  logger.info(`Logged in as ${client.user.tag}! Serving ${client.guilds.cache.size} guild(s).`);

  for (const guildId of client.guilds.cache.keys()) {
    guildRepository.ensure(guildId);
  }

  logger.info('Guild sync complete.');
}

export async function onGuildCreate(guild: Guild): Promise<void> {
  logger.info(`Joined guild ${guild.name} (${guild.id})`);
  guildRepository.ensure(guild.id);
}
