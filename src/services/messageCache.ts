import { type Client, type Message, type PartialMessage, RESTJSONErrorCodes, DiscordAPIError } from 'discord.js';
import { LRUCache } from 'lru-cache';
import type { LiveMessage, MessageCache } from '../types/starboard.js';
import { logger } from '../utils/logger.js';

export type MessageResolver = (guildId: string, channelId: string, messageId: string) => Promise<LiveMessage | null>;

/**
 * Bounded snapshot cache in front of the platform. Misses go to `resolve`; a
 * message that cannot be resolved is reported as `null` and is not cached.
 */
export class SnapshotMessageCache implements MessageCache {
  private cache: LRUCache<string, LiveMessage>;
  private cacheHits = 0;
  private cacheMisses = 0;

  constructor(
    private resolve: MessageResolver,
    maxSize = 1000,
    ttlMs = 3_600_000,
  ) {
    this.cache = new LRUCache<string, LiveMessage>({
      max: maxSize,
      ttl: ttlMs,
      updateAgeOnGet: true,
      allowStale: false,
    });
  }

  async fetchMessage(guildId: string, channelId: string, messageId: string): Promise<LiveMessage | null> {
    const cached = this.cache.get(messageId);
    if (cached !== undefined) {
      this.cacheHits++;
      return cached;
    }

    this.cacheMisses++;
    const message = await this.resolve(guildId, channelId, messageId);
    if (message) this.cache.set(messageId, message);
    return message;
  }

  remember(message: LiveMessage): void {
    this.cache.set(message.id, message);
  }

  /** Replaces a cached snapshot after an edit; uncached messages stay uncached. */
  refresh(message: LiveMessage): void {
    if (this.cache.has(message.id)) this.cache.set(message.id, message);
  }

  forget(messageId: string): void {
    this.cache.delete(messageId);
  }

  getMetrics(): { hits: number; misses: number; size: number } {
    return { hits: this.cacheHits, misses: this.cacheMisses, size: this.cache.size };
  }
}

export function toLiveMessage(message: Message<true>): LiveMessage {
  return {
    id: message.id,
    guildId: message.guildId,
    channelId: message.channelId,
    authorId: message.author.id,
    authorName: message.author.username,
    authorAvatarUrl: message.author.displayAvatarURL(),
    content: message.content,
    url: message.url,
    createdAt: message.createdAt,
    nsfw: 'nsfw' in message.channel ? message.channel.nsfw : false,
    attachments: [...message.attachments.values()].map(a => ({
      name: a.name,
      url: a.url,
      contentType: a.contentType,
      spoiler: a.spoiler,
    })),
  };
}

export function isGuildMessage(message: Message | PartialMessage): message is Message<true> {
  return !message.partial && message.inGuild();
}

export function createDiscordResolver(client: Client): MessageResolver {
  return async (guildId, channelId, messageId) => {
    const guild = client.guilds.cache.get(guildId);
    if (!guild) return null;

    try {
      const channel = guild.channels.cache.get(channelId) ?? (await guild.channels.fetch(channelId));
      if (!channel?.isTextBased()) return null;
      const message = await channel.messages.fetch(messageId);
      return message.inGuild() ? toLiveMessage(message) : null;
    } catch (err) {
      if (
        err instanceof DiscordAPIError &&
        (err.code === RESTJSONErrorCodes.UnknownMessage ||
          err.code === RESTJSONErrorCodes.UnknownChannel ||
          err.code === RESTJSONErrorCodes.MissingAccess)
      ) {
        return null;
      }
      logger.warn('Message lookup failed', { guildId, channelId, messageId, error: err });
      return null;
    }
  };
}
