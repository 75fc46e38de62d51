import type {
  Emoji,
  Message,
  MessageReaction,
  PartialMessage,
  PartialMessageReaction,
  PartialUser,
  User,
} from 'discord.js';
import type { EventContext } from './context.js';
import { toLiveMessage } from '../../services/messageCache.js';
import { logger } from '../../utils/logger.js';

/** Custom emojis are identified by id, unicode emojis by the character itself. */
export function emojiToken(emoji: Pick<Emoji, 'id' | 'name'>): string | null {
  return emoji.id ?? emoji.name;
}

export async function onMessageReactionAdd(
  ctx: EventContext,
  reaction: MessageReaction | PartialMessageReaction,
  user: User | PartialUser,
): Promise<void> {
  if (user.bot) return;

  try {
    const full = reaction.partial ? await reaction.fetch() : reaction;
    const emoji = emojiToken(full.emoji);
    const message = full.message.partial ? await full.message.fetch() : full.message;
    if (!emoji || !message.inGuild()) return;

    ctx.cache.remember(toLiveMessage(message));
    await ctx.service.handleEvent({
      type: 'reaction-added',
      guildId: message.guildId,
      channelId: message.channelId,
      messageId: message.id,
      authorId: message.author.id,
      authorIsBot: message.author.bot,
      channelNsfw: 'nsfw' in message.channel ? message.channel.nsfw : false,
      emoji,
      userId: user.id,
    });
  } catch (err) {
    logger.error('Failed to handle reaction add', { messageId: reaction.message.id, error: err });
  }
}

export async function onMessageReactionRemove(
  ctx: EventContext,
  reaction: MessageReaction | PartialMessageReaction,
  user: User | PartialUser,
): Promise<void> {
  const guildId = reaction.message.guildId;
  const emoji = emojiToken(reaction.emoji);
  if (user.bot || !guildId || !emoji) return;

  await ctx.service.handleEvent({
    type: 'reaction-removed',
    guildId,
    messageId: reaction.message.id,
    emoji,
    userId: user.id,
  });
}

export async function onMessageReactionRemoveAll(ctx: EventContext, message: Message | PartialMessage): Promise<void> {
  if (!message.guildId) return;
  await ctx.service.handleEvent({ type: 'reactions-cleared', guildId: message.guildId, messageId: message.id });
}

export async function onMessageReactionRemoveEmoji(
  ctx: EventContext,
  reaction: MessageReaction | PartialMessageReaction,
): Promise<void> {
  const guildId = reaction.message.guildId;
  const emoji = emojiToken(reaction.emoji);
  if (!guildId || !emoji) return;

  await ctx.service.handleEvent({ type: 'reactions-cleared', guildId, messageId: reaction.message.id, emoji });
}
