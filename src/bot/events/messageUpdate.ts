import type { Message, PartialMessage } from 'discord.js';
import type { EventContext } from './context.js';
import { toLiveMessage } from '../../services/messageCache.js';
import { logger } from '../../utils/logger.js';

export async function onMessageUpdate(ctx: EventContext, newMessage: Message | PartialMessage): Promise<void> {
  if (!newMessage.guildId) return;

  try {
    // Fetch the full message if it's partial (uncached)
    const full = newMessage.partial ? await newMessage.fetch() : newMessage;
    if (!full.inGuild()) return;

    ctx.cache.refresh(toLiveMessage(full));
    await ctx.service.handleEvent({ type: 'message-edited', guildId: full.guildId, messageId: full.id });
  } catch (err) {
    logger.error('Failed to handle message edit', { messageId: newMessage.id, error: err });
  }
}
