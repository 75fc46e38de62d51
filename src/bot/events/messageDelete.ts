import type { Message, PartialMessage } from 'discord.js';
import type { EventContext } from './context.js';

export async function onMessageDelete(ctx: EventContext, message: Message | PartialMessage): Promise<void> {
  ctx.cache.forget(message.id);
  if (!message.guildId) return;

  await ctx.service.handleEvent({ type: 'message-deleted', guildId: message.guildId, messageId: message.id });
}

export async function onMessageDeleteBulk(
  ctx: EventContext,
  messages: Array<Message | PartialMessage>,
): Promise<void> {
  for (const message of messages) {
    await onMessageDelete(ctx, message);
  }
}
