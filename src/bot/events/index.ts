import type { Client } from 'discord.js';
import { Events } from 'discord.js';
import type { EventContext } from './context.js';
import { onReady, onGuildCreate } from './ready.js';
import {
  onMessageReactionAdd,
  onMessageReactionRemove,
  onMessageReactionRemoveAll,
  onMessageReactionRemoveEmoji,
} from './messageReaction.js';
import { onMessageUpdate } from './messageUpdate.js';
import { onMessageDelete, onMessageDeleteBulk } from './messageDelete.js';

export function registerEvents(client: Client, ctx: EventContext): void {
  client.once(Events.ClientReady, onReady);
  client.on(Events.GuildCreate, onGuildCreate);
  client.on(Events.MessageReactionAdd, (reaction, user) => onMessageReactionAdd(ctx, reaction, user));
  client.on(Events.MessageReactionRemove, (reaction, user) => onMessageReactionRemove(ctx, reaction, user));
  client.on(Events.MessageReactionRemoveAll, message => onMessageReactionRemoveAll(ctx, message));
  client.on(Events.MessageReactionRemoveEmoji, reaction => onMessageReactionRemoveEmoji(ctx, reaction));
  client.on(Events.MessageUpdate, (_oldMessage, newMessage) => onMessageUpdate(ctx, newMessage));
  client.on(Events.MessageDelete, message => onMessageDelete(ctx, message));
  client.on(Events.MessageBulkDelete, messages => onMessageDeleteBulk(ctx, [...messages.values()]));
}
