import type { Reconciler, ReconcileOutcome } from './reconciler.js';
import { guildRepository } from '../database/repositories/guildRepository.js';
import { memberRepository } from '../database/repositories/memberRepository.js';
import { messageRepository } from '../database/repositories/messageRepository.js';
import { reactionRepository } from '../database/repositories/reactionRepository.js';
import { starboardMessageRepository } from '../database/repositories/starboardMessageRepository.js';
import { starboardRepository } from '../database/repositories/starboardRepository.js';
import { userRepository } from '../database/repositories/userRepository.js';
import type { DbMessage, DbReactionVotes, DbStarboardMessage, RandomStarredFilters } from '../types/database.js';
import type { StarboardEvent, StarboardStore } from '../types/starboard.js';
import { logger } from '../utils/logger.js';

type EventOf<T extends StarboardEvent['type']> = Extract<StarboardEvent, { type: T }>;

export interface StarboardUpdate {
  starboardId: string;
  outcome: ReconcileOutcome | 'failed';
}

export interface StarboardService {
  handleEvent(event: StarboardEvent): Promise<void>;
  onReactionAdded(event: EventOf<'reaction-added'>): Promise<void>;
  onReactionRemoved(event: EventOf<'reaction-removed'>): Promise<void>;
  onReactionsCleared(event: EventOf<'reactions-cleared'>): Promise<void>;
  onMessageEdited(event: EventOf<'message-edited'>): Promise<void>;
  onMessageDeleted(event: EventOf<'message-deleted'>): Promise<void>;
  onResync(event: EventOf<'resync'>): Promise<void>;
  updateMessage(message: DbMessage): Promise<StarboardUpdate[]>;
  resolveOriginal(messageId: string): DbMessage | undefined;
  setForced(messageId: string, starboardId: string, forced: boolean): Promise<boolean>;
  setFrozen(messageId: string, frozen: boolean): Promise<boolean>;
  setTrashed(messageId: string, trashed: boolean): Promise<boolean>;
  randomStarred(guildId: string, filters?: RandomStarredFilters): DbStarboardMessage | undefined;
}

export interface StarboardServiceDeps {
  store: StarboardStore;
  reconciler: Reconciler;
}

/** Users with at least one star emoji among `votes`. */
function starringUsers(votes: DbReactionVotes[], starEmojis: Set<string>): Set<string> {
  const users = new Set<string>();
  for (const vote of votes) {
    if (!starEmojis.has(vote.emoji)) continue;
    for (const userId of vote.user_ids) users.add(userId);
  }
  return users;
}

// A user gives one star per message, however many star emojis they use.
function hasOtherStar(messageId: string, userId: string, emoji: string, starEmojis: Set<string>): boolean {
  for (const other of starEmojis) {
    if (other !== emoji && reactionRepository.hasUser(messageId, other, userId)) return true;
  }
  return false;
}

function adjustStars(message: DbMessage, giverId: string, delta: 1 | -1): void {
  if (!message.author_id || message.author_id === giverId) return;
  memberRepository.adjustStars(giverId, message.author_id, message.guild_id, delta);
}

export function createStarboardService({ store, reconciler }: StarboardServiceDeps): StarboardService {
  const service: StarboardService = {
    async handleEvent(event) {
      try {
        switch (event.type) {
          case 'reaction-added':
            return await service.onReactionAdded(event);
          case 'reaction-removed':
            return await service.onReactionRemoved(event);
          case 'reactions-cleared':
            return await service.onReactionsCleared(event);
          case 'message-edited':
            return await service.onMessageEdited(event);
          case 'message-deleted':
            return await service.onMessageDeleted(event);
          case 'resync':
            return await service.onResync(event);
        }
      } catch (err) {
        logger.error('Failed to process starboard event', {
          type: event.type,
          guildId: event.guildId,
          messageId: event.messageId,
          error: err,
        });
      }
    },

    async onReactionAdded(event) {
      const starEmojis = starboardRepository.getStarEmojis(event.guildId);
      if (!starEmojis.has(event.emoji)) return;

      let message = service.resolveOriginal(event.messageId);
      if (!message) {
        if (store.findStarboardMessage(event.messageId)) return;
        guildRepository.ensure(event.guildId);
        userRepository.ensure(event.authorId, event.authorIsBot);
        messageRepository.ensure({
          id: event.messageId,
          guild_id: event.guildId,
          channel_id: event.channelId,
          author_id: event.authorId,
          is_nsfw: event.channelNsfw,
        });
        message = store.getMessage(event.messageId);
        if (!message) return;
      }

      userRepository.ensure(event.userId, false);
      const added = reactionRepository.addUser(message.id, event.emoji, event.userId);
      if (added && !hasOtherStar(message.id, event.userId, event.emoji, starEmojis)) {
        adjustStars(message, event.userId, 1);
      }

      await service.updateMessage(message);
    },

    async onReactionRemoved(event) {
      const message = service.resolveOriginal(event.messageId);
      if (!message) return;

      const removed = reactionRepository.removeUser(message.id, event.emoji, event.userId);
      const starEmojis = starboardRepository.getStarEmojis(message.guild_id);
      if (removed && starEmojis.has(event.emoji) && !hasOtherStar(message.id, event.userId, event.emoji, starEmojis)) {
        adjustStars(message, event.userId, -1);
      }

      await service.updateMessage(message);
    },

    async onReactionsCleared(event) {
      const message = service.resolveOriginal(event.messageId);
      if (!message) return;

      // Clearing the mirror's reactions leaves the votes on the source intact.
      if (message.id === event.messageId) {
        const starEmojis = starboardRepository.getStarEmojis(message.guild_id);
        const votes = reactionRepository.getVotes(message.id);
        const kept = event.emoji === undefined ? [] : votes.filter(v => v.emoji !== event.emoji);
        const stillStarring = starringUsers(kept, starEmojis);

        reactionRepository.clear(message.id, event.emoji);
        for (const userId of starringUsers(votes, starEmojis)) {
          if (!stillStarring.has(userId)) adjustStars(message, userId, -1);
        }
      }
      await service.updateMessage(message);
    },

    async onMessageEdited(event) {
      const message = store.getMessage(event.messageId);
      if (!message) return;
      await service.updateMessage(message);
    },

    async onMessageDeleted(event) {
      const message = service.resolveOriginal(event.messageId);
      if (!message) return;
      await service.updateMessage(message);
    },

    async onResync(event) {
      const message = service.resolveOriginal(event.messageId);
      if (!message) {
        logger.debug('Resync requested for an unknown message', { messageId: event.messageId });
        return;
      }
      await service.updateMessage(message);
    },

    async updateMessage(message) {
      const updates: StarboardUpdate[] = [];
      for (const starboard of store.getStarboards(message.guild_id)) {
        try {
          updates.push({ starboardId: starboard.id, outcome: await reconciler.reconcile(message, starboard) });
        } catch (err) {
          logger.error('Starboard reconciliation failed', {
            guildId: message.guild_id,
            messageId: message.id,
            starboardId: starboard.id,
            error: err,
          });
          updates.push({ starboardId: starboard.id, outcome: 'failed' });
        }
      }
      return updates;
    },

    /** Maps a starboard message back to the message it mirrors. */
    resolveOriginal(messageId) {
      const link = store.findStarboardMessage(messageId);
      return store.getMessage(link ? link.orig_id : messageId);
    },

    async setForced(messageId, starboardId, forced) {
      const message = service.resolveOriginal(messageId);
      if (!message) return false;
      messageRepository.setForced(message.id, starboardId, forced);
      await service.onResync({ type: 'resync', guildId: message.guild_id, messageId: message.id });
      return true;
    },

    async setFrozen(messageId, frozen) {
      const message = service.resolveOriginal(messageId);
      if (!message) return false;
      messageRepository.setFrozen(message.id, frozen);
      await service.onResync({ type: 'resync', guildId: message.guild_id, messageId: message.id });
      return true;
    },

    async setTrashed(messageId, trashed) {
      const message = service.resolveOriginal(messageId);
      if (!message) return false;
      messageRepository.setTrashed(message.id, trashed);
      logger.info(`Message ${message.id} ${trashed ? 'trashed' : 'untrashed'}`);
      await service.onResync({ type: 'resync', guildId: message.guild_id, messageId: message.id });
      return true;
    },

    randomStarred(guildId, filters) {
      return starboardMessageRepository.findRandom(guildId, filters);
    },
  };

  return service;
}
