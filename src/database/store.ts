import { messageRepository } from './repositories/messageRepository.js';
import { reactionRepository } from './repositories/reactionRepository.js';
import { starboardMessageRepository } from './repositories/starboardMessageRepository.js';
import { starboardRepository } from './repositories/starboardRepository.js';
import { userRepository } from './repositories/userRepository.js';
import type { StarboardStore } from '../types/starboard.js';
import { StoreError, errorMessage } from '../utils/errors.js';

function guarded<A extends unknown[], R>(operation: string, fn: (...args: A) => R): (...args: A) => R {
  return (...args: A) => {
    try {
      return fn(...args);
    } catch (err) {
      throw new StoreError(`${operation} failed: ${errorMessage(err)}`, err);
    }
  };
}

export const sqliteStore: StarboardStore = {
  getStarboards: guarded('getStarboards', (guildId: string) => starboardRepository.findByGuild(guildId)),
  getMessage: guarded('getMessage', (id: string) => messageRepository.findById(id)),
  getUser: guarded('getUser', (id: string) => userRepository.findById(id)),
  getReactions: guarded('getReactions', (messageId: string) => reactionRepository.getVotes(messageId)),
  getStarboardMessage: guarded('getStarboardMessage', (origId: string, starboardId: string) =>
    starboardMessageRepository.findByOrig(origId, starboardId),
  ),
  findStarboardMessage: guarded('findStarboardMessage', (mirrorId: string) => starboardMessageRepository.findById(mirrorId)),
  createStarboardMessage: guarded('createStarboardMessage', (mirrorId: string, origId: string, starboardId: string) =>
    starboardMessageRepository.create(mirrorId, origId, starboardId),
  ),
  deleteStarboardMessage: guarded('deleteStarboardMessage', (mirrorId: string) => starboardMessageRepository.delete(mirrorId)),
  setPoints: guarded('setPoints', (mirrorId: string, points: number) => starboardMessageRepository.setPoints(mirrorId, points)),
};
