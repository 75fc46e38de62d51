import type { DbReactionVotes, DbStarboard } from '../types/database.js';

/**
 * Counts distinct reactors whose reaction uses one of the starboard's emojis.
 * A user is counted once no matter how many star emojis they used, and the
 * author only counts when `self_star` is enabled.
 */
export function calculatePoints(
  reactions: DbReactionVotes[],
  authorId: string | null,
  starboard: Pick<DbStarboard, 'star_emojis' | 'self_star'>,
): number {
  const starEmojis = new Set(starboard.star_emojis);
  const counted = new Set<string>();

  for (const reaction of reactions) {
    if (!starEmojis.has(reaction.emoji)) continue;
    for (const userId of reaction.user_ids) {
      if (!starboard.self_star && userId === authorId) continue;
      counted.add(userId);
    }
  }

  return counted.size;
}
