import { describe, expect, it } from 'vitest';
import { calculatePoints } from '../../../src/starboard/points.js';
import type { DbReactionVotes } from '../../../src/types/database.js';

const starboard = { star_emojis: ['⭐', '🌟'], self_star: false };

describe('calculatePoints', () => {
  it('excludes the author unless self_star is enabled', () => {
    const reactions: DbReactionVotes[] = [{ emoji: '⭐', user_ids: ['u', 'a', 'b', 'c'] }];

    expect(calculatePoints(reactions, 'u', starboard)).toBe(3);
    expect(calculatePoints(reactions, 'u', { ...starboard, self_star: true })).toBe(4);
  });

  it('counts a user once across every star emoji', () => {
    const reactions: DbReactionVotes[] = [
      { emoji: '⭐', user_ids: ['a', 'b'] },
      { emoji: '🌟', user_ids: ['a', 'c'] },
    ];

    expect(calculatePoints(reactions, 'u', starboard)).toBe(3);
  });

  it('ignores emojis that are not star emojis', () => {
    const reactions: DbReactionVotes[] = [
      { emoji: '👍', user_ids: ['a', 'b', 'c'] },
      { emoji: '⭐', user_ids: ['d'] },
    ];

    expect(calculatePoints(reactions, 'u', starboard)).toBe(1);
  });

  it('does not depend on reaction or user order', () => {
    const reactions: DbReactionVotes[] = [
      { emoji: '⭐', user_ids: ['a', 'u', 'b'] },
      { emoji: '🌟', user_ids: ['c', 'a'] },
    ];
    const permuted: DbReactionVotes[] = [
      { emoji: '🌟', user_ids: ['a', 'c'] },
      { emoji: '⭐', user_ids: ['b', 'u', 'a'] },
    ];

    expect(calculatePoints(permuted, 'u', starboard)).toBe(calculatePoints(reactions, 'u', starboard));
    expect(calculatePoints(reactions, 'u', starboard)).toBe(3);
  });

  it('counts every reactor when the author is unknown', () => {
    const reactions: DbReactionVotes[] = [{ emoji: '⭐', user_ids: ['u', 'a'] }];

    expect(calculatePoints(reactions, null, starboard)).toBe(2);
  });

  it('returns zero without reactions', () => {
    expect(calculatePoints([], 'u', starboard)).toBe(0);
  });
});
