import { getDb } from '../client.js';
import type { DbStarboardMessage, RandomStarredFilters } from '../../types/database.js';

export const starboardMessageRepository = {
  create(mirrorId: string, origId: string, starboardId: string): void {
    getDb()
      .prepare('INSERT INTO starboard_messages (id, orig_id, starboard_id) VALUES (?, ?, ?)')
      .run(mirrorId, origId, starboardId);
  },

  findByOrig(origId: string, starboardId: string): DbStarboardMessage | undefined {
    return getDb()
      .prepare<[string, string], DbStarboardMessage>(
        'SELECT * FROM starboard_messages WHERE orig_id = ? AND starboard_id = ?',
      )
      .get(origId, starboardId);
  },

  findAllByOrig(origId: string): DbStarboardMessage[] {
    return getDb()
      .prepare<[string], DbStarboardMessage>('SELECT * FROM starboard_messages WHERE orig_id = ?')
      .all(origId);
  },

  findById(mirrorId: string): DbStarboardMessage | undefined {
    return getDb()
      .prepare<[string], DbStarboardMessage>('SELECT * FROM starboard_messages WHERE id = ?')
      .get(mirrorId);
  },

  setPoints(mirrorId: string, points: number): void {
    getDb().prepare('UPDATE starboard_messages SET points = ? WHERE id = ?').run(points, mirrorId);
  },

  delete(mirrorId: string): void {
    getDb().prepare('DELETE FROM starboard_messages WHERE id = ?').run(mirrorId);
  },

  /** Picks one mirrored, non-trashed message of the guild matching every given filter. */
  findRandom(guildId: string, filters: RandomStarredFilters = {}): DbStarboardMessage | undefined {
    return getDb().prepare<
      [{ guild_id: string; starboard_id: string | null; min_points: number; author_id: string | null; channel_id: string | null }],
      DbStarboardMessage
    >(`
      SELECT sm.* FROM starboard_messages sm
      JOIN messages m ON m.id = sm.orig_id
      WHERE m.guild_id = @guild_id
        AND m.trashed = 0
        AND (@starboard_id IS NULL OR sm.starboard_id = @starboard_id)
        AND COALESCE(sm.points, 0) >= @min_points
        AND (@author_id IS NULL OR m.author_id = @author_id)
        AND (@channel_id IS NULL OR m.channel_id = @channel_id)
      ORDER BY RANDOM()
      LIMIT 1
    `).get({
      guild_id: guildId,
      starboard_id: filters.starboardId ?? null,
      min_points: filters.minPoints ?? 0,
      author_id: filters.authorId ?? null,
      channel_id: filters.channelId ?? null,
    });
  },
};
