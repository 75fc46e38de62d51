import { getDb } from '../client.js';
import type { DbMember } from '../../types/database.js';

export const memberRepository = {
  ensure(userId: string, guildId: string): void {
    getDb().prepare(`
      INSERT INTO members (user_id, guild_id) VALUES (?, ?)
      ON CONFLICT(user_id, guild_id) DO NOTHING
    `).run(userId, guildId);
  },

  find(userId: string, guildId: string): DbMember | undefined {
    return getDb()
      .prepare<[string, string], DbMember>('SELECT * FROM members WHERE user_id = ? AND guild_id = ?')
      .get(userId, guildId);
  },

  /** Moves one star from `giverId` to `receiverId`; a negative delta takes it back. Counters never drop below zero. */
  adjustStars(giverId: string, receiverId: string, guildId: string, delta: 1 | -1): void {
    const db = getDb();
    db.transaction(() => {
      this.ensure(giverId, guildId);
      this.ensure(receiverId, guildId);
      db.prepare(`
        UPDATE members SET stars_given = MAX(stars_given + @delta, 0)
        WHERE user_id = @user_id AND guild_id = @guild_id
      `).run({ delta, user_id: giverId, guild_id: guildId });
      db.prepare(`
        UPDATE members SET stars_received = MAX(stars_received + @delta, 0)
        WHERE user_id = @user_id AND guild_id = @guild_id
      `).run({ delta, user_id: receiverId, guild_id: guildId });
    })();
  },
};
