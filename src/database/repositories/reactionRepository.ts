import { getDb } from '../client.js';
import type { DbReactionVotes } from '../../types/database.js';

export const reactionRepository = {
  /** Returns false when the user had already reacted with this emoji. */
  addUser(messageId: string, emoji: string, userId: string): boolean {
    const db = getDb();
    return db.transaction(() => {
      db.prepare(`
        INSERT INTO reactions (message_id, emoji) VALUES (?, ?)
        ON CONFLICT(message_id, emoji) DO NOTHING
      `).run(messageId, emoji);
      const reaction = db
        .prepare<[string, string], { id: number }>('SELECT id FROM reactions WHERE message_id = ? AND emoji = ?')
        .get(messageId, emoji);
      if (!reaction) return false;
      const result = db
        .prepare('INSERT OR IGNORE INTO reaction_users (reaction_id, user_id) VALUES (?, ?)')
        .run(reaction.id, userId);
      return result.changes > 0;
    })();
  },

  /** Returns false when there was nothing to remove. */
  removeUser(messageId: string, emoji: string, userId: string): boolean {
    const result = getDb().prepare(`
      DELETE FROM reaction_users
      WHERE user_id = ? AND reaction_id IN (
        SELECT id FROM reactions WHERE message_id = ? AND emoji = ?
      )
    `).run(userId, messageId, emoji);
    return result.changes > 0;
  },

  /** Drops every reaction on the message, or only those using `emoji`. */
  clear(messageId: string, emoji?: string): void {
    if (emoji === undefined) {
      getDb().prepare('DELETE FROM reactions WHERE message_id = ?').run(messageId);
    } else {
      getDb().prepare('DELETE FROM reactions WHERE message_id = ? AND emoji = ?').run(messageId, emoji);
    }
  },

  hasUser(messageId: string, emoji: string, userId: string): boolean {
    const row = getDb().prepare(`
      SELECT 1 FROM reaction_users ru
      JOIN reactions r ON r.id = ru.reaction_id
      WHERE r.message_id = ? AND r.emoji = ? AND ru.user_id = ?
    `).get(messageId, emoji, userId);
    return row !== undefined;
  },

  /** Reactors of deleted accounts (null user) are left out. */
  getVotes(messageId: string): DbReactionVotes[] {
    const rows = getDb().prepare<[string], { emoji: string; user_id: string }>(`
      SELECT r.emoji, ru.user_id
      FROM reactions r
      JOIN reaction_users ru ON ru.reaction_id = r.id
      WHERE r.message_id = ? AND ru.user_id IS NOT NULL
      ORDER BY r.id, ru.rowid
    `).all(messageId);

    const byEmoji = new Map<string, string[]>();
    for (const row of rows) {
      const users = byEmoji.get(row.emoji) ?? [];
      users.push(row.user_id);
      byEmoji.set(row.emoji, users);
    }
    return [...byEmoji].map(([emoji, user_ids]) => ({ emoji, user_ids }));
  },
};
