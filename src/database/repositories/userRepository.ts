import { getDb } from '../client.js';
import type { DbUser } from '../../types/database.js';

interface UserRow {
  id: string;
  is_bot: number;
  created_at: string;
}

export const userRepository = {
  ensure(id: string, isBot: boolean): void {
    getDb().prepare(`
      INSERT INTO users (id, is_bot) VALUES (@id, @is_bot)
      ON CONFLICT(id) DO UPDATE SET is_bot = excluded.is_bot
    `).run({ id, is_bot: isBot ? 1 : 0 });
  },

  findById(id: string): DbUser | undefined {
    const row = getDb().prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
    return row ? { ...row, is_bot: row.is_bot === 1 } : undefined;
  },

  delete(id: string): void {
    getDb().prepare('DELETE FROM users WHERE id = ?').run(id);
  },
};
