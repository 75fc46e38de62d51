import { getDb } from '../client.js';
import { stringListSchema } from '../../starboard/settings.js';
import type { DbMessage } from '../../types/database.js';

interface MessageRow {
  id: string;
  guild_id: string;
  channel_id: string;
  author_id: string | null;
  is_nsfw: number;
  forced: string;
  trashed: number;
  frozen: number;
}

function toMessage(row: MessageRow): DbMessage {
  return {
    ...row,
    is_nsfw: row.is_nsfw === 1,
    trashed: row.trashed === 1,
    frozen: row.frozen === 1,
    forced: stringListSchema.parse(JSON.parse(row.forced)),
  };
}

export const messageRepository = {
  /** Creates the row on first sight; later calls leave moderation state untouched. */
  ensure(message: {
    id: string;
    guild_id: string;
    channel_id: string;
    author_id: string | null;
    is_nsfw: boolean;
  }): void {
    getDb().prepare(`
      INSERT INTO messages (id, guild_id, channel_id, author_id, is_nsfw)
      VALUES (@id, @guild_id, @channel_id, @author_id, @is_nsfw)
      ON CONFLICT(id) DO NOTHING
    `).run({ ...message, is_nsfw: message.is_nsfw ? 1 : 0 });
  },

  findById(id: string): DbMessage | undefined {
    const row = getDb().prepare<[string], MessageRow>('SELECT * FROM messages WHERE id = ?').get(id);
    return row ? toMessage(row) : undefined;
  },

  setForced(id: string, starboardId: string, forced: boolean): void {
    const db = getDb();
    db.transaction(() => {
      const message = this.findById(id);
      if (!message) return;
      const next = new Set(message.forced);
      if (forced) {
        next.add(starboardId);
      } else {
        next.delete(starboardId);
      }
      db.prepare('UPDATE messages SET forced = ? WHERE id = ?').run(JSON.stringify([...next]), id);
    })();
  },

  setFrozen(id: string, frozen: boolean): void {
    getDb().prepare('UPDATE messages SET frozen = ? WHERE id = ?').run(frozen ? 1 : 0, id);
  },

  setTrashed(id: string, trashed: boolean): void {
    getDb().prepare('UPDATE messages SET trashed = ? WHERE id = ?').run(trashed ? 1 : 0, id);
  },

  delete(id: string): void {
    getDb().prepare('DELETE FROM messages WHERE id = ?').run(id);
  },
};
