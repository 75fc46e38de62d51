import { getDb } from '../client.js';
import type { DbGuild } from '../../types/database.js';

export const guildRepository = {
  ensure(id: string): void {
    getDb().prepare('INSERT INTO guilds (id) VALUES (?) ON CONFLICT(id) DO NOTHING').run(id);
  },

  findById(id: string): DbGuild | undefined {
    return getDb().prepare<[string], DbGuild>('SELECT * FROM guilds WHERE id = ?').get(id);
  },

  setLogChannel(id: string, channelId: string | null): void {
    this.ensure(id);
    getDb().prepare('UPDATE guilds SET log_channel_id = ? WHERE id = ?').run(channelId, id);
  },

  delete(id: string): void {
    getDb().prepare('DELETE FROM guilds WHERE id = ?').run(id);
  },
};
