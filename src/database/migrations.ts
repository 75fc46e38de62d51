import type Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';

export function runMigrations(db: Database.Database): void {
  logger.info('Running database migrations...');

  db.exec(`
    CREATE TABLE IF NOT EXISTS guilds (
      id TEXT PRIMARY KEY,
      log_channel_id TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      is_bot INTEGER NOT NULL DEFAULT 0,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS members (
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      guild_id TEXT NOT NULL REFERENCES guilds(id) ON DELETE CASCADE,
      stars_given INTEGER NOT NULL DEFAULT 0,
      stars_received INTEGER NOT NULL DEFAULT 0,
      xp INTEGER NOT NULL DEFAULT 0,
      level INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (user_id, guild_id)
    );

    CREATE TABLE IF NOT EXISTS starboards (
      id TEXT PRIMARY KEY,
      guild_id TEXT NOT NULL REFERENCES guilds(id) ON DELETE CASCADE,
      required INTEGER NOT NULL DEFAULT 3,
      required_remove INTEGER NOT NULL DEFAULT 0,
      self_star INTEGER NOT NULL DEFAULT 0,
      allow_bots INTEGER NOT NULL DEFAULT 1,
      allow_nsfw INTEGER NOT NULL DEFAULT 0,
      link_edits INTEGER NOT NULL DEFAULT 1,
      link_deletes INTEGER NOT NULL DEFAULT 0,
      star_emojis TEXT NOT NULL DEFAULT '["⭐"]',
      display_emoji TEXT NOT NULL DEFAULT '⭐',
      color INTEGER,
      regex TEXT NOT NULL DEFAULT '',
      exclude_regex TEXT NOT NULL DEFAULT '',
      autoreact INTEGER NOT NULL DEFAULT 1
    );

    CREATE INDEX IF NOT EXISTS idx_starboards_guild_id ON starboards(guild_id);

    CREATE TABLE IF NOT EXISTS messages (
      id TEXT PRIMARY KEY,
      guild_id TEXT NOT NULL REFERENCES guilds(id) ON DELETE CASCADE,
      channel_id TEXT NOT NULL,
      author_id TEXT REFERENCES users(id) ON DELETE SET NULL,
      is_nsfw INTEGER NOT NULL DEFAULT 0,
      forced TEXT NOT NULL DEFAULT '[]',
      trashed INTEGER NOT NULL DEFAULT 0,
      frozen INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_messages_guild_id ON messages(guild_id);

    CREATE TABLE IF NOT EXISTS starboard_messages (
      id TEXT PRIMARY KEY,
      orig_id TEXT NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
      starboard_id TEXT NOT NULL REFERENCES starboards(id) ON DELETE CASCADE,
      points INTEGER,
      UNIQUE(orig_id, starboard_id)
    );

    CREATE INDEX IF NOT EXISTS idx_starboard_messages_starboard_id ON starboard_messages(starboard_id);

    CREATE TABLE IF NOT EXISTS reactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id TEXT NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
      emoji TEXT NOT NULL,
      UNIQUE(message_id, emoji)
    );

    CREATE TABLE IF NOT EXISTS reaction_users (
      reaction_id INTEGER NOT NULL REFERENCES reactions(id) ON DELETE CASCADE,
      user_id TEXT REFERENCES users(id) ON DELETE SET NULL,
      UNIQUE(reaction_id, user_id)
    );

    CREATE INDEX IF NOT EXISTS idx_reaction_users_user_id ON reaction_users(user_id);
  `);

  logger.info('Database migrations complete.');
}
