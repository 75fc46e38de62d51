import { ZodError } from 'zod';
import { getDb } from '../client.js';
import { guildRepository } from './guildRepository.js';
import {
  starboardSettingsPatchSchema,
  starboardSettingsSchema,
  stringListSchema,
  type StarboardSettings,
  type StarboardSettingsInput,
  type StarboardSettingsPatch,
} from '../../starboard/settings.js';
import type { DbStarboard } from '../../types/database.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface StarboardRow {
  id: string;
  guild_id: string;
  required: number;
  required_remove: number;
  self_star: number;
  allow_bots: number;
  allow_nsfw: number;
  link_edits: number;
  link_deletes: number;
  star_emojis: string;
  display_emoji: string;
  color: number | null;
  regex: string;
  exclude_regex: string;
  autoreact: number;
}

function toStarboard(row: StarboardRow): DbStarboard {
  return {
    ...row,
    self_star: row.self_star === 1,
    allow_bots: row.allow_bots === 1,
    allow_nsfw: row.allow_nsfw === 1,
    link_edits: row.link_edits === 1,
    link_deletes: row.link_deletes === 1,
    autoreact: row.autoreact === 1,
    star_emojis: stringListSchema.parse(JSON.parse(row.star_emojis)),
  };
}

function parseSettings<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid starboard settings: ${issues.join('; ')}`, issues);
    }
    throw err;
  }
}

function toColumns(settings: StarboardSettingsPatch): Record<string, string | number | null> {
  const columns: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value === undefined) continue;
    if (typeof value === 'boolean') {
      columns[key] = value ? 1 : 0;
    } else if (Array.isArray(value)) {
      columns[key] = JSON.stringify(value);
    } else {
      columns[key] = value;
    }
  }
  return columns;
}

function warnOnOverlappingThresholds(id: string, starboard: Pick<StarboardSettings, 'required' | 'required_remove'>): void {
  if (starboard.required_remove >= starboard.required) {
    logger.warn('Starboard removal threshold is not below its add threshold; ties resolve to removal', {
      starboardId: id,
      required: starboard.required,
      requiredRemove: starboard.required_remove,
    });
  }
}

function findExisting(id: string): StarboardRow {
  const row = getDb().prepare<[string], StarboardRow>('SELECT * FROM starboards WHERE id = ?').get(id);
  if (!row) throw new ConfigurationError(`Starboard ${id} does not exist`);
  return row;
}

export const starboardRepository = {
  create(guildId: string, channelId: string, input: StarboardSettingsInput = {}): DbStarboard {
    const settings = parseSettings(() => starboardSettingsSchema.parse(input));
    warnOnOverlappingThresholds(channelId, settings);

    guildRepository.ensure(guildId);
    const columns = { id: channelId, guild_id: guildId, ...toColumns(settings) };
    const names = Object.keys(columns);
    getDb()
      .prepare(`INSERT INTO starboards (${names.join(', ')}) VALUES (${names.map(n => `@${n}`).join(', ')})`)
      .run(columns);

    logger.info(`Starboard ${channelId} created in guild ${guildId}`);
    return toStarboard(findExisting(channelId));
  },

  update(id: string, patch: StarboardSettingsPatch): DbStarboard {
    const settings = parseSettings(() => starboardSettingsPatchSchema.parse(patch));
    const columns = toColumns(settings);
    const names = Object.keys(columns);

    if (names.length > 0) {
      getDb()
        .prepare(`UPDATE starboards SET ${names.map(n => `${n} = @${n}`).join(', ')} WHERE id = @id`)
        .run({ ...columns, id });
    }

    const starboard = toStarboard(findExisting(id));
    warnOnOverlappingThresholds(id, starboard);
    return starboard;
  },

  findById(id: string): DbStarboard | undefined {
    const row = getDb().prepare<[string], StarboardRow>('SELECT * FROM starboards WHERE id = ?').get(id);
    return row ? toStarboard(row) : undefined;
  },

  findByGuild(guildId: string): DbStarboard[] {
    return getDb()
      .prepare<[string], StarboardRow>('SELECT * FROM starboards WHERE guild_id = ? ORDER BY rowid')
      .all(guildId)
      .map(toStarboard);
  },

  /** Every emoji that counts on at least one starboard of the guild. */
  getStarEmojis(guildId: string): Set<string> {
    const emojis = new Set<string>();
    for (const starboard of this.findByGuild(guildId)) {
      for (const emoji of starboard.star_emojis) emojis.add(emoji);
    }
    return emojis;
  },

  delete(id: string): void {
    getDb().prepare('DELETE FROM starboards WHERE id = ?').run(id);
  },
};
