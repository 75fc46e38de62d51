import 'dotenv/config';

export const config = {
  discord: {
    token: process.env.DISCORD_TOKEN ?? '',
  },
  db: {
    path: process.env.DB_PATH ?? '/config/starboard.db',
  },
  bot: {
    logLevel: process.env.LOG_LEVEL ?? 'info',
    themeColor: parseInt(process.env.THEME_COLOR ?? '0xFFE19C', 16),
  },
  starboard: {
    regexTimeoutMs: parseInt(process.env.REGEX_TIMEOUT_MS ?? '50', 10),
    messageCacheSize: parseInt(process.env.MESSAGE_CACHE_SIZE ?? '1000', 10),
    messageCacheTtlMs: parseInt(process.env.MESSAGE_CACHE_TTL_MS ?? '3600000', 10),
  },
} as const;

const required = ['DISCORD_TOKEN'];

for (const key of required) {
  if (!process.env[key]) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
}
