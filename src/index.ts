import { config } from './config.js';
import { createDiscordClient } from './bot/client.js';
import { registerEvents } from './bot/events/index.js';
import { closeDb, getDb } from './database/client.js';
import { sqliteStore } from './database/store.js';
import { createDiscordGateway } from './services/discordGateway.js';
import { createGuildLogNotifier } from './services/guildLogService.js';
import { SnapshotMessageCache, createDiscordResolver } from './services/messageCache.js';
import { createReconciler } from './starboard/reconciler.js';
import { createStarboardService } from './starboard/starboardService.js';
import { logger } from './utils/logger.js';

const VERSION = '0.1.0';

async function main() {
  logger.info(`Starting starboard bot v${VERSION}`);

  getDb();

  const client = createDiscordClient();
  const cache = new SnapshotMessageCache(
    createDiscordResolver(client),
    config.starboard.messageCacheSize,
    config.starboard.messageCacheTtlMs,
  );
  const reconciler = createReconciler({
    store: sqliteStore,
    cache,
    channels: createDiscordGateway(client),
    notify: createGuildLogNotifier(client),
    regexTimeoutMs: config.starboard.regexTimeoutMs,
    themeColor: config.bot.themeColor,
  });
  const service = createStarboardService({ store: sqliteStore, reconciler });

  registerEvents(client, { service, cache });

  const shutdown = () => {
    logger.info('Shutting down...');
    void client.destroy();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await client.login(config.discord.token);
}

main().catch((err) => {
  logger.error('Fatal error during startup', { error: err });
  process.exit(1);
});
