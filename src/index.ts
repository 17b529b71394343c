import type { Server } from 'http';
import { GrammyError } from 'grammy';
import { createBot } from './bot/index.js';
import { ConfigError, loadConfig } from './config/env.js';
import { MediaDownloader } from './services/downloader.js';
import { startLivenessServer, stopLivenessServer } from './services/liveness.js';
import { Cleanup } from './utils/cleanup.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();

  let liveness: Server | null = null;
  if (config.managedHosting) {
    liveness = startLivenessServer(config.port);
  }

  const cleanup = new Cleanup(config.downloadDir);
  await cleanup.init();
  cleanup.startPeriodicCleanup();

  const bot = createBot(config, new MediaDownloader(config));

  // Validate token first
  try {
    await bot.api.getMe();
  } catch (error) {
    if (error instanceof GrammyError && (error.error_code === 401 || error.error_code === 404)) {
      logger.error('Invalid bot token');
      process.exit(1);
    }
    throw error;
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    cleanup.stop();
    const pending: Promise<void>[] = [bot.stop()];
    if (liveness) pending.push(stopLivenessServer(liveness));
    Promise.all(pending)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await bot.start({
    onStart: (botInfo) => {
      logger.info(`Bot @${botInfo.username} is running...`);
    },
    allowed_updates: ['message', 'callback_query'],
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', error);
  } else {
    logger.error('Failed to start bot', error);
  }
  process.exit(1);
});
