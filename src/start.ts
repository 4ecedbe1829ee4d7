import { buildServer } from './app.js';
import { config, getConfigStatus } from './config/index.js';
import { ActivityLog } from './services/operations/activity.js';
import { createAlbumRepository, createArtworkSource } from './services/operations/factory.js';
import { LibraryManager } from './services/operations/manager.js';
import { logger } from './utils/logger.js';

export function createManager(activity: ActivityLog = new ActivityLog(logger)): LibraryManager {
  return new LibraryManager({
    repository: () => createAlbumRepository(config),
    artwork: () => createArtworkSource(config),
    activity,
    decorateDelayMs: config.spotify.requestDelayMs,
  });
}

export async function start(): Promise<void> {
  const configStatus = getConfigStatus(config);
  const manager = createManager();
  const server = await buildServer({ manager, configStatus, logger });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await server.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  if (!configStatus.notionApiKey || !configStatus.notionDatabase) {
    logger.warn('Notion credentials are missing; album actions will fail until NOTION_API_KEY and NOTION_DATABASE_ID are set');
  }

  const address = await server.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Dashboard available at ${address}`);
}
