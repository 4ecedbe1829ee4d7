import { start } from './start.js';
import { logger } from './utils/logger.js';

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
