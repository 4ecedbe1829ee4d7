import { pino } from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'album-desk',
  level: config.server.logLevel,
});

export type Logger = typeof logger;
