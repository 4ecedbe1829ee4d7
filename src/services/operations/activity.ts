import { formatClock } from '../../utils/index.js';
import type { Logger } from '../../utils/logger.js';

export const LOG_LEVELS = ['INFO', 'SUCCESS', 'WARNING', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Recent activity shown on the dashboard. Keeps the last `capacity` entries
 * and mirrors each one to the process logger.
 */
export class ActivityLog {
  private entries: LogEntry[] = [];

  constructor(
    private readonly logger?: Pick<Logger, 'info' | 'warn' | 'error'>,
    private readonly capacity: number = 100,
    private readonly now: () => Date = () => new Date()
  ) {}

  add(message: string, level: LogLevel = 'INFO'): LogEntry {
    const entry: LogEntry = { timestamp: formatClock(this.now()), level, message };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries = this.entries.slice(-this.capacity);
    }

    if (this.logger) {
      if (level === 'ERROR') this.logger.error(message);
      else if (level === 'WARNING') this.logger.warn(message);
      else this.logger.info(message);
    }

    return entry;
  }

  info(message: string): LogEntry {
    return this.add(message, 'INFO');
  }

  success(message: string): LogEntry {
    return this.add(message, 'SUCCESS');
  }

  warning(message: string): LogEntry {
    return this.add(message, 'WARNING');
  }

  error(message: string): LogEntry {
    return this.add(message, 'ERROR');
  }

  /** Newest first */
  list(level?: LogLevel, limit?: number): LogEntry[] {
    const filtered = level ? this.entries.filter((entry) => entry.level === level) : this.entries;
    const newestFirst = [...filtered].reverse();
    return limit === undefined ? newestFirst : newestFirst.slice(0, limit);
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
