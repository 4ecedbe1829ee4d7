import { OperationInProgressError } from '../../utils/errors.js';

export const OPERATIONS = ['set_covers', 'sort_albums', 'prune_ranks'] as const;
export type OperationName = (typeof OPERATIONS)[number];

export type OperationStatus = 'idle' | 'running' | 'success' | 'partial' | 'error';

export interface TrackerSnapshot {
  isRunning: boolean;
  running: OperationName | null;
  lastOperation: OperationName | null;
  statuses: Record<OperationName, OperationStatus>;
}

function idleStatuses(): Record<OperationName, OperationStatus> {
  return { set_covers: 'idle', sort_albums: 'idle', prune_ranks: 'idle' };
}

export function operationLabel(name: OperationName): string {
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** One operation at a time; everything is user-triggered. */
export class OperationTracker {
  private statuses = idleStatuses();
  private running: OperationName | null = null;
  private lastOperation: OperationName | null = null;

  async run<T>(
    name: OperationName,
    task: () => Promise<T>,
    outcome: (result: T) => 'success' | 'partial' = () => 'success'
  ): Promise<T> {
    if (this.running) {
      throw new OperationInProgressError(this.running);
    }

    this.running = name;
    this.statuses[name] = 'running';

    try {
      const result = await task();
      this.statuses[name] = outcome(result);
      this.lastOperation = name;
      return result;
    } catch (error) {
      this.statuses[name] = 'error';
      throw error;
    } finally {
      this.running = null;
    }
  }

  snapshot(): TrackerSnapshot {
    return {
      isRunning: this.running !== null,
      running: this.running,
      lastOperation: this.lastOperation,
      statuses: { ...this.statuses },
    };
  }

  /** Clears finished statuses; an operation still in flight keeps running */
  reset(): void {
    this.statuses = idleStatuses();
    if (this.running) {
      this.statuses[this.running] = 'running';
    }
  }
}
