import { errorMessage } from '../../utils/errors.js';
import { AlbumDecorator, type DecorateOptions, type DecoratorHooks } from '../library/decorator.js';
import { pruneRankOptions, type PruneResult } from '../library/options.js';
import { AlbumSorter, type SorterHooks } from '../library/sorter.js';
import { computeStats } from '../library/stats.js';
import type {
  Album,
  AlbumRepository,
  AlbumStats,
  ArtworkSource,
  DecorateSummary,
  SortRequest,
  SortResult,
} from '../library/types.js';
import { ActivityLog } from './activity.js';
import { OperationTracker, type TrackerSnapshot } from './tracker.js';

export interface LibraryManagerOptions {
  /** Built on first use so a missing credential only fails the action that needs it */
  repository: () => AlbumRepository;
  artwork: () => ArtworkSource;
  activity: ActivityLog;
  tracker?: OperationTracker;
  decorateDelayMs: number;
  wait?: (ms: number) => Promise<void>;
}

export interface ManagerStatus extends TrackerSnapshot {
  stats: AlbumStats | null;
}

/**
 * Runs the user-triggered actions: one at a time, every step written to the
 * activity log, failures recorded and rethrown to the caller.
 */
export class LibraryManager {
  readonly activity: ActivityLog;
  private readonly tracker: OperationTracker;
  private repositoryInstance: AlbumRepository | null = null;
  private artworkInstance: ArtworkSource | null = null;
  private lastStats: AlbumStats | null = null;

  constructor(private readonly options: LibraryManagerOptions) {
    this.activity = options.activity;
    this.tracker = options.tracker ?? new OperationTracker();
  }

  private get repository(): AlbumRepository {
    if (!this.repositoryInstance) {
      this.repositoryInstance = this.options.repository();
      this.activity.info('Connected to album database');
    }
    return this.repositoryInstance;
  }

  private get artwork(): ArtworkSource {
    if (!this.artworkInstance) {
      this.artworkInstance = this.options.artwork();
    }
    return this.artworkInstance;
  }

  status(): ManagerStatus {
    return { ...this.tracker.snapshot(), stats: this.lastStats };
  }

  async listAlbums(): Promise<Album[]> {
    return this.repository.fetchAlbums();
  }

  async refreshStats(): Promise<AlbumStats> {
    try {
      const stats = await this.loadStats();
      this.activity.info('Album statistics updated');
      return stats;
    } catch (error) {
      this.activity.error(`Failed to update album stats: ${errorMessage(error)}`);
      throw error;
    }
  }

  private async loadStats(): Promise<AlbumStats> {
    const repository = this.repository;
    const albums = await repository.fetchAlbums();
    this.lastStats = computeStats(albums, (album) => repository.isListened(album));
    return this.lastStats;
  }

  async sortAlbums(request: SortRequest, hooks: SorterHooks = {}): Promise<SortResult> {
    this.activity.info(
      `Starting album sorting (key=${request.key}, direction=${request.direction}, compact=${request.compact}, startingRank=${request.startingRank})...`
    );

    try {
      const result = await this.tracker.run(
        'sort_albums',
        () =>
          new AlbumSorter(this.repository, {
            ...hooks,
            onFetched: (albums) => {
              this.activity.info(`Fetched ${albums.length} albums`);
              hooks.onFetched?.(albums);
            },
          }).run(request),
        (r) => (r.failed.length > 0 ? 'partial' : 'success')
      );

      for (const failure of result.failed) {
        this.activity.warning(`Failed to update '${failure.title}': ${failure.error}`);
      }
      if (result.failed.length > 0) {
        this.activity.warning(
          `Album sorting finished with ${result.failed.length} failed update(s); ${result.updated} of ${result.total - result.unchanged} written`
        );
      } else {
        this.activity.success(
          `Album sorting completed! Ranked ${result.total} albums (${result.updated} updated, ${result.unchanged} unchanged)`
        );
      }

      await this.refreshStatsQuietly();
      return result;
    } catch (error) {
      this.activity.error(`Error during album sorting: ${errorMessage(error)}`);
      throw error;
    }
  }

  async setCovers(options: DecorateOptions = {}, hooks: DecoratorHooks = {}): Promise<DecorateSummary> {
    const updateExisting = options.updateExisting ?? false;
    this.activity.info(`Starting album decoration (updateExisting=${updateExisting})...`);

    try {
      const summary = await this.tracker.run(
        'set_covers',
        () =>
          new AlbumDecorator(
            this.repository,
            this.artwork,
            { delayMs: this.options.decorateDelayMs, wait: this.options.wait },
            hooks
          ).run({ updateExisting }),
        (s) => (s.results.some((r) => r.outcome !== 'updated') ? 'partial' : 'success')
      );

      for (const result of summary.results) {
        if (result.outcome === 'updated') continue;
        this.activity.warning(`${result.title}: ${result.outcome}${result.message ? ` (${result.message})` : ''}`);
      }

      if (summary.processed === 0) {
        this.activity.success('All albums already decorated! Choose "Update all" to overwrite');
      } else {
        this.activity.success(`Decorated ${summary.updated}/${summary.processed} albums`);
      }

      await this.refreshStatsQuietly();
      return summary;
    } catch (error) {
      this.activity.error(`Error during album decoration: ${errorMessage(error)}`);
      throw error;
    }
  }

  async pruneRanks(onChunk?: (written: number, total: number) => void): Promise<PruneResult> {
    this.activity.info('Pruning unused rank options...');

    try {
      const result = await this.tracker.run('prune_ranks', () =>
        pruneRankOptions(this.repository, { wait: this.options.wait, onChunk })
      );
      this.activity.success(
        result.removed.length === 0
          ? 'No unused rank options'
          : `Removed ${result.removed.length} unused rank options, kept ${result.used.length}`
      );
      return result;
    } catch (error) {
      this.activity.error(`Error while pruning rank options: ${errorMessage(error)}`);
      throw error;
    }
  }

  resetStatus(): void {
    this.tracker.reset();
    this.activity.info('Status reset');
  }

  clearActivity(): void {
    this.activity.clear();
    this.activity.info('Logs cleared');
  }

  // A failed stats refresh after an action does not fail the action
  private async refreshStatsQuietly(): Promise<void> {
    try {
      await this.loadStats();
    } catch (error) {
      this.activity.warning(`Could not refresh album stats: ${errorMessage(error)}`);
    }
  }
}
