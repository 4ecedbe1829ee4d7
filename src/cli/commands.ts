import ora from 'ora';
import pc from 'picocolors';
import { sortRequestSchema, type SortRequest } from '../services/library/types.js';
import { ActivityLog } from '../services/operations/activity.js';
import type { LibraryManager } from '../services/operations/manager.js';
import { createManager } from '../start.js';
import { createProgressBar, outcomeIcon, printBanner, printStats } from './ui.js';

export interface SortCommandOptions {
  key: string;
  desc?: boolean;
  compact?: boolean;
  start: string;
  all?: boolean;
}

export interface CoversCommandOptions {
  updateExisting?: boolean;
}

// The CLI prints its own output; activity entries are not mirrored to the logger
function cliManager(): LibraryManager {
  return createManager(new ActivityLog());
}

export function toSortRequest(opts: SortCommandOptions): SortRequest {
  return sortRequestSchema.parse({
    key: opts.key,
    direction: opts.desc ? 'desc' : 'asc',
    compact: opts.compact ?? false,
    startingRank: parseInt(opts.start, 10),
    listenedOnly: !opts.all,
  });
}

export async function sortCommand(opts: SortCommandOptions, manager: LibraryManager = cliManager()): Promise<boolean> {
  const request = toSortRequest(opts);
  printBanner(`Sorting by ${request.key} (${request.direction}${request.compact ? ', compact' : ''})`);

  const spinner = ora({ text: 'Fetching albums...', indent: 2 }).start();
  const progressBar = createProgressBar('albums');

  const result = await manager
    .sortAlbums(request, {
      onFetched: (albums) => spinner.succeed(`Found ${pc.bold(String(albums.length))} albums`),
      onWriteStart: (total) => {
        if (total > 0) progressBar.start(total, 0);
      },
      onWriteComplete: (_entry, _error, done) => progressBar.update(done),
    })
    .finally(() => {
      if (spinner.isSpinning) spinner.fail('Could not fetch albums');
      progressBar.stop();
    });

  console.log();
  console.log(pc.green(`  ✓ Ranked ${result.total} albums`) + pc.dim(` (${result.updated} updated, ${result.unchanged} unchanged)`));
  for (const failure of result.failed) {
    console.log(pc.red(`  ✗ ${failure.title}: ${failure.error}`));
  }
  console.log();

  return result.failed.length === 0;
}

export async function coversCommand(opts: CoversCommandOptions, manager: LibraryManager = cliManager()): Promise<boolean> {
  const updateExisting = opts.updateExisting ?? false;
  printBanner(updateExisting ? 'Updating all covers and icons' : 'Adding missing covers and icons');

  const summary = await manager.setCovers(
    { updateExisting },
    {
      onStart: (total) => console.log(pc.dim(`  Processing ${total} albums...`)),
      onAlbumComplete: (result, done, total) => {
        const detail = result.outcome === 'updated' ? '' : pc.dim(` ${result.outcome}${result.message ? `: ${result.message}` : ''}`);
        console.log(pc.dim(`  [${done}/${total}] `) + `${outcomeIcon(result.outcome)} ${result.title}` + detail);
      },
    }
  );

  console.log();
  if (summary.processed === 0) {
    console.log(pc.green('  ✓ All albums already decorated! Use --update-existing to overwrite'));
  } else {
    console.log(pc.green(`  ✓ Successfully decorated ${summary.updated}/${summary.processed} albums`));
  }
  console.log();

  return summary.results.every((r) => r.outcome === 'updated');
}

export async function statsCommand(manager: LibraryManager = cliManager()): Promise<boolean> {
  const spinner = ora({ text: 'Counting albums...', indent: 2 }).start();
  try {
    const stats = await manager.refreshStats();
    spinner.stop();
    console.log();
    printStats(stats);
    return true;
  } catch (error) {
    spinner.fail('Could not load album stats');
    throw error;
  }
}

export async function pruneRanksCommand(manager: LibraryManager = cliManager()): Promise<boolean> {
  const spinner = ora({ text: 'Reading rank options...', indent: 2 }).start();
  try {
    const result = await manager.pruneRanks((written, total) => {
      spinner.text = `Restoring rank options ${written}/${total}...`;
    });
    spinner.succeed(
      result.removed.length === 0
        ? 'No unused rank options'
        : `Removed ${pc.bold(String(result.removed.length))} unused options, kept ${pc.bold(String(result.used.length))}`
    );
    return true;
  } catch (error) {
    spinner.fail('Could not prune rank options');
    throw error;
  }
}
