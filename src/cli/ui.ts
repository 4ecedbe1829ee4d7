import cliProgress from 'cli-progress';
import pc from 'picocolors';
import type { AlbumStats, CoverOutcome } from '../services/library/types.js';

export function printBanner(subtitle: string): void {
  console.log();
  console.log(pc.bold(pc.green('  ╭─────────────────────────────────╮')));
  console.log(pc.bold(pc.green('  │')) + pc.bold(pc.white('    🎵 Album Desk                 ')) + pc.bold(pc.green('│')));
  console.log(pc.bold(pc.green('  ╰─────────────────────────────────╯')));
  console.log(pc.dim(`  ${subtitle}`));
  console.log();
}

export function createProgressBar(unit: string) {
  return new cliProgress.SingleBar({
    format: pc.dim('  │ ') + pc.cyan('{bar}') + pc.dim(' │ ') + pc.white('{percentage}%') + pc.dim(' │ ') + pc.dim(`{value}/{total} ${unit}`),
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    clearOnComplete: false,
    barsize: 25,
  });
}

export function printStats(stats: AlbumStats): void {
  console.log(pc.dim('  ┌─ Database ───────────────────────────────'));
  console.log(pc.dim('  │ ') + pc.cyan('Total albums:   ') + pc.white(String(stats.totalAlbums)));
  console.log(pc.dim('  │ ') + pc.cyan('Listened:       ') + pc.white(String(stats.listenedAlbums)));
  console.log(pc.dim('  │ ') + pc.cyan('Rated:          ') + pc.white(String(stats.ratedAlbums)));
  console.log(pc.dim('  │ ') + pc.cyan('Unrated:        ') + pc.white(String(stats.unratedAlbums)));
  console.log(pc.dim('  │ ') + pc.cyan('With covers:    ') + pc.white(`${stats.albumsWithCovers}/${stats.totalAlbums}`));
  console.log(pc.dim('  │ ') + pc.cyan('With icons:     ') + pc.white(`${stats.albumsWithIcons}/${stats.totalAlbums}`));
  console.log(pc.dim('  └────────────────────────────────────────────'));
  console.log();
}

export function outcomeIcon(outcome: CoverOutcome): string {
  switch (outcome) {
    case 'updated':
      return pc.green('✓');
    case 'not-found':
      return pc.yellow('?');
    case 'rate-limited':
      return pc.yellow('⏸');
    case 'invalid-image':
    case 'failed':
      return pc.red('✗');
  }
}
