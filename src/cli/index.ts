#!/usr/bin/env node

import { Command } from 'commander';
import pc from 'picocolors';
import { SORT_KEYS } from '../services/library/types.js';
import { start } from '../start.js';
import { errorMessage } from '../utils/errors.js';
import { coversCommand, pruneRanksCommand, sortCommand, statsCommand } from './commands.js';

const program = new Command();

function exitWith(task: Promise<boolean>): void {
  task
    .then((ok) => process.exit(ok ? 0 : 1))
    .catch((e: unknown) => {
      console.error(pc.red('Error:'), errorMessage(e));
      process.exit(1);
    });
}

program
  .name('album-desk')
  .description('Rank albums and refresh cover art in a Notion music database')
  .version('0.1.0');

program
  .command('sort')
  .description('Rank albums and write the ranks back to the database')
  .option('-k, --key <key>', `Sort key: ${SORT_KEYS.join(', ')}`, 'rank')
  .option('--desc', 'Descending order (title and artist keys)')
  .option('--compact', 'Renumber ranks consecutively')
  .option('-s, --start <n>', 'First rank to hand out', '1')
  .option('--all', 'Include albums that are not marked as listened')
  .action((opts) => exitWith(sortCommand(opts)));

program
  .command('covers')
  .description('Set page covers and icons from Spotify artwork')
  .option('-u, --update-existing', 'Overwrite covers and icons that are already set')
  .action((opts) => exitWith(coversCommand(opts)));

program
  .command('stats')
  .description('Show album, rank and artwork counts')
  .action(() => exitWith(statsCommand()));

program
  .command('prune-ranks')
  .description('Remove rank options that no album uses')
  .action(() => exitWith(pruneRanksCommand()));

program
  .command('serve')
  .description('Start the web dashboard')
  .action(() => {
    start().catch((e: unknown) => {
      console.error(pc.red('Error:'), errorMessage(e));
      process.exit(1);
    });
  });

program.parse();
