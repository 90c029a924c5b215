/**
 * list command - show the store contents and its database.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatBytes } from '../../utils/formatters.js';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

interface ListOptions {
  json?: boolean;
}

export const listCommand = new Command('list')
  .description('List stored reports and the report database')
  .option('--json', 'Output as JSON')
  .action(
    runAction((options: ListOptions, command: Command) => {
      const harness = openHarness(command);
      const listing = harness.listArtifacts();

      if (options.json) {
        output.json(listing);
        return;
      }

      output.section(`Store (${harness.store.dir})`);
      for (const entry of listing.entries) {
        const name = entry.isSymlink ? chalk.cyan(entry.name) : entry.name;
        output.listItem(`${name} ${chalk.gray(formatBytes(entry.size))}`);
      }

      output.section('Database');
      if (listing.database.trim() === '') {
        output.info(chalk.gray('(empty)'));
      } else {
        output.info(listing.database.trimEnd());
      }

      output.info('');
      output.info(`${listing.count} report(s) stored`);
    })
  );
