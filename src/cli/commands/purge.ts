/**
 * purge command - delete every stored report and empty the database.
 */

import { Command } from 'commander';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

export const purgeCommand = new Command('purge')
  .description('Delete every stored report and empty the report database')
  .action(
    runAction((_options: unknown, command: Command) => {
      const harness = openHarness(command);
      const removed = harness.purgeArtifacts();
      output.success(`Removed ${removed} file(s) from ${harness.store.dir}`);
    })
  );
