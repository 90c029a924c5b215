/**
 * unfake command - uninstall every applied fake and empty the queue.
 */

import { Command } from 'commander';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

export const unfakeCommand = new Command('unfake')
  .description('Restore every faked destination and empty the fake queue')
  .action(
    runAction(async (_options: unknown, command: Command) => {
      const harness = openHarness(command);
      const report = await harness.revertFakes();

      if (report.error) {
        for (const failure of report.failures) {
          output.warn(`  ${failure.path}: ${failure.error}`);
        }
        throw report.error;
      }

      output.success(`Restored ${report.restored.length} path(s)`);
      for (const path of report.restored) {
        output.listItem(path, 1);
      }
    })
  );
