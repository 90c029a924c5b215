/**
 * Init command - prepares the storage root and starts an empty fake queue.
 */

import { Command } from 'commander';
import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { generateDefaultConfig } from '../../config/loader.js';
import { PATHS } from '../../constants.js';
import { UsageError } from '../../errors/types.js';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

interface InitOptions {
  writeConfig?: boolean;
  force?: boolean;
}

export const initCommand = new Command('init')
  .description('Prepare the storage root and start an empty fake queue')
  .option('--write-config', `Also write ${PATHS.DEFAULT_CONFIG_FILENAME} in the current directory`)
  .option('-f, --force', 'Overwrite an existing configuration file')
  .action(
    runAction((options: InitOptions, command: Command) => {
      if (options.writeConfig) {
        const configPath = join(process.cwd(), PATHS.DEFAULT_CONFIG_FILENAME);
        if (existsSync(configPath) && !options.force) {
          throw new UsageError(`${PATHS.DEFAULT_CONFIG_FILENAME} already exists (use --force to overwrite)`, {
            path: configPath,
          });
        }
        writeFileSync(configPath, generateDefaultConfig(), 'utf-8');
        output.success(`Created ${configPath}`);
      }

      const harness = openHarness(command, { resetQueue: true });
      output.success(`Harness ready at ${harness.context.paths.root}`);
      output.keyValue('Store', harness.store.dir);
      output.keyValue('Log', harness.context.paths.log);
    })
  );
