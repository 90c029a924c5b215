/**
 * validate-config command - check report-harness.yaml without touching the store.
 */

import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import * as output from '../output.js';
import { globalOptions, runAction } from './shared.js';

export const validateConfigCommand = new Command('validate-config')
  .description('Validate the configuration file and print the resolved values')
  .action(
    runAction((_options: unknown, command: Command) => {
      const config = loadConfig(globalOptions(command).config);
      output.success('Configuration is valid.');
      output.keyValue('Storage root', config.storage.root);
      output.keyValue('Tool', config.tool.command);
      output.keyValue('Artifact pattern', config.artifact.pattern);
      output.keyValue('Backup namespace', config.backup.namespace);
      output.keyValue('Log level', config.logging.level);
    })
  );
