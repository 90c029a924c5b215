#!/usr/bin/env node

import { config } from 'dotenv';

// Load project .env before anything reads the environment
config({ quiet: true });

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { fakeCommand } from './commands/fake.js';
import { unfakeCommand } from './commands/unfake.js';
import { reportCommand } from './commands/report.js';
import { assertExcludedCommand, assertIncludedCommand } from './commands/assert.js';
import { listCommand } from './commands/list.js';
import { purgeCommand } from './commands/purge.js';
import { validateConfigCommand } from './commands/validate-config.js';
import * as output from './output.js';
import { globalOptions } from './commands/shared.js';
import { LOG_LEVELS, isLogLevel } from '../logging/logger.js';
import { VERSION } from '../version.js';
import { ENV_VARS, PATHS, RESULT_CODES } from '../constants.js';

const program = new Command();

// Extended help with examples
const examples = `
Examples:

  Prepare a run:
    $ report-harness init

  Fake a command and a file, then generate:
    $ report-harness fake command ./fakes/lsblk /usr/bin/lsblk
    $ report-harness fake file ./fakes/hosts /etc/hosts
    $ report-harness report "--batch -o networking"

  Check what the report collected:
    $ report-harness assert-included '/etc/hosts$'
    $ report-harness assert-excluded 'lsblk_-f'

  Inspect and clean the store:
    $ report-harness list
    $ report-harness purge

Environment:
  ${ENV_VARS.ROOT}  Storage root (overrides storage.root)
  ${ENV_VARS.TEST_NAME}  Name recorded in the log by init
`;

program
  .name('report-harness')
  .description(
    `Fake commands and files around a report tool and reuse reports it already generated.

For more information on a specific command, use:
  report-harness <command> --help`
  )
  .version(VERSION)
  .option('-c, --config <path>', `Path to config file (default: ./${PATHS.DEFAULT_CONFIG_FILENAME} if present)`)
  .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`)
  .option('--log-file <path>', 'Write diagnostic logs to file instead of stdout')
  .option('-q, --quiet', 'Suppress non-essential output')
  .hook('preAction', (thisCommand, actionCommand) => {
    const opts = globalOptions(actionCommand ?? thisCommand);

    if (opts.logLevel !== undefined && !isLogLevel(opts.logLevel)) {
      output.error(`Invalid log level '${opts.logLevel}' (expected one of: ${LOG_LEVELS.join(', ')})`);
      process.exit(RESULT_CODES.USAGE);
    }

    output.configureOutput({ quiet: opts.quiet ?? false });
  })
  .addHelpText('after', examples);

program.addCommand(initCommand);
program.addCommand(fakeCommand);
program.addCommand(unfakeCommand);
program.addCommand(reportCommand);
program.addCommand(assertIncludedCommand);
program.addCommand(assertExcludedCommand);
program.addCommand(listCommand);
program.addCommand(purgeCommand);
program.addCommand(validateConfigCommand);

// Custom help formatting
program.configureHelp({
  sortSubcommands: false,
  subcommandTerm: (cmd) => cmd.name() + ' ' + cmd.usage(),
});

program.parseAsync().catch((error: unknown) => {
  output.error(error instanceof Error ? error.message : String(error));
  process.exitCode = RESULT_CODES.USAGE;
});
