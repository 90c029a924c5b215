/**
 * Shared utilities for the harness commands.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, type HarnessConfig } from '../../config/loader.js';
import { getErrorMessage, isHarnessError, resultCodeFor } from '../../errors/types.js';
import { createHarness, type ReportHarness } from '../../harness.js';
import { configureLogger, getLogger, isLogLevel } from '../../logging/logger.js';
import * as output from '../output.js';

const globalOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: z.string().optional(),
  logFile: z.string().optional(),
  quiet: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

/**
 * Options declared on the root program, as seen from a subcommand.
 */
export function globalOptions(command: Command): GlobalOptions {
  return globalOptionsSchema.parse(command.optsWithGlobals());
}

export interface OpenHarnessOptions {
  /** Start a fresh fake queue (only `init` does) */
  resetQueue?: boolean;
  /** Adjust the loaded configuration for this command */
  configure?: (config: HarnessConfig) => HarnessConfig;
}

/**
 * Load configuration, apply its logging section unless the command line
 * overrides it, and open the harness.
 *
 * CLI invocations share one fake queue across processes, so the queue is
 * kept unless the command asks for a reset.
 */
export function openHarness(command: Command, options: OpenHarnessOptions = {}): ReportHarness {
  const opts = globalOptions(command);
  const loaded = loadConfig(opts.config);
  const config = options.configure ? options.configure(loaded) : loaded;

  const level = opts.logLevel !== undefined && isLogLevel(opts.logLevel) ? opts.logLevel : config.logging.level;
  configureLogger({ level, file: opts.logFile ?? config.logging.file, pretty: config.logging.pretty });

  return createHarness({
    config,
    resetQueue: options.resetQueue ?? false,
    loadedBy: 'cli',
  });
}

/**
 * Wrap a command action so failures print one line and set the exit code
 * from the error's result code.
 */
export function runAction<A extends unknown[]>(
  action: (...args: A) => Promise<void> | void
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      output.error(getErrorMessage(error));
      getLogger('cli').debug({ error: isHarnessError(error) ? error.toJSON() : getErrorMessage(error) }, 'Command failed');
      process.exitCode = resultCodeFor(error);
    }
  };
}
