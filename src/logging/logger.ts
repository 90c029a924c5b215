/**
 * Diagnostic logging for the harness components.
 *
 * Every component logs through a child of one process-wide pino logger
 * named after the package, tagged with `{ component }`. The harness log file
 * (see harness-log.ts) is separate and always written.
 */

import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';
import { ENV_VARS } from '../constants.js';
import { PACKAGE_NAME } from '../version.js';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerConfig {
  /** Defaults to $REPORT_HARNESS_LOG_LEVEL, else 'silent' under the test runner and 'warn' otherwise */
  level?: LogLevel;
  /** Write JSON lines to this file instead of stdout */
  file?: string;
  /** pino-pretty output; ignored when writing to a file */
  pretty?: boolean;
  timestamp?: boolean;
  /** Logger name, defaults to the package name */
  name?: string;
}

let globalLogger: PinoLogger | null = null;

/**
 * Level used when none is configured.
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env[ENV_VARS.LOG_LEVEL];
  if (fromEnv !== undefined && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return IS_TEST_ENV ? 'silent' : 'warn';
}

export function createLogger(config: LoggerConfig = {}): PinoLogger {
  const options: LoggerOptions = {
    level: config.level ?? defaultLogLevel(),
    name: config.name ?? PACKAGE_NAME,
    timestamp: config.timestamp === false ? false : pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.file) {
    return pino(options, pino.destination(config.file));
  }

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,name',
      },
    };
  }

  return pino(options);
}

/**
 * Process-wide logger, or a child bound to `{ component }`.
 */
export function getLogger(component?: string): PinoLogger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return component ? globalLogger.child({ component }) : globalLogger;
}

export function configureLogger(config: LoggerConfig): void {
  globalLogger = createLogger(config);
}

export function resetLogger(): void {
  globalLogger = null;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export type { PinoLogger as Logger };
