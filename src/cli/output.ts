/**
 * CLI Output Module
 *
 * User-facing output for CLI commands. For diagnostic logging use the
 * logging module (src/logging/logger.ts); for the harness record use the
 * harness log.
 */

import chalk from 'chalk';

/**
 * Output configuration options.
 */
export interface OutputConfig {
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Check if colors should be disabled based on environment.
 * Respects NO_COLOR standard (https://no-color.org/)
 */
function shouldDisableColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') {
    return true;
  }
  if (process.env.FORCE_COLOR === '0') {
    return true;
  }
  return false;
}

let globalConfig: OutputConfig = {
  quiet: false,
  noColor: shouldDisableColor(),
};

/**
 * Configure global output settings.
 */
export function configureOutput(config: OutputConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset output configuration to defaults.
 */
export function resetOutput(): void {
  globalConfig = { quiet: false, noColor: shouldDisableColor() };
}

function paint(style: (text: string) => string, message: string): string {
  return globalConfig.noColor ? message : style(message);
}

/**
 * Standard information output.
 */
export function info(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

/**
 * Success message output.
 */
export function success(message: string): void {
  if (!globalConfig.quiet) {
    console.log(paint(chalk.green, message));
  }
}

/**
 * Warning message output.
 * Always shown (not suppressed by quiet mode) as warnings are important.
 */
export function warn(message: string): void {
  console.warn(paint(chalk.yellow, message));
}

/**
 * Error message output.
 * Always shown (not suppressed by quiet mode) as errors are critical.
 */
export function error(message: string): void {
  console.error(paint(chalk.red, message));
}

/**
 * Data output, shown even in quiet mode (e.g. the artifact path).
 */
export function data(message: string): void {
  console.log(message);
}

/**
 * Print formatted JSON output.
 */
export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  if (!globalConfig.quiet) {
    console.log(paint(chalk.bold, `\n--- ${title} ---`));
  }
}

/**
 * Print a key-value pair.
 */
export function keyValue(key: string, value: string | number | boolean | undefined): void {
  if (!globalConfig.quiet && value !== undefined) {
    console.log(`${paint(chalk.gray, `${key}:`)} ${value}`);
  }
}

/**
 * Print a list item.
 */
export function listItem(item: string, indent: number = 0): void {
  if (!globalConfig.quiet) {
    const prefix = `${'  '.repeat(indent)}- `;
    console.log(`${prefix}${item}`);
  }
}
