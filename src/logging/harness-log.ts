/**
 * Timestamped, append-only harness log.
 *
 * Every harness operation leaves a line here so a failed test can be
 * reconstructed without re-running it. Writes never throw.
 */

import { appendFileSync } from 'fs';
import type { Logger } from './logger.js';

/**
 * Format a date as `YYYY-MM-DD HH:MM +ZZZZ` in local time.
 */
export function formatLogTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absOffset = Math.abs(offsetMinutes);
  const zone = `${sign}${pad(Math.floor(absOffset / 60))}${pad(absOffset % 60)}`;

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())} ${zone}`
  );
}

export class HarnessLog {
  constructor(
    readonly file: string,
    private readonly diagnostics: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Append a message. Returns false when the line could not be written.
   */
  log(message: string): boolean {
    this.diagnostics.info(message);
    try {
      appendFileSync(this.file, `${formatLogTimestamp(this.now())} ${message}\n`, 'utf-8');
      return true;
    } catch (error) {
      this.diagnostics.debug({ file: this.file, error: String(error) }, 'Failed to write harness log');
      return false;
    }
  }
}
