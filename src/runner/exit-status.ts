/**
 * Expected exit status specifications.
 *
 * Accepts a single status (`0`), an inclusive range (`0-2`) or a comma list
 * of both (`0,2-5`). Blank or `default` means `0`.
 */

import { REPORT_DEFAULTS } from '../constants.js';
import { UsageError } from '../errors/types.js';

export interface StatusRange {
  min: number;
  max: number;
}

const STATUS_PART = /^(\d+)(?:-(\d+))?$/;

/**
 * Normalize blank or `default` to the default expected status.
 */
export function normalizeExpectedStatus(spec: string | number | undefined): string {
  const text = spec === undefined ? '' : String(spec).trim();
  if (text === '' || text === REPORT_DEFAULTS.DEFAULT_KEYWORD) {
    return REPORT_DEFAULTS.EXPECTED_EXIT_STATUS;
  }
  return text;
}

export function parseExpectedStatus(spec: string | number | undefined): StatusRange[] {
  const normalized = normalizeExpectedStatus(spec);

  return normalized.split(',').map((part) => {
    const match = STATUS_PART.exec(part.trim());
    if (!match) {
      throw new UsageError(`Invalid expected exit status '${normalized}'`, {
        operation: 'parseExpectedStatus',
      });
    }
    const min = Number(match[1]);
    const max = match[2] === undefined ? min : Number(match[2]);
    if (max < min) {
      throw new UsageError(`Invalid exit status range '${part.trim()}'`, {
        operation: 'parseExpectedStatus',
      });
    }
    return { min, max };
  });
}

export function statusMatches(status: number | null, ranges: readonly StatusRange[]): boolean {
  if (status === null) {
    return false;
  }
  return ranges.some((range) => status >= range.min && status <= range.max);
}
