/**
 * Checks against an artifact's precomputed listing.
 */

import { UsageError, getErrorMessage } from '../errors/types.js';
import { splitLines } from '../utils/lines.js';

/**
 * Whether any listing line matches the regular expression.
 */
export function listingMatches(listing: string, pattern: string): boolean {
  let matcher: RegExp;
  try {
    matcher = new RegExp(pattern);
  } catch (error) {
    throw new UsageError(`Invalid pattern '${pattern}': ${getErrorMessage(error)}`, {
      operation: 'listingMatches',
    });
  }
  return splitLines(listing).some((line) => matcher.test(line));
}
