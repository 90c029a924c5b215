/**
 * @file Fingerprint Engine
 *
 * Derives the identity under which a generated report may be reused:
 * `(paramHash, namespace, fakeHash)`.
 *
 * Parameter tokens are sorted before hashing so equivalent flag sets
 * collide on purpose. Tree fakes are left out of `fakeHash`; two requests
 * that differ only in queued trees share a fingerprint.
 *
 * Hashes are unsalted SHA-1 hex digests and stay stable across processes.
 */

import { createHash } from 'crypto';
import { FAKE_TAGS } from '../fakes/types.js';
import { joinLines, splitLines } from '../utils/lines.js';

export interface Fingerprint {
  paramHash: string;
  namespace: string;
  fakeHash: string;
}

function sha1(input: string): string {
  return createHash('sha1').update(input).digest('hex');
}

/**
 * Whitespace tokens of a parameter string, empty tokens dropped, sorted.
 */
export function normalizeParams(params: string): string[] {
  return params
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .sort();
}

export function hashParams(params: string): string {
  return sha1(joinLines(normalizeParams(params)));
}

/**
 * Hash of the queue contents with every tree line removed.
 */
export function hashFakes(fakeQueueContents: string): string {
  return sha1(joinLines(splitLines(fakeQueueContents).filter((line) => !line.startsWith(FAKE_TAGS.tree))));
}

export function computeFingerprint(
  params: string,
  namespace: string,
  fakeQueueContents: string
): Fingerprint {
  return {
    paramHash: hashParams(params),
    namespace,
    fakeHash: hashFakes(fakeQueueContents),
  };
}

/**
 * Space-joined form used in the store database and in logs.
 */
export function fingerprintId(fingerprint: Fingerprint): string {
  return `${fingerprint.paramHash} ${fingerprint.namespace} ${fingerprint.fakeHash}`;
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  return a.paramHash === b.paramHash && a.namespace === b.namespace && a.fakeHash === b.fakeHash;
}
