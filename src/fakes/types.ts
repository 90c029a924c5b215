/**
 * Fake queue entry types.
 */

export type FakeKind = 'command' | 'file' | 'tree';

/**
 * Replace an executable; the destination is made executable after copying.
 */
export interface CommandFake {
  kind: 'command';
  /** Canonical absolute path of the replacement payload */
  source: string;
  /** Absolute path that gets overwritten */
  destination: string;
}

/**
 * Replace a plain file.
 */
export interface FileFake {
  kind: 'file';
  source: string;
  destination: string;
}

/**
 * Extract an archive into the root filesystem.
 */
export interface TreeFake {
  kind: 'tree';
  /** Canonical absolute path of the archive */
  archivePath: string;
}

export type FakeEntry = CommandFake | FileFake | TreeFake;

/**
 * A well-formed queue line whose tag the harness does not know.
 * Kept so the overlay can log and skip it in order.
 */
export interface UnknownFake {
  kind: 'unknown';
  tag: string;
  line: string;
}

export type QueuedFake = FakeEntry | UnknownFake;

/**
 * Tags used in the line-oriented queue file.
 */
export const FAKE_TAGS: Record<FakeKind, string> = {
  command: 'CMD',
  file: 'FILE',
  tree: 'TREE',
};

/**
 * Number of path arguments each kind takes.
 */
export const FAKE_ARITY: Record<FakeKind, number> = {
  command: 2,
  file: 2,
  tree: 1,
};

export const FAKE_KINDS: readonly FakeKind[] = ['command', 'file', 'tree'];

export function isFakeKind(value: string): value is FakeKind {
  return (FAKE_KINDS as readonly string[]).includes(value);
}
