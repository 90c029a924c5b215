/**
 * Queue line format: `KIND:arg1[:arg2]`.
 *
 * Fields are `:`-delimited, so paths containing `:` or line breaks cannot be
 * queued (rejected at enqueue time).
 */

import { FAKE_TAGS, type FakeEntry, type QueuedFake } from './types.js';

const FIELD_SEPARATOR = ':';

export type ParsedFakeLine =
  | { ok: true; fake: QueuedFake }
  | { ok: false; reason: string };

/**
 * Serialize one entry to its queue line (without trailing newline).
 */
export function serializeFake(entry: FakeEntry): string {
  switch (entry.kind) {
    case 'command':
      return [FAKE_TAGS.command, entry.source, entry.destination].join(FIELD_SEPARATOR);
    case 'file':
      return [FAKE_TAGS.file, entry.source, entry.destination].join(FIELD_SEPARATOR);
    case 'tree':
      return [FAKE_TAGS.tree, entry.archivePath].join(FIELD_SEPARATOR);
  }
}

/**
 * Parse one queue line.
 */
export function parseFakeLine(line: string): ParsedFakeLine {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length < 2) {
    return { ok: false, reason: 'fewer than 2 fields' };
  }

  const [tag, ...args] = fields;
  const expectPaths = (count: number): string[] | null =>
    args.length === count && args.every((arg) => arg.length > 0) ? args : null;

  switch (tag) {
    case FAKE_TAGS.command:
    case FAKE_TAGS.file: {
      const paths = expectPaths(2);
      if (!paths) {
        return { ok: false, reason: `${tag} entry needs a source and a destination` };
      }
      const kind = tag === FAKE_TAGS.command ? 'command' : 'file';
      return { ok: true, fake: { kind, source: paths[0], destination: paths[1] } };
    }
    case FAKE_TAGS.tree: {
      const paths = expectPaths(1);
      if (!paths) {
        return { ok: false, reason: 'TREE entry needs exactly one archive path' };
      }
      return { ok: true, fake: { kind: 'tree', archivePath: paths[0] } };
    }
    default:
      return { ok: true, fake: { kind: 'unknown', tag, line } };
  }
}
