/**
 * Fake queue: ordered, append-only list of pending substitutions,
 * persisted to a scratch file under the storage root.
 */

import { appendFileSync, existsSync, readFileSync, realpathSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import type { HarnessContext } from '../context/harness-context.js';
import { UsageError } from '../errors/types.js';
import { splitLines } from '../utils/lines.js';
import { parseFakeLine, serializeFake } from './serialization.js';
import {
  FAKE_ARITY,
  FAKE_TAGS,
  type FakeEntry,
  type FakeKind,
  type QueuedFake,
} from './types.js';

const OPERATION_NAMES: Record<FakeKind, string> = {
  command: 'fakeCommand',
  file: 'fakeFile',
  tree: 'fakeTree',
};

const UNSAFE_PATH = /[:\n\r]/;

export class FakeQueue {
  constructor(private readonly context: HarnessContext) {}

  get file(): string {
    return this.context.paths.fakeQueue;
  }

  /**
   * Enqueue a fake from raw path arguments.
   * The argument count must match the kind; sources must exist.
   */
  enqueue(kind: FakeKind, args: readonly string[]): FakeEntry {
    const operation = OPERATION_NAMES[kind];
    const expected = FAKE_ARITY[kind];

    if (args.length !== expected || args.some((arg) => arg.trim() === '')) {
      throw this.usage(
        operation,
        `bad usage, expected ${expected} non-empty argument(s), got ${args.length}`
      );
    }
    const unsafe = args.find((arg) => UNSAFE_PATH.test(arg));
    if (unsafe !== undefined) {
      throw this.usage(operation, `bad usage, path '${unsafe}' contains ':' or a line break`);
    }

    const source = this.canonicalize(operation, args[0]);
    const entry: FakeEntry =
      kind === 'tree'
        ? { kind, archivePath: source }
        : { kind, source, destination: resolve(args[1]) };

    appendFileSync(this.file, `${serializeFake(entry)}\n`, 'utf-8');
    this.context.log.log(
      entry.kind === 'tree'
        ? `${operation}: enqueued fake archive '${entry.archivePath}'`
        : `${operation}: enqueued fake '${entry.source}' as '${entry.destination}'`
    );
    return entry;
  }

  enqueueCommand(fakePath: string, destPath: string): FakeEntry {
    return this.enqueue('command', [fakePath, destPath]);
  }

  enqueueFile(fakePath: string, destPath: string): FakeEntry {
    return this.enqueue('file', [fakePath, destPath]);
  }

  enqueueTree(archivePath: string): FakeEntry {
    return this.enqueue('tree', [archivePath]);
  }

  /**
   * Raw queue file contents ('' when the file is missing).
   */
  raw(): string {
    return existsSync(this.file) ? readFileSync(this.file, 'utf-8') : '';
  }

  /**
   * Parse the queue in order. Malformed lines are logged and skipped.
   */
  read(): QueuedFake[] {
    const fakes: QueuedFake[] = [];
    for (const line of splitLines(this.raw())) {
      const parsed = parseFakeLine(line);
      if (parsed.ok) {
        fakes.push(parsed.fake);
      } else {
        this.context.log.log(`readFakes: skipping wrongly formatted fake (${line}): ${parsed.reason}`);
      }
    }
    return fakes;
  }

  /**
   * Number of lines in the queue file.
   */
  size(): number {
    return splitLines(this.raw()).length;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Whether any tree fake is queued.
   */
  hasTreeFakes(): boolean {
    return splitLines(this.raw()).some((line) => line.startsWith(FAKE_TAGS.tree));
  }

  /**
   * Truncate the queue to empty.
   */
  reset(): void {
    writeFileSync(this.file, '', 'utf-8');
  }

  private canonicalize(operation: string, path: string): string {
    try {
      return realpathSync(resolve(path));
    } catch {
      throw this.usage(operation, `fake '${path}' does not exist`);
    }
  }

  private usage(operation: string, message: string): UsageError {
    this.context.log.log(`${operation}: ${message}`);
    return new UsageError(`${operation}: ${message}`, { operation });
  }
}
