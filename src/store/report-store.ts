/**
 * Report store: durable directory of generated artifacts plus an
 * append-only database, one line per artifact:
 *
 *   reuseCount paramHash namespace fakeHash filename
 *
 * Lines are only rewritten to bump a reuse counter, to drop records of a
 * file being overwritten, and by purgeAll().
 */

import { createHash } from 'crypto';
import {
  appendFileSync,
  copyFileSync,
  existsSync,
  lstatSync,
  readFileSync,
  readdirSync,
  readlinkSync,
  renameSync,
  rmSync,
  symlinkSync,
  unlinkSync,
  writeFileSync,
} from 'fs';
import { basename, join, resolve } from 'path';
import { SIDE_FILES } from '../constants.js';
import type { HarnessContext } from '../context/harness-context.js';
import { sameFingerprint, type Fingerprint } from '../fingerprint/fingerprint.js';
import { joinLines, splitLines } from '../utils/lines.js';

export interface StoreRecord {
  /** How many requests this artifact has served, starting at 1 */
  reuseCount: number;
  fingerprint: Fingerprint;
  /** Artifact file name inside the store */
  filename: string;
}

export interface StoreEntry {
  name: string;
  size: number;
  isSymlink: boolean;
}

export interface StoreListing {
  entries: StoreEntry[];
  /** Raw database contents */
  database: string;
  /** Number of well-formed records */
  count: number;
}

export interface AdoptedArtifact {
  /** Artifact path inside the store */
  artifactPath: string;
  checksumPath: string;
  /** True when the tool wrote no checksum and one was computed */
  checksumGenerated: boolean;
}

export interface SideFileContents {
  fakeQueue: string;
  params: string;
  output: string;
}

export function formatRecord(record: StoreRecord): string {
  const { paramHash, namespace, fakeHash } = record.fingerprint;
  return `${record.reuseCount} ${paramHash} ${namespace} ${fakeHash} ${record.filename}`;
}

export function parseRecord(line: string): StoreRecord | null {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 5 || !/^\d+$/.test(fields[0])) {
    return null;
  }
  const [count, paramHash, namespace, fakeHash, filename] = fields;
  return {
    reuseCount: Number(count),
    fingerprint: { paramHash, namespace, fakeHash },
    filename,
  };
}

export class ReportStore {
  constructor(private readonly context: HarnessContext) {}

  get dir(): string {
    return this.context.paths.store;
  }

  pathFor(filename: string): string {
    return join(this.dir, filename);
  }

  /**
   * Well-formed records in file order.
   */
  records(): StoreRecord[] {
    const records: StoreRecord[] = [];
    for (const line of this.readLines()) {
      const record = parseRecord(line);
      if (record) {
        records.push(record);
      } else {
        this.context.logger.warn({ line }, 'Skipping malformed store record');
      }
    }
    return records;
  }

  /**
   * Find the newest record for a fingerprint whose artifact still exists,
   * bump its reuse counter and return the updated record.
   */
  lookup(fingerprint: Fingerprint): StoreRecord | undefined {
    const lines = this.readLines();

    for (let index = lines.length - 1; index >= 0; index--) {
      const record = parseRecord(lines[index]);
      if (!record || !sameFingerprint(record.fingerprint, fingerprint)) {
        continue;
      }
      if (!existsSync(this.pathFor(record.filename))) {
        this.context.log.log(`lookup: stored report '${record.filename}' is missing, ignoring its record`);
        continue;
      }

      const updated: StoreRecord = { ...record, reuseCount: record.reuseCount + 1 };
      lines[index] = formatRecord(updated);
      this.writeLines(lines);
      return updated;
    }

    return undefined;
  }

  append(record: StoreRecord): void {
    appendFileSync(this.context.paths.db, `${formatRecord(record)}\n`, 'utf-8');
  }

  /**
   * Move an artifact and its checksum file into the store and mark it latest.
   */
  adopt(sourcePath: string): AdoptedArtifact {
    const { checksumSuffix } = this.context.config.artifact;
    const source = resolve(sourcePath);
    const filename = basename(source);
    const artifactPath = this.pathFor(filename);
    const checksumPath = `${artifactPath}${checksumSuffix}`;

    if (source !== artifactPath && existsSync(artifactPath)) {
      this.context.log.log(`adopt: overwriting stored report '${filename}'`);
      this.dropRecords(filename);
    }

    moveFile(source, artifactPath);

    const sourceChecksum = `${source}${checksumSuffix}`;
    let checksumGenerated = false;
    if (existsSync(sourceChecksum)) {
      moveFile(sourceChecksum, checksumPath);
    } else if (source !== artifactPath || !existsSync(checksumPath)) {
      const digest = createHash('md5').update(readFileSync(artifactPath)).digest('hex');
      writeFileSync(checksumPath, `${digest}\n`, 'utf-8');
      checksumGenerated = true;
    }

    this.markLatest(artifactPath);
    return { artifactPath, checksumPath, checksumGenerated };
  }

  /**
   * Store the frozen fake queue, the parameters and the tool output.
   */
  writeSideFiles(artifactPath: string, contents: SideFileContents): void {
    writeFileSync(`${artifactPath}${SIDE_FILES.FAKELIST}`, contents.fakeQueue, 'utf-8');
    writeFileSync(`${artifactPath}${SIDE_FILES.PARAMS}`, `${contents.params}\n`, 'utf-8');
    writeFileSync(`${artifactPath}${SIDE_FILES.OUTPUT}`, contents.output, 'utf-8');
  }

  writeListing(artifactPath: string, entries: readonly string[]): void {
    writeFileSync(`${artifactPath}${SIDE_FILES.LISTING}`, joinLines(entries), 'utf-8');
  }

  /**
   * Precomputed listing of an artifact ('' when none was written).
   */
  readListing(artifactPath: string): string {
    const file = `${artifactPath}${SIDE_FILES.LISTING}`;
    return existsSync(file) ? readFileSync(file, 'utf-8') : '';
  }

  /**
   * Point the latest-artifact marker at an artifact.
   */
  markLatest(artifactPath: string): void {
    rmSync(this.context.paths.latestMarker, { force: true });
    symlinkSync(artifactPath, this.context.paths.latestMarker);
  }

  /**
   * Artifact the latest marker points at, if it still exists.
   */
  latestArtifact(): string | undefined {
    const marker = this.context.paths.latestMarker;
    try {
      lstatSync(marker);
    } catch {
      return undefined;
    }
    const target = resolve(this.dir, readlinkSync(marker));
    return existsSync(target) ? target : undefined;
  }

  /**
   * Remember the artifact a request produced or reused, for later processes.
   */
  recordCurrent(artifactPath: string): void {
    writeFileSync(this.context.paths.currentResult, `${artifactPath}\n`, 'utf-8');
  }

  clearCurrent(): void {
    rmSync(this.context.paths.currentResult, { force: true });
  }

  /**
   * Artifact of the last successful request, if it is still stored.
   * Unlike the latest marker this is empty after a failed request.
   */
  currentArtifact(): string | undefined {
    const file = this.context.paths.currentResult;
    if (!existsSync(file)) {
      return undefined;
    }
    const target = readFileSync(file, 'utf-8').trim();
    return target !== '' && existsSync(target) ? target : undefined;
  }

  /**
   * Delete every stored artifact (and its side files) and empty the database.
   * Returns the number of files removed.
   */
  purgeAll(): number {
    const { prefix } = this.context.config.artifact;
    let removed = 0;
    for (const name of readdirSync(this.dir)) {
      if (name.startsWith(prefix)) {
        rmSync(join(this.dir, name), { recursive: true, force: true });
        removed++;
      }
    }
    rmSync(this.context.paths.latestMarker, { force: true });
    this.clearCurrent();
    writeFileSync(this.context.paths.db, '', 'utf-8');

    this.context.log.log('purge: deleted all previously generated reports');
    return removed;
  }

  list(): StoreListing {
    const entries = readdirSync(this.dir)
      .sort()
      .map((name): StoreEntry => {
        const stats = lstatSync(join(this.dir, name));
        return { name, size: stats.size, isSymlink: stats.isSymbolicLink() };
      });
    const database = existsSync(this.context.paths.db)
      ? readFileSync(this.context.paths.db, 'utf-8')
      : '';
    const count = this.records().length;

    this.context.log.log(`list: listed ${count} already generated reports`);
    return { entries, database, count };
  }

  private readLines(): string[] {
    const db = this.context.paths.db;
    return existsSync(db) ? splitLines(readFileSync(db, 'utf-8')) : [];
  }

  private writeLines(lines: readonly string[]): void {
    const db = this.context.paths.db;
    const tmp = `${db}.tmp`;
    writeFileSync(tmp, joinLines(lines), 'utf-8');
    renameSync(tmp, db);
  }

  private dropRecords(filename: string): void {
    const lines = this.readLines();
    const kept = lines.filter((line) => parseRecord(line)?.filename !== filename);
    if (kept.length !== lines.length) {
      this.writeLines(kept);
    }
  }
}

/**
 * Rename, falling back to copy + unlink across filesystems.
 */
function moveFile(from: string, to: string): void {
  if (from === to) {
    return;
  }
  try {
    renameSync(from, to);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      copyFileSync(from, to);
      unlinkSync(from);
      return;
    }
    throw error;
  }
}
