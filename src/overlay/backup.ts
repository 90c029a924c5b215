/**
 * Backup/restore of faked paths.
 *
 * The overlay only depends on the `BackupProvider` contract; the filesystem
 * implementation below keeps one directory per namespace under the storage
 * root with a JSON manifest describing what was saved.
 */

import {
  cpSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { getErrorMessage } from '../errors/types.js';
import type { Logger } from '../logging/logger.js';

export interface BackupOptions {
  /**
   * Clean mode: a path that does not exist is backed up as "absent",
   * so restoring removes whatever was installed there.
   */
  clean?: boolean;
}

export interface RestoreFailure {
  path: string;
  error: string;
}

export interface RestoreResult {
  ok: boolean;
  /** Paths put back (or removed, for paths that were absent) */
  restored: string[];
  failures: RestoreFailure[];
}

export interface BackupProvider {
  /** Returns false when the path could not be backed up. */
  backup(path: string, namespace: string, options?: BackupOptions): Promise<boolean>;
  /** Restore every path backed up under the namespace. */
  restoreAll(namespace: string): Promise<RestoreResult>;
}

const MANIFEST_FILE = 'manifest.json';
const DATA_DIR = 'data';

const manifestSchema = z.object({
  entries: z.array(
    z.object({
      path: z.string(),
      existed: z.boolean(),
      stored: z.string().optional(),
    })
  ),
});

type BackupManifest = z.infer<typeof manifestSchema>;

export class FileBackupProvider implements BackupProvider {
  constructor(
    private readonly rootDir: string,
    private readonly logger: Logger
  ) {}

  async backup(path: string, namespace: string, options: BackupOptions = {}): Promise<boolean> {
    const target = resolve(path);
    const nsDir = this.namespaceDir(namespace);

    try {
      const manifest = this.loadManifest(nsDir);
      // First backup wins: it holds the state from before any fake
      if (manifest.entries.some((entry) => entry.path === target)) {
        return true;
      }

      if (pathExists(target)) {
        const stored = String(manifest.entries.length);
        const dataDir = join(nsDir, DATA_DIR);
        mkdirSync(dataDir, { recursive: true });
        cpSync(target, join(dataDir, stored), {
          recursive: true,
          preserveTimestamps: true,
          verbatimSymlinks: true,
        });
        manifest.entries.push({ path: target, existed: true, stored });
      } else if (options.clean) {
        manifest.entries.push({ path: target, existed: false });
      } else {
        this.logger.debug({ path: target, namespace }, 'Nothing to back up without clean mode');
        return false;
      }

      this.saveManifest(nsDir, manifest);
      this.logger.debug({ path: target, namespace }, 'Backed up path');
      return true;
    } catch (error) {
      this.logger.warn({ path: target, namespace, error: getErrorMessage(error) }, 'Backup failed');
      return false;
    }
  }

  async restoreAll(namespace: string): Promise<RestoreResult> {
    const nsDir = this.namespaceDir(namespace);
    const manifest = this.loadManifest(nsDir);
    const restored: string[] = [];
    const failures: RestoreFailure[] = [];

    // Reverse order so nested paths unwind before their parents
    for (const entry of [...manifest.entries].reverse()) {
      try {
        rmSync(entry.path, { recursive: true, force: true });
        if (entry.existed && entry.stored !== undefined) {
          mkdirSync(dirname(entry.path), { recursive: true });
          cpSync(join(nsDir, DATA_DIR, entry.stored), entry.path, {
            recursive: true,
            preserveTimestamps: true,
            verbatimSymlinks: true,
          });
        }
        restored.push(entry.path);
      } catch (error) {
        failures.push({ path: entry.path, error: getErrorMessage(error) });
      }
    }

    if (failures.length === 0) {
      rmSync(nsDir, { recursive: true, force: true });
    } else {
      // Keep only what still needs restoring
      this.saveManifest(nsDir, {
        entries: manifest.entries.filter((entry) => failures.some((f) => f.path === entry.path)),
      });
    }

    this.logger.debug({ namespace, restored: restored.length, failed: failures.length }, 'Restore finished');
    return { ok: failures.length === 0, restored, failures };
  }

  /**
   * Paths currently backed up under a namespace.
   */
  backedUpPaths(namespace: string): string[] {
    return this.loadManifest(this.namespaceDir(namespace)).entries.map((entry) => entry.path);
  }

  private namespaceDir(namespace: string): string {
    return join(this.rootDir, namespace);
  }

  private loadManifest(nsDir: string): BackupManifest {
    const file = join(nsDir, MANIFEST_FILE);
    if (!existsSync(file)) {
      return { entries: [] };
    }
    return manifestSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  }

  private saveManifest(nsDir: string, manifest: BackupManifest): void {
    mkdirSync(nsDir, { recursive: true });
    writeFileSync(join(nsDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
  }
}

/**
 * Existence check that also sees dangling symlinks.
 */
function pathExists(path: string): boolean {
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
}
