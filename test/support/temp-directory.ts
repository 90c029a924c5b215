/**
 * Isolated temporary directories with cleanup.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

export class TempDirectory {
  /** The absolute path to the temp directory */
  readonly path: string;

  constructor(prefix = 'report-harness-test') {
    this.path = realpathSync(mkdtempSync(join(tmpdir(), `${prefix}-`)));
  }

  resolve(relativePath: string): string {
    return join(this.path, relativePath);
  }

  /**
   * Write a file, creating parent directories.
   * @returns The absolute path to the written file.
   */
  writeFile(relativePath: string, content: string): string {
    const absolutePath = this.resolve(relativePath);
    mkdirSync(dirname(absolutePath), { recursive: true });
    writeFileSync(absolutePath, content, 'utf-8');
    return absolutePath;
  }

  readFile(relativePath: string): string {
    return readFileSync(this.resolve(relativePath), 'utf-8');
  }

  exists(relativePath: string): boolean {
    return existsSync(this.resolve(relativePath));
  }

  mkdir(relativePath: string): string {
    const absolutePath = this.resolve(relativePath);
    mkdirSync(absolutePath, { recursive: true });
    return absolutePath;
  }

  cleanup(): void {
    try {
      rmSync(this.path, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  }
}
