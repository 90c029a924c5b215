/**
 * Listing of archive members, written once per artifact so assertions
 * never have to open the archive again.
 */

import { spawn } from 'child_process';
import { splitLines } from '../utils/lines.js';

export interface ArchiveLister {
  list(archivePath: string): Promise<string[]>;
}

/**
 * Lists members with `tar tf` (compression is detected by tar).
 */
export class TarArchiveLister implements ArchiveLister {
  constructor(private readonly tarCommand = 'tar') {}

  list(archivePath: string): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.tarCommand, ['tf', archivePath], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(splitLines(stdout));
        } else {
          reject(new Error(`${this.tarCommand} tf ${archivePath} exited with ${code}: ${stderr.trim()}`));
        }
      });
      child.on('error', reject);
    });
  }
}
