/**
 * Invocation of the external report tool.
 *
 * The tool runs through the shell as `<command> <params>`, its stdout and
 * stderr are captured into one buffer in arrival order and optionally
 * echoed live.
 */

import { spawn } from 'child_process';
import { getLogger } from '../logging/logger.js';

export interface ToolInvocation {
  /** Full shell command line */
  commandLine: string;
  /** Text written to stdin; undefined closes stdin immediately */
  stdin?: string;
  /** Kill the tool after this many ms (0 or undefined = no timeout) */
  timeoutMs?: number;
  /** Echo output while capturing it */
  stream?: boolean;
}

export interface ToolRunResult {
  /** Exit status, null when killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Combined stdout + stderr */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolRunResult>;
}

/**
 * Runs the tool as a child process.
 */
export class ProcessToolRunner implements ToolRunner {
  constructor(private readonly echo: NodeJS.WritableStream = process.stdout) {}

  run(invocation: ToolInvocation): Promise<ToolRunResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(invocation.commandLine, {
        shell: true,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const chunks: Buffer[] = [];
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (invocation.timeoutMs) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, invocation.timeoutMs);
      }

      const collect = (data: Buffer): void => {
        chunks.push(data);
        if (invocation.stream) {
          this.echo.write(data);
        }
      };
      child.stdout.on('data', collect);
      child.stderr.on('data', collect);

      // The tool may exit without reading its answers
      child.stdin.on('error', (error) => {
        getLogger('tool-runner').debug({ error: String(error) }, 'Tool stdin closed early');
      });
      if (invocation.stdin !== undefined) {
        child.stdin.write(invocation.stdin);
      }
      child.stdin.end();

      child.on('close', (code, signal) => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve({
          exitCode: code,
          signal,
          output: Buffer.concat(chunks).toString('utf-8'),
          timedOut,
          durationMs: Date.now() - startTime,
        });
      });

      child.on('error', (error) => {
        if (timer) {
          clearTimeout(timer);
        }
        reject(error);
      });
    });
  }
}
