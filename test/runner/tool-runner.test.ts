import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { ProcessToolRunner } from '../../src/runner/tool-runner.js';

const node = (script: string): string => `"${process.execPath}" -e "${script}"`;

describe('runner/ProcessToolRunner', () => {
  it('should capture stdout and stderr with the exit code', async () => {
    const runner = new ProcessToolRunner();

    const result = await runner.run({
      commandLine: node("process.stdout.write('out-line\\n'); process.stderr.write('err-line\\n'); process.exit(3)"),
    });

    expect(result.exitCode).toBe(3);
    expect(result.signal).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.output).toContain('out-line\n');
    expect(result.output).toContain('err-line\n');
  });

  it('should write the scripted answers to stdin', async () => {
    const runner = new ProcessToolRunner();

    const result = await runner.run({
      commandLine: node('process.stdin.pipe(process.stdout)'),
      stdin: '\ntester\n123\n\n',
    });

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('\ntester\n123\n\n');
  });

  it('should close stdin immediately without answers', async () => {
    const runner = new ProcessToolRunner();

    const result = await runner.run({
      commandLine: node("let n = 0; process.stdin.on('data', (d) => { n += d.length; }); process.stdin.on('end', () => console.log('read ' + n))"),
    });

    expect(result.output).toBe('read 0\n');
  });

  it('should echo output when streaming', async () => {
    const echo = new PassThrough();
    const echoed: Buffer[] = [];
    echo.on('data', (chunk: Buffer) => echoed.push(chunk));
    const runner = new ProcessToolRunner(echo);

    const result = await runner.run({ commandLine: node("console.log('streamed')"), stream: true });

    expect(result.output).toBe('streamed\n');
    expect(Buffer.concat(echoed).toString('utf-8')).toBe('streamed\n');
  });

  it('should not echo output by default', async () => {
    const echo = new PassThrough();
    const echoed: Buffer[] = [];
    echo.on('data', (chunk: Buffer) => echoed.push(chunk));
    const runner = new ProcessToolRunner(echo);

    await runner.run({ commandLine: node("console.log('quiet')") });

    expect(echoed).toEqual([]);
  });

  it('should kill the tool after the timeout', async () => {
    const runner = new ProcessToolRunner();

    const result = await runner.run({ commandLine: node('setTimeout(() => {}, 3000)'), timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
    expect(result.signal).toBe('SIGTERM');
  });

  it('should report a missing command through the shell status', async () => {
    const runner = new ProcessToolRunner();

    const result = await runner.run({ commandLine: 'report-harness-missing-tool-xyz --batch' });

    expect(result.exitCode).toBe(127);
  });
});
