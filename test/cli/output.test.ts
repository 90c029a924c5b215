import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  configureOutput,
  resetOutput,
  info,
  success,
  warn,
  error,
  data,
  json,
  keyValue,
  listItem,
} from '../../src/cli/output.js';

describe('CLI Output Module', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    resetOutput();
    configureOutput({ noColor: true });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    resetOutput();
  });

  it('should print info and success messages', () => {
    info('plain');
    success('done');

    expect(consoleLogSpy.mock.calls).toEqual([['plain'], ['done']]);
  });

  it('should suppress non-essential output in quiet mode', () => {
    configureOutput({ quiet: true });

    info('hidden');
    success('hidden');
    keyValue('Key', 'hidden');
    listItem('hidden');

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should always print data, warnings and errors', () => {
    configureOutput({ quiet: true });

    data('/store/sosreport-a.tar.xz');
    warn('careful');
    error('broken');

    expect(consoleLogSpy).toHaveBeenCalledWith('/store/sosreport-a.tar.xz');
    expect(consoleWarnSpy).toHaveBeenCalledWith('careful');
    expect(consoleErrorSpy).toHaveBeenCalledWith('broken');
  });

  it('should format key-value pairs and skip undefined values', () => {
    keyValue('Reused', true);
    keyValue('Missing', undefined);

    expect(consoleLogSpy.mock.calls).toEqual([['Reused: true']]);
  });

  it('should indent list items', () => {
    listItem('top');
    listItem('nested', 1);

    expect(consoleLogSpy.mock.calls).toEqual([['- top'], ['  - nested']]);
  });

  it('should pretty-print JSON', () => {
    json({ count: 1 });

    expect(consoleLogSpy).toHaveBeenCalledWith('{\n  "count": 1\n}');
  });
});
