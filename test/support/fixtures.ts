/**
 * Harness fixture wired to a temp storage root and the in-process stubs.
 */

import { createHarness, type ReportHarness } from '../../src/harness.js';
import type { HarnessConfigInput } from '../../src/config/validator.js';
import { StubArchiveLister, StubToolRunner, type StubToolOptions } from './stub-tool.js';
import { TempDirectory } from './temp-directory.js';

export interface TestHarness {
  temp: TempDirectory;
  harness: ReportHarness;
  tool: StubToolRunner;
  lister: StubArchiveLister;
}

export interface TestHarnessOptions {
  config?: HarnessConfigInput;
  tool?: Omit<StubToolOptions, 'outputDir'>;
  entries?: string[];
  /** Reuse an existing temp directory (a second harness on the same root) */
  temp?: TempDirectory;
  resetQueue?: boolean;
}

export const FIXED_NOW = new Date(2024, 0, 15, 9, 30);

export function createTestHarness(options: TestHarnessOptions = {}): TestHarness {
  const temp = options.temp ?? new TempDirectory();
  const tool = new StubToolRunner({ outputDir: temp.mkdir('tool-output'), ...options.tool });
  const lister = new StubArchiveLister(options.entries ?? ['sosreport-testhost/', 'sosreport-testhost/etc/hosts']);

  const harness = createHarness({
    config: {
      ...options.config,
      storage: { root: temp.resolve('root'), ...options.config?.storage },
      tool: { streamOutput: false, ...options.config?.tool },
    },
    resetQueue: options.resetQueue,
    loadedBy: 'vitest',
    toolRunner: tool,
    archiveLister: lister,
    now: () => FIXED_NOW,
  });

  return { temp, harness, tool, lister };
}
