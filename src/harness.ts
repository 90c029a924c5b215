/**
 * Report harness facade: the caller-facing operations wired over one
 * harness context.
 */

import { loadConfig } from './config/loader.js';
import { validateConfig, type HarnessConfig, type HarnessConfigInput } from './config/validator.js';
import { openHarnessContext, type HarnessContext } from './context/harness-context.js';
import { AssertionFailedError, UsageError } from './errors/types.js';
import { FakeQueue } from './fakes/queue.js';
import type { FakeEntry, FakeKind } from './fakes/types.js';
import { computeFingerprint, type Fingerprint } from './fingerprint/fingerprint.js';
import { FileBackupProvider, type BackupProvider } from './overlay/backup.js';
import { OverlayManager, type RevertReport } from './overlay/overlay-manager.js';
import { listingMatches } from './report/assertions.js';
import {
  ReportGenerator,
  normalizeNamespace,
  type GenerateOptions,
  type ReportResult,
} from './report/generator.js';
import { ProcessToolRunner, type ToolRunner } from './runner/tool-runner.js';
import { TarArchiveLister, type ArchiveLister } from './store/listing.js';
import { ReportStore, type StoreListing } from './store/report-store.js';

export interface HarnessOptions {
  /** Inline configuration; takes precedence over configPath */
  config?: HarnessConfigInput;
  /** Config file to load when no inline config is given */
  configPath?: string;
  /** Truncate the fake queue on open (default: true) */
  resetQueue?: boolean;
  /** Name recorded in the log on initialization */
  loadedBy?: string;
  backupProvider?: BackupProvider;
  toolRunner?: ToolRunner;
  archiveLister?: ArchiveLister;
  /** Clock used for log timestamps */
  now?: () => Date;
}

export class ReportHarness {
  readonly queue: FakeQueue;
  readonly overlay: OverlayManager;
  readonly store: ReportStore;
  readonly generator: ReportGenerator;

  constructor(
    readonly context: HarnessContext,
    collaborators: {
      backupProvider: BackupProvider;
      toolRunner: ToolRunner;
      archiveLister: ArchiveLister;
    }
  ) {
    this.queue = new FakeQueue(context);
    this.overlay = new OverlayManager(context, this.queue, collaborators.backupProvider);
    this.store = new ReportStore(context);
    this.generator = new ReportGenerator(
      context,
      this.queue,
      this.overlay,
      this.store,
      collaborators.toolRunner,
      collaborators.archiveLister
    );
  }

  get config(): HarnessConfig {
    return this.context.config;
  }

  enqueue(kind: FakeKind, args: readonly string[]): FakeEntry {
    return this.queue.enqueue(kind, args);
  }

  enqueueCommand(fakePath: string, destPath: string): FakeEntry {
    return this.queue.enqueueCommand(fakePath, destPath);
  }

  enqueueFile(fakePath: string, destPath: string): FakeEntry {
    return this.queue.enqueueFile(fakePath, destPath);
  }

  enqueueTree(archivePath: string): FakeEntry {
    return this.queue.enqueueTree(archivePath);
  }

  /**
   * Immediately uninstall every fake applied under this harness.
   */
  revertFakes(): Promise<RevertReport> {
    return this.overlay.revertAll();
  }

  generateReport(params: string, options?: GenerateOptions): Promise<ReportResult> {
    return this.generator.generateOrReuse(params, options);
  }

  /**
   * Fingerprint a request would get with the current fake queue.
   */
  fingerprintFor(params: string, namespace?: string): Fingerprint {
    return computeFingerprint(params, normalizeNamespace(namespace), this.queue.raw());
  }

  get latestArtifact(): string | undefined {
    return this.generator.latestArtifact;
  }

  artifactContains(pattern: string): boolean {
    return listingMatches(this.latestListing('assertIncluded'), pattern);
  }

  artifactNotContains(pattern: string): boolean {
    return !this.artifactContains(pattern);
  }

  assertArtifactContains(pattern: string): void {
    const ok = this.artifactContains(pattern);
    this.context.log.log(`assertIncluded '${pattern}': ${ok ? 'PASS' : 'FAIL'}`);
    if (!ok) {
      throw new AssertionFailedError(`No entry matching '${pattern}' in ${this.latestArtifact}`, pattern);
    }
  }

  assertArtifactNotContains(pattern: string): void {
    const ok = this.artifactNotContains(pattern);
    this.context.log.log(`assertExcluded '${pattern}': ${ok ? 'PASS' : 'FAIL'}`);
    if (!ok) {
      throw new AssertionFailedError(`Unexpected entry matching '${pattern}' in ${this.latestArtifact}`, pattern);
    }
  }

  listArtifacts(): StoreListing {
    return this.store.list();
  }

  purgeArtifacts(): number {
    const removed = this.store.purgeAll();
    this.generator.clearLatest();
    return removed;
  }

  private latestListing(operation: string): string {
    const artifact = this.generator.latestArtifact;
    if (artifact === undefined) {
      this.context.log.log(`${operation}: no report generated yet`);
      throw new UsageError(`${operation}: no report generated yet`, { operation });
    }
    return this.store.readListing(artifact);
  }
}

/**
 * Open the storage root and build a harness.
 * The fake queue starts empty unless `resetQueue` is false.
 */
export function createHarness(options: HarnessOptions = {}): ReportHarness {
  const config = options.config ? validateConfig(options.config) : loadConfig(options.configPath);
  const context = openHarnessContext(config, {
    resetQueue: options.resetQueue ?? true,
    loadedBy: options.loadedBy,
    now: options.now,
  });

  return new ReportHarness(context, {
    backupProvider: options.backupProvider ?? new FileBackupProvider(context.paths.backups, context.logger),
    toolRunner: options.toolRunner ?? new ProcessToolRunner(),
    archiveLister: options.archiveLister ?? new TarArchiveLister(),
  });
}
