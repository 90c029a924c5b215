/**
 * Generation orchestrator: "get me a report for these parameters".
 *
 * Reuses a stored artifact when the fingerprint matches; otherwise applies
 * the queued fakes, runs the tool, moves its artifact into the store and
 * reverts the fakes unless the caller opted out.
 */

import { existsSync } from 'fs';
import { basename } from 'path';
import { REPORT_DEFAULTS } from '../constants.js';
import type { HarnessContext } from '../context/harness-context.js';
import {
  ArtifactNotRecognizedError,
  ExternalToolError,
  UnsupportedModeError,
  UsageError,
  createTimingContext,
  getErrorMessage,
} from '../errors/types.js';
import type { FakeQueue } from '../fakes/queue.js';
import { computeFingerprint, fingerprintId, type Fingerprint } from '../fingerprint/fingerprint.js';
import type { ApplyReport, OverlayManager, RevertReport } from '../overlay/overlay-manager.js';
import {
  normalizeExpectedStatus,
  parseExpectedStatus,
  statusMatches,
  type StatusRange,
} from '../runner/exit-status.js';
import type { ToolInvocation, ToolRunResult, ToolRunner } from '../runner/tool-runner.js';
import type { ArchiveLister } from '../store/listing.js';
import type { ReportStore, StoreRecord } from '../store/report-store.js';
import { splitLines } from '../utils/lines.js';
import { extractArtifactPath, findFlag, hasFlag } from './tool-output.js';

const OPERATION = 'generateReport';

export interface GenerateOptions {
  /** Cache and backup partition, defaults to "default" */
  namespace?: string;
  /** Leave fakes installed after generation */
  skipRevert?: boolean;
  /** Accepted exit status: `0`, `0-2`, `0,3` or "default" */
  expectedExitStatus?: string | number;
}

interface ProduceRequest {
  params: string;
  namespace: string;
  fingerprint: Fingerprint;
  fakeQueue: string;
  expected: string;
  ranges: StatusRange[];
  startedAt: Date;
}

interface ProducedReport {
  artifactPath: string;
  record: StoreRecord;
  listingCount: number;
}

export interface ReportResult {
  /** Artifact path inside the store */
  artifactPath: string;
  /** True when a stored artifact was returned without running the tool */
  reused: boolean;
  fingerprint: Fingerprint;
  record: StoreRecord;
  /** Number of archive members in the listing */
  listingCount: number;
  /** Fake application report, absent on reuse */
  apply?: ApplyReport;
  /** Revert outcome, absent when no revert was attempted */
  revert?: RevertReport;
  durationMs: number;
}

/**
 * Resolve the namespace argument: blank means the default namespace.
 */
export function normalizeNamespace(namespace: string | undefined): string {
  const value = namespace?.trim() ?? '';
  if (value === '') {
    return REPORT_DEFAULTS.NAMESPACE;
  }
  if (/\s/.test(value)) {
    throw new UsageError(`${OPERATION}: namespace '${value}' must not contain whitespace`, {
      operation: OPERATION,
    });
  }
  return value;
}

export class ReportGenerator {
  private current: string | undefined;

  constructor(
    private readonly context: HarnessContext,
    private readonly queue: FakeQueue,
    private readonly overlay: OverlayManager,
    private readonly store: ReportStore,
    private readonly runner: ToolRunner,
    private readonly lister: ArchiveLister
  ) {
    this.current = store.currentArtifact();
  }

  /**
   * Artifact produced or reused by the last successful request, also when
   * that request ran in another process. Cleared when a request fails.
   */
  get latestArtifact(): string | undefined {
    return this.current;
  }

  /**
   * Forget the latest artifact (after the store was purged).
   */
  clearLatest(): void {
    this.current = undefined;
  }

  async generateOrReuse(params: string, options: GenerateOptions = {}): Promise<ReportResult> {
    const startedAt = new Date();
    const namespace = normalizeNamespace(options.namespace);
    const expected = normalizeExpectedStatus(options.expectedExitStatus);
    const ranges = parseExpectedStatus(expected);
    const log = this.context.log;

    this.current = undefined;
    this.store.clearCurrent();

    const fakeQueue = this.queue.raw();
    const fingerprint = computeFingerprint(params, namespace, fakeQueue);
    log.log(`${OPERATION}: was asked for <${fingerprintId(fingerprint)}>`);
    if (this.queue.hasTreeFakes()) {
      log.log(`${OPERATION}: tree fakes not yet implemented, will be skipped`);
    }

    const stored = this.store.lookup(fingerprint);
    if (stored) {
      return this.reuse(stored, fingerprint, options, startedAt);
    }

    const apply = await this.overlay.applyAll();

    const unsupported = findFlag(params, this.context.config.tool.unsupportedFlags);
    if (unsupported !== undefined) {
      log.log(`${OPERATION}: ${unsupported} parameter detected but not supported yet, bailing out`);
      throw new UnsupportedModeError(unsupported, { operation: OPERATION, namespace });
    }

    let produced: ProducedReport;
    try {
      produced = await this.produce({ params, namespace, fingerprint, fakeQueue, expected, ranges, startedAt });
    } catch (error) {
      await this.revertAfterFailure(options.skipRevert, error);
      throw error;
    }

    this.setCurrent(produced.artifactPath);
    const revert = await this.revertUnlessSkipped(options.skipRevert);

    return {
      artifactPath: produced.artifactPath,
      reused: false,
      fingerprint,
      record: produced.record,
      listingCount: produced.listingCount,
      apply,
      revert,
      durationMs: Date.now() - startedAt.getTime(),
    };
  }

  /**
   * Run the tool with the fakes installed and move its artifact into the store.
   */
  private async produce(request: ProduceRequest): Promise<ProducedReport> {
    const { params, namespace, fingerprint, fakeQueue, expected, ranges, startedAt } = request;
    const { tool, artifact } = this.context.config;
    const log = this.context.log;

    const batch = hasFlag(params, tool.batchFlag);
    const invocation: ToolInvocation = {
      commandLine: [tool.command, params.trim()].filter((part) => part !== '').join(' '),
      stdin: batch ? undefined : `${tool.interactiveAnswers.join('\n')}\n`,
      timeoutMs: tool.timeoutMs,
      stream: tool.streamOutput,
    };
    log.log(
      `${OPERATION}: executing "${invocation.commandLine}"` +
        (batch ? ' with stdin closed' : ' with scripted answers')
    );

    let run: ToolRunResult;
    try {
      run = await this.runner.run(invocation);
    } catch (error) {
      log.log(`${OPERATION}: cannot start "${invocation.commandLine}": ${getErrorMessage(error)}`);
      throw new ExternalToolError(
        `Cannot start report tool: ${getErrorMessage(error)}`,
        null,
        expected,
        { operation: OPERATION, namespace, timing: createTimingContext(startedAt) },
        error instanceof Error ? error : undefined
      );
    }

    if (run.timedOut || !statusMatches(run.exitCode, ranges)) {
      const reason = run.timedOut
        ? `timed out after ${tool.timeoutMs}ms`
        : `exited with ${run.exitCode ?? `signal ${run.signal}`}`;
      log.log(`${OPERATION}: report tool ${reason}, expected ${expected}`);
      throw new ExternalToolError(`Report tool ${reason}, expected ${expected}`, run.exitCode, expected, {
        operation: OPERATION,
        namespace,
        timing: createTimingContext(startedAt),
      });
    }

    const announced = extractArtifactPath(run.output, artifact.marker, artifact.pattern);
    if (announced === undefined) {
      log.log(`${OPERATION}: generated report not recognized from tool output!`);
      throw new ArtifactNotRecognizedError({ operation: OPERATION, namespace });
    }
    if (!existsSync(announced)) {
      log.log(`${OPERATION}: announced report ${announced} does not exist`);
      throw new ArtifactNotRecognizedError(
        { operation: OPERATION, namespace, path: announced },
        `Announced report ${announced} does not exist`
      );
    }

    const adopted = this.store.adopt(announced);
    const record: StoreRecord = {
      reuseCount: 1,
      fingerprint,
      filename: basename(adopted.artifactPath),
    };
    this.store.append(record);
    this.store.writeSideFiles(adopted.artifactPath, { fakeQueue, params, output: run.output });

    const entries = await this.listArchive(adopted.artifactPath);
    this.store.writeListing(adopted.artifactPath, entries);
    log.log(`${OPERATION}: listed ${entries.length} entries of ${record.filename}`);
    log.log(`${OPERATION}: report=${adopted.artifactPath}`);

    return { artifactPath: adopted.artifactPath, record, listingCount: entries.length };
  }

  private async reuse(
    record: StoreRecord,
    fingerprint: Fingerprint,
    options: GenerateOptions,
    startedAt: Date
  ): Promise<ReportResult> {
    const artifactPath = this.store.pathFor(record.filename);
    this.store.markLatest(artifactPath);
    this.context.log.log(
      `${OPERATION}: reusing ${record.filename} (used ${record.reuseCount} times)`
    );

    this.setCurrent(artifactPath);
    const revert = await this.revertUnlessSkipped(options.skipRevert);

    return {
      artifactPath,
      reused: true,
      fingerprint,
      record,
      listingCount: splitLines(this.store.readListing(artifactPath)).length,
      revert,
      durationMs: Date.now() - startedAt.getTime(),
    };
  }

  private setCurrent(artifactPath: string): void {
    this.current = artifactPath;
    this.store.recordCurrent(artifactPath);
  }

  /**
   * A failed request still uninstalls its fakes; the original error wins
   * over any revert problem.
   */
  private async revertAfterFailure(skipRevert: boolean | undefined, cause: unknown): Promise<void> {
    const log = this.context.log;
    try {
      const revert = await this.revertUnlessSkipped(skipRevert);
      if (revert) {
        log.log(
          `${OPERATION}: failed (${getErrorMessage(cause)}), ` +
            (revert.ok ? 'fakes reverted' : 'fakes could not all be reverted')
        );
      }
    } catch (error) {
      log.log(`${OPERATION}: failed (${getErrorMessage(cause)}), cannot revert fakes: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Revert result is reported, never turned into a failure of the request.
   */
  private async revertUnlessSkipped(skipRevert = false): Promise<RevertReport | undefined> {
    if (skipRevert || this.queue.isEmpty()) {
      return undefined;
    }
    return this.overlay.revertAll();
  }

  private async listArchive(artifactPath: string): Promise<string[]> {
    try {
      return await this.lister.list(artifactPath);
    } catch (error) {
      this.context.log.log(`${OPERATION}: cannot list ${artifactPath}: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
