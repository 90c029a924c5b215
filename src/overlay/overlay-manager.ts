/**
 * Overlay manager: installs queued fakes onto the live filesystem and
 * reverts them through the backup provider.
 *
 * Application is best-effort. A fake that cannot be backed up or copied is
 * recorded in its outcome and the pass moves on to the next entry.
 */

import { chmodSync, copyFileSync, existsSync, mkdirSync, statSync } from 'fs';
import { dirname } from 'path';
import type { HarnessContext } from '../context/harness-context.js';
import {
  BackupError,
  CopyError,
  RevertError,
  getErrorMessage,
  type FakeError,
} from '../errors/types.js';
import type { FakeQueue } from '../fakes/queue.js';
import type { CommandFake, FileFake, QueuedFake } from '../fakes/types.js';
import type { BackupProvider, RestoreResult } from './backup.js';

export type FakeOutcomeStatus = 'applied' | 'backup-failed' | 'copy-failed' | 'skipped';

export interface FakeOutcome {
  fake: QueuedFake;
  status: FakeOutcomeStatus;
  /** Why a fake was skipped */
  reason?: string;
  error?: FakeError;
}

export interface ApplyReport {
  outcomes: FakeOutcome[];
  /** 'empty' with nothing queued, 'partial' when any entry was not applied */
  status: 'empty' | 'applied' | 'partial';
}

export interface RevertReport extends RestoreResult {
  error?: RevertError;
}

const EXECUTABLE_BITS = 0o111;

export class OverlayManager {
  constructor(
    private readonly context: HarnessContext,
    private readonly queue: FakeQueue,
    private readonly backups: BackupProvider
  ) {}

  /**
   * Apply every queued fake, in order.
   */
  async applyAll(): Promise<ApplyReport> {
    const outcomes: FakeOutcome[] = [];

    for (const fake of this.queue.read()) {
      switch (fake.kind) {
        case 'command':
        case 'file':
          outcomes.push(await this.install(fake));
          break;
        case 'tree':
          // TODO: extract into / after a namespaced backup of every archive member
          this.context.log.log(`applyFakes: skipping unimplemented TREE fake entry (${fake.archivePath})`);
          outcomes.push({ fake, status: 'skipped', reason: 'tree fakes are not installed yet' });
          break;
        case 'unknown':
          this.context.log.log(`applyFakes: unknown fake type (${fake.tag})`);
          outcomes.push({ fake, status: 'skipped', reason: `unknown fake type ${fake.tag}` });
          break;
      }
    }

    const status =
      outcomes.length === 0
        ? 'empty'
        : outcomes.every((outcome) => outcome.status === 'applied')
          ? 'applied'
          : 'partial';

    this.context.logger.debug({ status, count: outcomes.length }, 'Applied fakes');
    return { outcomes, status };
  }

  /**
   * Clear the queue, then restore everything backed up under the namespace.
   * The queue ends up empty even when restoring fails.
   */
  async revertAll(): Promise<RevertReport> {
    const namespace = this.context.backupNamespace;
    this.queue.reset();

    let result: RestoreResult;
    try {
      result = await this.backups.restoreAll(namespace);
    } catch (error) {
      result = { ok: false, restored: [], failures: [{ path: namespace, error: getErrorMessage(error) }] };
    }

    if (result.ok) {
      this.context.log.log('unfake: fakes successfully uninstalled');
      return result;
    }

    const failedPaths = result.failures.map((failure) => failure.path);
    this.context.log.log(`unfake: uninstall error (${failedPaths.join(', ')})`);
    return { ...result, error: new RevertError(namespace, failedPaths) };
  }

  private async install(fake: CommandFake | FileFake): Promise<FakeOutcome> {
    const tag = fake.kind === 'command' ? 'CMD' : 'FILE';
    const backedUp = await this.backups.backup(fake.destination, this.context.backupNamespace, {
      clean: true,
    });
    if (!backedUp) {
      this.context.log.log(`applyFakes: cannot backup '${fake.destination}', skipping`);
      return { fake, status: 'backup-failed', error: new BackupError(fake.destination) };
    }

    const parent = dirname(fake.destination);
    if (!existsSync(parent)) {
      // Recorded as absent so restoring removes the directories created here
      const created = firstMissingAncestor(parent);
      const recorded = await this.backups.backup(created, this.context.backupNamespace, { clean: true });
      if (!recorded) {
        this.context.log.log(`applyFakes: cannot backup '${created}', skipping`);
        return { fake, status: 'backup-failed', error: new BackupError(created) };
      }
    }

    try {
      if (!existsSync(parent)) {
        mkdirSync(parent, { recursive: true });
      }
      copyFileSync(fake.source, fake.destination);
      if (fake.kind === 'command') {
        chmodSync(fake.destination, statSync(fake.destination).mode | EXECUTABLE_BITS);
      }
    } catch (error) {
      this.context.log.log(`applyFakes: cannot install ${tag} fake '${fake.source}' to '${fake.destination}'`);
      return {
        fake,
        status: 'copy-failed',
        error: new CopyError(fake.source, fake.destination, error instanceof Error ? error : undefined),
      };
    }

    this.context.log.log(`applyFakes: installed ${tag} fake '${fake.source}' as '${fake.destination}'`);
    return { fake, status: 'applied' };
  }
}

/**
 * Topmost directory of `dir` that does not exist yet.
 */
function firstMissingAncestor(dir: string): string {
  let missing = dir;
  while (dirname(missing) !== missing && !existsSync(dirname(missing))) {
    missing = dirname(missing);
  }
  return missing;
}
