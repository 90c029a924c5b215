import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, statSync } from 'fs';
import { openHarnessContext, type HarnessContext } from '../../src/context/harness-context.js';
import { validateConfig } from '../../src/config/validator.js';
import { BackupError, CopyError, RevertError } from '../../src/errors/types.js';
import { FakeQueue } from '../../src/fakes/queue.js';
import type { BackupProvider, RestoreResult } from '../../src/overlay/backup.js';
import { FileBackupProvider } from '../../src/overlay/backup.js';
import { OverlayManager } from '../../src/overlay/overlay-manager.js';
import { TempDirectory } from '../support/temp-directory.js';

class FailingRestoreProvider implements BackupProvider {
  async backup(): Promise<boolean> {
    return true;
  }

  async restoreAll(): Promise<RestoreResult> {
    throw new Error('backup store unavailable');
  }
}

class RefusingBackupProvider implements BackupProvider {
  async backup(): Promise<boolean> {
    return false;
  }

  async restoreAll(): Promise<RestoreResult> {
    return { ok: true, restored: [], failures: [] };
  }
}

describe('overlay/OverlayManager', () => {
  let temp: TempDirectory;
  let context: HarnessContext;
  let queue: FakeQueue;
  let overlay: OverlayManager;

  beforeEach(() => {
    temp = new TempDirectory();
    context = openHarnessContext(validateConfig({ storage: { root: temp.resolve('root') } }), {
      resetQueue: true,
    });
    queue = new FakeQueue(context);
    overlay = new OverlayManager(context, queue, new FileBackupProvider(context.paths.backups, context.logger));
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('applyAll', () => {
    it('should report an empty queue', async () => {
      expect(await overlay.applyAll()).toEqual({ outcomes: [], status: 'empty' });
    });

    it('should install a command fake as an executable', async () => {
      const fake = temp.writeFile('fakes/lsblk', '#!/bin/sh\necho fake\n');
      const dest = temp.writeFile('bin/lsblk', '#!/bin/sh\necho real\n');
      queue.enqueueCommand(fake, dest);

      const report = await overlay.applyAll();

      expect(report.status).toBe('applied');
      expect(readFileSync(dest, 'utf-8')).toBe('#!/bin/sh\necho fake\n');
      expect(statSync(dest).mode & 0o111).toBe(0o111);
    });

    it('should create the parent directory of a missing destination', async () => {
      const fake = temp.writeFile('fakes/conf', 'fake=1\n');
      const dest = temp.resolve('etc/new/dir/app.conf');
      queue.enqueueFile(fake, dest);

      const report = await overlay.applyAll();

      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['applied']);
      expect(readFileSync(dest, 'utf-8')).toBe('fake=1\n');
    });

    it('should remove directories it created when reverting', async () => {
      temp.mkdir('etc');
      const fake = temp.writeFile('fakes/conf', 'fake=1\n');
      const dest = temp.resolve('etc/new/dir/app.conf');
      queue.enqueueFile(fake, dest);
      await overlay.applyAll();

      const result = await overlay.revertAll();

      expect(result.ok).toBe(true);
      expect(existsSync(temp.resolve('etc/new'))).toBe(false);
      expect(existsSync(temp.resolve('etc'))).toBe(true);
    });

    it('should skip tree fakes and continue with the rest', async () => {
      const archive = temp.writeFile('fakes/tree.tar', 'tar');
      const fake = temp.writeFile('fakes/hosts', 'fake\n');
      const dest = temp.resolve('etc/hosts');
      queue.enqueueTree(archive);
      queue.enqueueFile(fake, dest);

      const report = await overlay.applyAll();

      expect(report.status).toBe('partial');
      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['skipped', 'applied']);
      expect(existsSync(dest)).toBe(true);
    });

    it('should log and skip unknown kinds', async () => {
      temp.writeFile('root/fakelist.txt', 'LINK:/a:/b\n');

      const report = await overlay.applyAll();

      expect(report.outcomes).toHaveLength(1);
      expect(report.outcomes[0].status).toBe('skipped');
      expect(readFileSync(context.paths.log, 'utf-8')).toContain('applyFakes: unknown fake type (LINK)');
    });

    it('should skip an entry whose backup fails', async () => {
      const refusing = new OverlayManager(context, queue, new RefusingBackupProvider());
      const fake = temp.writeFile('fakes/hosts', 'fake\n');
      const dest = temp.writeFile('etc/hosts', 'real\n');
      queue.enqueueFile(fake, dest);

      const report = await refusing.applyAll();

      expect(report.outcomes[0].status).toBe('backup-failed');
      expect(report.outcomes[0].error).toBeInstanceOf(BackupError);
      expect(readFileSync(dest, 'utf-8')).toBe('real\n');
    });

    it('should continue after a copy failure', async () => {
      const fake = temp.writeFile('fakes/hosts', 'fake\n');
      // A directory cannot be overwritten by copyFile
      const blocked = temp.mkdir('etc/blocked');
      const dest = temp.resolve('etc/motd');
      queue.enqueueFile(fake, blocked);
      queue.enqueueFile(fake, dest);

      const report = await overlay.applyAll();

      expect(report.status).toBe('partial');
      expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['copy-failed', 'applied']);
      expect(report.outcomes[0].error).toBeInstanceOf(CopyError);
    });
  });

  describe('revertAll', () => {
    it('should restore destinations and empty the queue', async () => {
      const fake = temp.writeFile('fakes/hosts', 'fake\n');
      const existing = temp.writeFile('etc/hosts', 'real\n');
      const created = temp.resolve('bin/newcmd');
      queue.enqueueFile(fake, existing);
      queue.enqueueCommand(fake, created);
      await overlay.applyAll();

      const result = await overlay.revertAll();

      expect(result.ok).toBe(true);
      expect(result.error).toBeUndefined();
      expect(readFileSync(existing, 'utf-8')).toBe('real\n');
      expect(existsSync(created)).toBe(false);
      expect(queue.isEmpty()).toBe(true);
      expect(readFileSync(context.paths.log, 'utf-8')).toContain('unfake: fakes successfully uninstalled');
    });

    it('should empty the queue even when restoring fails', async () => {
      const failing = new OverlayManager(context, queue, new FailingRestoreProvider());
      queue.enqueueFile(temp.writeFile('fakes/hosts', 'fake\n'), temp.resolve('etc/hosts'));

      const result = await failing.revertAll();

      expect(result.ok).toBe(false);
      expect(result.error).toBeInstanceOf(RevertError);
      expect(result.failures).toEqual([{ path: 'report-harness', error: 'backup store unavailable' }]);
      expect(queue.raw()).toBe('');
    });
  });
});
