import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { existsSync, readFileSync, readdirSync, readlinkSync, unlinkSync } from 'fs';
import { openHarnessContext, type HarnessContext } from '../../src/context/harness-context.js';
import { validateConfig } from '../../src/config/validator.js';
import { computeFingerprint } from '../../src/fingerprint/fingerprint.js';
import { ReportStore, formatRecord, parseRecord, type StoreRecord } from '../../src/store/report-store.js';
import { TempDirectory } from '../support/temp-directory.js';

const FINGERPRINT = computeFingerprint('--batch', 'default', '');

describe('store/ReportStore', () => {
  let temp: TempDirectory;
  let context: HarnessContext;
  let store: ReportStore;

  const generate = (name: string, content = 'archive\n'): string => temp.writeFile(`out/${name}`, content);

  beforeEach(() => {
    temp = new TempDirectory();
    context = openHarnessContext(validateConfig({ storage: { root: temp.resolve('root') } }), {
      resetQueue: true,
    });
    store = new ReportStore(context);
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('records', () => {
    it('should format and parse db lines', () => {
      const record: StoreRecord = { reuseCount: 3, fingerprint: FINGERPRINT, filename: 'sosreport-a.tar.xz' };
      const line = formatRecord(record);

      expect(line).toBe(`3 ${FINGERPRINT.paramHash} default ${FINGERPRINT.fakeHash} sosreport-a.tar.xz`);
      expect(parseRecord(line)).toEqual(record);
    });

    it('should reject malformed db lines', () => {
      expect(parseRecord('one two three')).toBeNull();
      expect(parseRecord(`x ${FINGERPRINT.paramHash} default ${FINGERPRINT.fakeHash} f`)).toBeNull();
    });

    it('should skip malformed lines when reading', () => {
      temp.writeFile('root/storage/db.txt', `garbage\n${formatRecord({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'f' })}\n`);

      expect(store.records()).toEqual([{ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'f' }]);
    });
  });

  describe('adopt', () => {
    it('should move the artifact and its checksum into the store', () => {
      const artifact = generate('sosreport-host-1.tar.xz');
      temp.writeFile('out/sosreport-host-1.tar.xz.md5', 'from-tool\n');

      const adopted = store.adopt(artifact);

      expect(adopted).toEqual({
        artifactPath: store.pathFor('sosreport-host-1.tar.xz'),
        checksumPath: store.pathFor('sosreport-host-1.tar.xz.md5'),
        checksumGenerated: false,
      });
      expect(existsSync(artifact)).toBe(false);
      expect(readFileSync(adopted.checksumPath, 'utf-8')).toBe('from-tool\n');
    });

    it('should compute a checksum when the tool wrote none', () => {
      const artifact = generate('sosreport-host-2.tar.xz', 'payload\n');
      const expected = createHash('md5').update('payload\n').digest('hex');

      const adopted = store.adopt(artifact);

      expect(adopted.checksumGenerated).toBe(true);
      expect(readFileSync(adopted.checksumPath, 'utf-8')).toBe(`${expected}\n`);
    });

    it('should point the latest marker at the adopted artifact', () => {
      const adopted = store.adopt(generate('sosreport-host-3.tar.xz'));

      expect(readlinkSync(context.paths.latestMarker)).toBe(adopted.artifactPath);
      expect(store.latestArtifact()).toBe(adopted.artifactPath);
    });

    it('should drop records of a filename being overwritten', () => {
      const first = store.adopt(generate('sosreport-same.tar.xz'));
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-same.tar.xz' });

      store.adopt(generate('sosreport-same.tar.xz', 'newer\n'));

      expect(store.records()).toEqual([]);
      expect(readFileSync(first.artifactPath, 'utf-8')).toBe('newer\n');
    });
  });

  describe('lookup', () => {
    it('should return undefined for an unknown fingerprint', () => {
      expect(store.lookup(FINGERPRINT)).toBeUndefined();
    });

    it('should bump the reuse counter of the newest match', () => {
      store.adopt(generate('sosreport-old.tar.xz'));
      store.adopt(generate('sosreport-new.tar.xz'));
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-old.tar.xz' });
      store.append({ reuseCount: 4, fingerprint: FINGERPRINT, filename: 'sosreport-new.tar.xz' });

      const hit = store.lookup(FINGERPRINT);

      expect(hit).toEqual({ reuseCount: 5, fingerprint: FINGERPRINT, filename: 'sosreport-new.tar.xz' });
      expect(store.records().map((record) => record.reuseCount)).toEqual([1, 5]);
    });

    it('should ignore records whose artifact vanished', () => {
      const adopted = store.adopt(generate('sosreport-gone.tar.xz'));
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-gone.tar.xz' });
      unlinkSync(adopted.artifactPath);

      expect(store.lookup(FINGERPRINT)).toBeUndefined();
      expect(readFileSync(context.paths.log, 'utf-8')).toContain(
        "lookup: stored report 'sosreport-gone.tar.xz' is missing, ignoring its record"
      );
    });

    it('should not match a different namespace', () => {
      store.adopt(generate('sosreport-ns.tar.xz'));
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-ns.tar.xz' });

      expect(store.lookup({ ...FINGERPRINT, namespace: 'other' })).toBeUndefined();
    });
  });

  describe('side files', () => {
    it('should write the fake list, params, output and listing', () => {
      const { artifactPath } = store.adopt(generate('sosreport-side.tar.xz'));

      store.writeSideFiles(artifactPath, { fakeQueue: 'CMD:/a:/b\n', params: '--batch', output: 'tool output\n' });
      store.writeListing(artifactPath, ['sosreport-side/', 'sosreport-side/etc/hosts']);

      expect(readFileSync(`${artifactPath}.fakelist`, 'utf-8')).toBe('CMD:/a:/b\n');
      expect(readFileSync(`${artifactPath}.params`, 'utf-8')).toBe('--batch\n');
      expect(readFileSync(`${artifactPath}.output`, 'utf-8')).toBe('tool output\n');
      expect(store.readListing(artifactPath)).toBe('sosreport-side/\nsosreport-side/etc/hosts\n');
    });

    it('should read a missing listing as empty', () => {
      expect(store.readListing(store.pathFor('sosreport-none.tar.xz'))).toBe('');
    });
  });

  describe('current result', () => {
    it('should remember the artifact across store instances', () => {
      const { artifactPath } = store.adopt(generate('sosreport-c.tar.xz'));
      store.recordCurrent(artifactPath);

      expect(new ReportStore(context).currentArtifact()).toBe(artifactPath);
    });

    it('should be empty once cleared while the latest marker stays', () => {
      const { artifactPath } = store.adopt(generate('sosreport-c.tar.xz'));
      store.recordCurrent(artifactPath);

      store.clearCurrent();

      expect(store.currentArtifact()).toBeUndefined();
      expect(store.latestArtifact()).toBe(artifactPath);
    });

    it('should ignore an artifact that no longer exists', () => {
      store.recordCurrent(store.pathFor('sosreport-gone.tar.xz'));

      expect(store.currentArtifact()).toBeUndefined();
    });
  });

  describe('purgeAll', () => {
    it('should remove every artifact file and empty the database', () => {
      const { artifactPath } = store.adopt(generate('sosreport-p.tar.xz'));
      store.writeSideFiles(artifactPath, { fakeQueue: '', params: '', output: '' });
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-p.tar.xz' });
      store.recordCurrent(artifactPath);

      const removed = store.purgeAll();

      expect(removed).toBe(5);
      expect(existsSync(context.paths.currentResult)).toBe(false);
      expect(readdirSync(store.dir).sort()).toEqual(['db.txt', 'log.txt']);
      expect(readFileSync(context.paths.db, 'utf-8')).toBe('');
      expect(store.latestArtifact()).toBeUndefined();
    });

    it('should work on an empty store', () => {
      expect(store.purgeAll()).toBe(0);
      expect(store.records()).toEqual([]);
    });
  });

  describe('list', () => {
    it('should return the directory entries, raw database and record count', () => {
      store.adopt(generate('sosreport-l.tar.xz'));
      store.append({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-l.tar.xz' });

      const listing = store.list();

      expect(listing.count).toBe(1);
      expect(listing.database).toBe(`${formatRecord({ reuseCount: 1, fingerprint: FINGERPRINT, filename: 'sosreport-l.tar.xz' })}\n`);
      expect(listing.entries.map((entry) => entry.name)).toEqual([
        'db.txt',
        'lastreport',
        'log.txt',
        'sosreport-l.tar.xz',
        'sosreport-l.tar.xz.md5',
      ]);
      expect(listing.entries.find((entry) => entry.name === 'lastreport')?.isSymlink).toBe(true);
    });
  });
});
