import { describe, it, expect, afterEach } from 'vitest';
import { chmodSync } from 'fs';
import { TarArchiveLister } from '../../src/store/listing.js';
import { TempDirectory } from '../support/temp-directory.js';

describe('store/TarArchiveLister', () => {
  let temp: TempDirectory | undefined;

  afterEach(() => {
    temp?.cleanup();
    temp = undefined;
  });

  const fakeTar = (script: string): string => {
    temp = new TempDirectory();
    const path = temp.writeFile('bin/tar', `#!/bin/sh\n${script}\n`);
    chmodSync(path, 0o755);
    return path;
  };

  it('should return one entry per listed member', async () => {
    const lister = new TarArchiveLister(fakeTar('printf "report/\\nreport/etc/hosts\\n"'));

    expect(await lister.list('/tmp/sosreport-a.tar.xz')).toEqual(['report/', 'report/etc/hosts']);
  });

  it('should pass tf and the archive path', async () => {
    const lister = new TarArchiveLister(fakeTar('echo "$1 $2"'));

    expect(await lister.list('/tmp/sosreport-b.tar.xz')).toEqual(['tf /tmp/sosreport-b.tar.xz']);
  });

  it('should reject when tar fails', async () => {
    const lister = new TarArchiveLister(fakeTar('echo "cannot open" >&2; exit 2'));

    await expect(lister.list('/tmp/broken.tar')).rejects.toThrow('exited with 2: cannot open');
  });

  it('should reject when tar cannot be started', async () => {
    const lister = new TarArchiveLister('/nonexistent/report-harness-tar');

    await expect(lister.list('/tmp/a.tar')).rejects.toThrow('ENOENT');
  });
});
