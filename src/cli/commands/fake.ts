/**
 * fake command - queue a command, file or tree fake.
 */

import { Command } from 'commander';
import { UsageError } from '../../errors/types.js';
import { FAKE_KINDS, isFakeKind } from '../../fakes/types.js';
import { serializeFake } from '../../fakes/serialization.js';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

export const fakeCommand = new Command('fake')
  .description('Queue a fake to install before the next report')
  .argument('<kind>', `Fake kind: ${FAKE_KINDS.join(', ')}`)
  .argument('<paths...>', 'Fake and destination paths (tree: archive path)')
  .addHelpText(
    'after',
    `
Examples:
  $ report-harness fake command ./fakes/lsblk /usr/bin/lsblk
  $ report-harness fake file ./fakes/hosts /etc/hosts
  $ report-harness fake tree ./fakes/etc-tree.tar.gz
`
  )
  .action(
    runAction((kind: string, paths: string[], _options: unknown, command: Command) => {
      if (!isFakeKind(kind)) {
        throw new UsageError(`Unknown fake kind '${kind}' (expected one of: ${FAKE_KINDS.join(', ')})`, {
          metadata: { kind },
        });
      }

      const harness = openHarness(command);
      const entry = harness.enqueue(kind, paths);
      output.success(`Queued ${serializeFake(entry)}`);
    })
  );
