/**
 * assert-included / assert-excluded commands - check the latest report's
 * archive listing.
 */

import { Command } from 'commander';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

export const assertIncludedCommand = new Command('assert-included')
  .description('Fail unless the latest report contains an entry matching <regexp>')
  .argument('<regexp>', 'Regular expression tested against each archive entry')
  .action(
    runAction((pattern: string, _options: unknown, command: Command) => {
      const harness = openHarness(command);
      harness.assertArtifactContains(pattern);
      output.success(`PASS: '${pattern}' found in ${harness.latestArtifact}`);
    })
  );

export const assertExcludedCommand = new Command('assert-excluded')
  .description('Fail if the latest report contains an entry matching <regexp>')
  .argument('<regexp>', 'Regular expression tested against each archive entry')
  .action(
    runAction((pattern: string, _options: unknown, command: Command) => {
      const harness = openHarness(command);
      harness.assertArtifactNotContains(pattern);
      output.success(`PASS: '${pattern}' absent from ${harness.latestArtifact}`);
    })
  );
