/**
 * report command - generate a report, or reuse a stored one with the same
 * fingerprint.
 */

import { Command } from 'commander';
import { fingerprintId } from '../../fingerprint/fingerprint.js';
import { formatDuration } from '../../utils/formatters.js';
import * as output from '../output.js';
import { openHarness, runAction } from './shared.js';

interface ReportOptions {
  namespace?: string;
  revert: boolean;
  expect?: string;
  json?: boolean;
}

export const reportCommand = new Command('report')
  .description('Generate a report with the queued fakes installed, or reuse a stored one')
  .argument('<params>', 'Parameter string passed to the report tool')
  .option('-n, --namespace <name>', 'Cache and backup partition', 'default')
  .option('--no-revert', 'Leave fakes installed after generation')
  .option('-e, --expect <status>', 'Accepted exit status: 0, 0-2 or 0,3', 'default')
  .option('--json', 'Print the result as JSON (tool output is not streamed)')
  .addHelpText(
    'after',
    `
Examples:
  $ report-harness report "--batch -o networking"
  $ report-harness report "--batch" -n kernel --no-revert -e 0,1
`
  )
  .action(
    runAction(async (params: string, options: ReportOptions, command: Command) => {
      const harness = openHarness(command, {
        configure: (config) =>
          options.json ? { ...config, tool: { ...config.tool, streamOutput: false } } : config,
      });

      const result = await harness.generateReport(params, {
        namespace: options.namespace,
        skipRevert: !options.revert,
        expectedExitStatus: options.expect,
      });

      if (options.json) {
        output.json(result);
        return;
      }

      if (result.revert?.error) {
        output.warn(result.revert.error.message);
      }

      output.data(result.artifactPath);
      output.keyValue('Reused', result.reused);
      output.keyValue('Fingerprint', fingerprintId(result.fingerprint));
      output.keyValue('Reuse count', result.record.reuseCount);
      output.keyValue('Entries', result.listingCount);
      output.keyValue('Duration', formatDuration(result.durationMs));
    })
  );
