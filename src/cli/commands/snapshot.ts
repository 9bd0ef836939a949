/**
 * Snapshot Command Handler
 *
 * Snapshots every disk of every listed VM and writes the run report.
 */

import { resolve } from 'node:path';

import { readVmList } from '../../core/vm-list.js';
import { runSnapshots } from '../../core/runner.js';
import { VmListError } from '../../core/errors.js';
import { systemClock } from '../../core/types.js';
import type { ReportFormat } from '../../config/types.js';
import { writeReport } from '../../report/writer.js';
import { createOutput } from '../output.js';
import {
  createDefaultProvider,
  loadSettings,
  reportFatal,
  toRunOptions,
  type CommandDependencies,
  type SelectionOptions,
} from './shared.js';

/**
 * Options for the snapshot command
 */
export interface SnapshotCommandOptions extends SelectionOptions {
  output?: string;
  format?: ReportFormat;
}

/**
 * Execute the snapshot command and return its exit code.
 *
 * This command:
 * 1. Loads settings (config file, when given, plus flags)
 * 2. Reads the VM list
 * 3. Authenticates and enumerates account contexts
 * 4. Locates each VM and snapshots each of its disks
 * 5. Writes the report and prints the summary
 *
 * Per-disk failures do not change the exit code; only fatal errors do.
 */
export async function runSnapshotCommand(
  file: string | undefined,
  options: SnapshotCommandOptions,
  deps: CommandDependencies = {}
): Promise<number> {
  const output = createOutput('snapshot', options);
  const cwd = deps.cwd ?? process.cwd();
  const clock = deps.clock ?? systemClock;

  try {
    if (!file) {
      throw new VmListError('No VM list given', 'VM_LIST_NOT_FOUND', '');
    }

    const settings = await loadSettings(
      options.config,
      {
        search: options.search,
        naming: options.naming,
        maxLength: options.maxLength,
        output: options.output,
        format: options.format,
      },
      cwd
    );
    const runOptions = toRunOptions(options.ticket, settings);

    const vmIdentifiers = await readVmList(resolve(cwd, file));
    const ticket = runOptions.ticketReference.trim();
    output.info(`${vmIdentifiers.length} VM(s) to process, ticket ${ticket}`);

    const createProvider = deps.createProvider ?? createDefaultProvider;
    const provider = createProvider(settings, options.verbose === true);
    const result = await runSnapshots(vmIdentifiers, runOptions, {
      provider,
      logger: output,
      clock,
    });

    const reportPath = await writeReport(
      result.entries,
      result.summary,
      settings.report,
      clock()
    );
    output.runReport(result.entries, result.summary, reportPath);
    output.flush();
    return 0;
  } catch (error) {
    return reportFatal(output, error);
  }
}

/**
 * commander action for `disksnap snapshot`.
 */
export async function snapshotCommand(
  file: string | undefined,
  options: SnapshotCommandOptions
): Promise<void> {
  process.exit(await runSnapshotCommand(file, options));
}
