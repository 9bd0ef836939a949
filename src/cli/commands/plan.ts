/**
 * Plan Command Handler
 *
 * Shows which snapshots `disksnap snapshot` would create, without creating
 * any. Only read-only provider calls are made.
 */

import { resolve } from 'node:path';

import { readVmList } from '../../core/vm-list.js';
import { planSnapshots } from '../../core/runner.js';
import { VmListError } from '../../core/errors.js';
import { createOutput } from '../output.js';
import {
  createDefaultProvider,
  loadSettings,
  reportFatal,
  toRunOptions,
  type CommandDependencies,
  type SelectionOptions,
} from './shared.js';

export type PlanCommandOptions = SelectionOptions;

/**
 * Execute the plan command and return its exit code.
 */
export async function runPlanCommand(
  file: string | undefined,
  options: PlanCommandOptions,
  deps: CommandDependencies = {}
): Promise<number> {
  const output = createOutput('plan', options);
  const cwd = deps.cwd ?? process.cwd();

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
      },
      cwd
    );
    const runOptions = toRunOptions(options.ticket, settings);
    const vmIdentifiers = await readVmList(resolve(cwd, file));

    const createProvider = deps.createProvider ?? createDefaultProvider;
    const provider = createProvider(settings, options.verbose === true);
    const plan = await planSnapshots(vmIdentifiers, runOptions, {
      provider,
      logger: output,
    });

    output.planSummary(plan, settings.maxLength);
    output.flush();
    return 0;
  } catch (error) {
    return reportFatal(output, error);
  }
}

/**
 * commander action for `disksnap plan`.
 */
export async function planCommand(
  file: string | undefined,
  options: PlanCommandOptions
): Promise<void> {
  process.exit(await runPlanCommand(file, options));
}
