/**
 * Validate Command Handler
 *
 * Checks a configuration file against the schema and shows the settings
 * it resolves to. Makes no provider calls.
 */

import { createOutput } from '../output.js';
import { loadSettings, reportFatal } from './shared.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command and return its exit code.
 */
export async function runValidateCommand(
  file: string,
  options: ValidateCommandOptions,
  cwd: string = process.cwd()
): Promise<number> {
  const output = createOutput('validate', options);

  try {
    const settings = await loadSettings(file, {}, cwd);
    output.validationSuccess(settings);
    output.flush();
    return 0;
  } catch (error) {
    return reportFatal(output, error);
  }
}

/**
 * commander action for `disksnap validate`.
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  process.exit(await runValidateCommand(file, options));
}
