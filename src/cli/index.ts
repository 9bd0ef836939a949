#!/usr/bin/env node
import { Command, program } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { snapshotCommand } from './commands/snapshot.js';
import { planCommand } from './commands/plan.js';
import { validateCommand } from './commands/validate.js';
import {
  parseMaxLength,
  parseNamingPolicy,
  parseReportFormat,
  parseSearchPolicy,
} from './commands/shared.js';

// Get version from package.json (two levels up from both src/cli and dist/cli)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as {
  version: string;
};

const VERBOSE_DESC = 'Print PowerShell scripts before execution';

program
  .name('disksnap')
  .description(
    'Snapshot Azure VM managed disks across subscriptions, ' +
      'named after a ticket reference'
  )
  .version(packageJson.version)
  .option('--verbose', VERBOSE_DESC);

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   disksnap --verbose snapshot list.txt    (parent parses --verbose)
 *   disksnap snapshot list.txt --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return {
    ...opts,
    verbose: opts.verbose === true || globalOpts.verbose === true,
  };
}

/**
 * Options shared by snapshot and plan.
 */
function addSelectionOptions(command: Command): Command {
  return command
    .requiredOption(
      '-t, --ticket <ref>',
      'Ticket reference embedded in every snapshot name'
    )
    .option('-c, --config <file>', 'YAML configuration file')
    .option(
      '--search <policy>',
      'Context search policy: first-match, exhaustive',
      parseSearchPolicy
    )
    .option(
      '--naming <policy>',
      'Naming policy: vmDiskCombined, diskOnly',
      parseNamingPolicy
    )
    .option(
      '--max-length <n>',
      'Maximum snapshot name length (default: 82)',
      parseMaxLength
    )
    .option('--json', 'Output as JSON')
    .option('--verbose', VERBOSE_DESC);
}

addSelectionOptions(
  program
    .command('snapshot [vm-list]')
    .description('Create a snapshot of every disk of every VM in the list')
    .option(
      '-o, --output <path>',
      'Report directory, or a .csv/.json file path'
    )
    .option('--format <format>', 'Report format: csv, json', parseReportFormat)
).action((file, opts) => snapshotCommand(file, withGlobalOpts(opts)));

addSelectionOptions(
  program
    .command('plan [vm-list]')
    .description(
      'Show the snapshots that would be created, without creating them'
    )
).action((file, opts) => planCommand(file, withGlobalOpts(opts)));

program
  .command('validate <file>')
  .description('Validate a YAML configuration file')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

await program.parseAsync();
