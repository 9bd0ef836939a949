/**
 * Configuration Resolver
 *
 * Applies defaults and command-line overrides to produce the settings a
 * run uses.
 */

import { dirname, extname, resolve } from 'node:path';

import type {
  CliOverrides,
  DisksnapConfig,
  ReportFormat,
  ResolvedSettings,
} from './types.js';
import { DEFAULT_MAX_NAME_LENGTH } from '../core/naming.js';
import {
  DEFAULT_POWERSHELL_PATH,
  DEFAULT_TIMEOUT_MS,
} from '../azure/executor.js';
import { expandPath, isReportFilePath } from '../lib/paths.js';

/**
 * Default values when neither the config file nor the command line sets them
 */
export const DEFAULTS = {
  searchPolicy: 'first-match' as const,
  namingPolicy: 'vmDiskCombined' as const,
  maxLength: DEFAULT_MAX_NAME_LENGTH,
  reportPrefix: 'snapshot-report',
  reportFormat: 'csv' as const,
  powershellPath: DEFAULT_POWERSHELL_PATH,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  useManagedIdentity: false,
};

/**
 * Resolve settings.
 *
 * Precedence is command line, then configuration file, then defaults.
 * Paths from the configuration file resolve against its directory; paths
 * from the command line resolve against `cwd`.
 *
 * @param config - Validated configuration, or `{}` without a file
 * @param configPath - Path of the configuration file, if any
 * @param overrides - Command-line values
 * @param cwd - Working directory (default: process.cwd())
 */
export function resolveSettings(
  config: DisksnapConfig,
  configPath: string | null,
  overrides: CliOverrides = {},
  cwd: string = process.cwd()
): ResolvedSettings {
  const absoluteConfigPath = configPath ? resolve(cwd, configPath) : null;
  const configDir = absoluteConfigPath ? dirname(absoluteConfigPath) : cwd;

  let directory = config.report?.directory
    ? expandPath(config.report.directory, configDir)
    : cwd;
  let filePath: string | null = null;
  let format: ReportFormat =
    overrides.format ?? config.report?.format ?? DEFAULTS.reportFormat;

  if (overrides.output) {
    const output = expandPath(overrides.output, cwd);
    if (isReportFilePath(output)) {
      filePath = output;
      directory = dirname(output);
      // The extension decides the format unless --format says otherwise
      if (!overrides.format) {
        format = extname(output).toLowerCase() === '.json' ? 'json' : 'csv';
      }
    } else {
      directory = output;
    }
  }

  return {
    searchPolicy:
      overrides.search ?? config.search?.policy ?? DEFAULTS.searchPolicy,
    namingPolicy:
      overrides.naming ?? config.naming?.policy ?? DEFAULTS.namingPolicy,
    maxLength:
      overrides.maxLength ?? config.naming?.max_length ?? DEFAULTS.maxLength,
    contexts: {
      include: config.contexts?.include ?? [],
      exclude: config.contexts?.exclude ?? [],
    },
    report: {
      directory,
      prefix: config.report?.prefix ?? DEFAULTS.reportPrefix,
      format,
      filePath,
    },
    provider: {
      powershellPath:
        config.provider?.powershell_path ?? DEFAULTS.powershellPath,
      timeoutMs: config.provider?.timeout_ms ?? DEFAULTS.timeoutMs,
      useManagedIdentity:
        config.provider?.use_managed_identity ?? DEFAULTS.useManagedIdentity,
    },
    configPath: absoluteConfigPath,
  };
}
