/**
 * Shared Command Helpers
 *
 * Settings loading, provider construction, option parsing and error
 * handling used by every command.
 */

import { resolve } from 'node:path';

import { InvalidArgumentError } from 'commander';

import { loadYamlFile, ConfigLoadError } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { resolveSettings } from '../../config/resolver.js';
import type {
  CliOverrides,
  DisksnapConfig,
  ReportFormat,
  ResolvedSettings,
} from '../../config/types.js';
import type { CloudProvider } from '../../core/provider.js';
import type { Clock, NamingPolicy, SearchPolicy } from '../../core/types.js';
import { NAMING_POLICIES, SEARCH_POLICIES } from '../../core/types.js';
import type { RunOptions } from '../../core/runner.js';
import {
  ConfigError,
  errorMessage,
  getExitCode,
  isDisksnapError,
} from '../../core/errors.js';
import { PowerShellExecutor } from '../../azure/executor.js';
import { PowerShellAzProvider } from '../../azure/provider.js';
import type { OutputFormatter } from '../output.js';

/**
 * Options shared by the snapshot and plan commands
 */
export interface SelectionOptions {
  ticket: string;
  config?: string;
  search?: SearchPolicy;
  naming?: NamingPolicy;
  maxLength?: number;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Collaborators a command can be given instead of the real ones
 */
export interface CommandDependencies {
  createProvider?: (
    settings: ResolvedSettings,
    verbose: boolean
  ) => CloudProvider;
  clock?: Clock;
  cwd?: string;
}

/**
 * Build the PowerShell Az provider from settings.
 */
export function createDefaultProvider(
  settings: ResolvedSettings,
  verbose: boolean
): CloudProvider {
  const executor = new PowerShellExecutor({
    powershellPath: settings.provider.powershellPath,
    timeoutMs: settings.provider.timeoutMs,
    verbose,
  });
  return new PowerShellAzProvider(executor, {
    useManagedIdentity: settings.provider.useManagedIdentity,
  });
}

/**
 * Load, validate and resolve settings.
 *
 * @throws ConfigError when the file is missing, malformed or invalid
 */
export async function loadSettings(
  configFile: string | undefined,
  overrides: CliOverrides,
  cwd: string = process.cwd()
): Promise<ResolvedSettings> {
  let config: DisksnapConfig = {};

  if (configFile) {
    let raw: unknown;
    try {
      raw = await loadYamlFile(resolve(cwd, configFile));
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        throw error.toConfigError();
      }
      throw error;
    }

    const validation = validateConfig(raw);
    if (!validation.valid) {
      throw new ConfigError(
        `Configuration invalid: ${configFile}`,
        'CONFIG_VALIDATION_FAILED',
        'Fix the listed fields and try again.',
        configFile,
        validation.errors
      );
    }
    config = validation.config;
  }

  return resolveSettings(config, configFile ?? null, overrides, cwd);
}

/**
 * Turn settings into run options.
 *
 * @throws ConfigError when the ticket reference is blank
 */
export function toRunOptions(
  ticket: string,
  settings: ResolvedSettings
): RunOptions {
  if (ticket.trim() === '') {
    throw new ConfigError(
      'Ticket reference must not be blank',
      'CONFIG_VALIDATION_FAILED',
      'Pass --ticket <ref>.'
    );
  }
  return {
    ticketReference: ticket,
    searchPolicy: settings.searchPolicy,
    naming: { policy: settings.namingPolicy, maxLength: settings.maxLength },
    contextFilter: settings.contexts,
  };
}

// =============================================================================
// Option parsers for commander
// =============================================================================

export function parseMaxLength(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseSearchPolicy(value: string): SearchPolicy {
  const policy = SEARCH_POLICIES.find((p) => p === value);
  if (!policy) {
    throw new InvalidArgumentError(
      `Must be one of: ${SEARCH_POLICIES.join(', ')}.`
    );
  }
  return policy;
}

export function parseNamingPolicy(value: string): NamingPolicy {
  const policy = NAMING_POLICIES.find((p) => p === value);
  if (!policy) {
    throw new InvalidArgumentError(
      `Must be one of: ${NAMING_POLICIES.join(', ')}.`
    );
  }
  return policy;
}

export function parseReportFormat(value: string): ReportFormat {
  if (value !== 'csv' && value !== 'json') {
    throw new InvalidArgumentError('Must be one of: csv, json.');
  }
  return value;
}

// =============================================================================
// Error handling
// =============================================================================

/**
 * Report a fatal error and return the exit code for it.
 */
export function reportFatal(output: OutputFormatter, error: unknown): number {
  if (error instanceof ConfigError && error.validationErrors) {
    output.validationError(error.validationErrors);
  } else if (isDisksnapError(error)) {
    output.error(error.message, error);
  } else {
    const message = errorMessage(error);
    output.error(message);
    output.fail({ code: 'UNKNOWN', message });
  }

  output.flush();
  return getExitCode(error);
}
