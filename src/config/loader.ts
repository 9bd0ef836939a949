/**
 * Configuration Loader
 *
 * Loads YAML configuration files from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * Why a configuration file could not be loaded
 */
export type ConfigLoadFailure = 'not-found' | 'unreadable' | 'invalid-yaml';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly failure: ConfigLoadFailure,
    public readonly original?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }

  /**
   * Convert to the ConfigError reported by the CLI.
   */
  toConfigError(): ConfigError {
    if (this.failure === 'invalid-yaml') {
      return new ConfigError(
        this.message,
        'CONFIG_INVALID_YAML',
        'Fix the YAML syntax and try again.',
        this.filePath
      );
    }
    return new ConfigError(
      this.message,
      'CONFIG_NOT_FOUND',
      'Ensure the configuration file exists and is readable.',
      this.filePath
    );
  }
}

/**
 * Load and parse a YAML configuration file.
 *
 * An empty document loads as an empty object.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(
        `Configuration file not found: ${filePath}`,
        filePath,
        'not-found',
        err
      );
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    }
    throw new ConfigLoadError(
      `Failed to read configuration file: ${filePath}`,
      filePath,
      'unreadable',
      err
    );
  }

  try {
    return yaml.load(content) ?? {};
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${err.message}`,
      filePath,
      'invalid-yaml',
      err
    );
  }
}
