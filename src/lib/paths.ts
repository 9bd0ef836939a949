/**
 * Path Utilities
 *
 * Path expansion for configuration values and report destinations.
 */

import { homedir } from 'node:os';
import { extname, isAbsolute, join, resolve } from 'node:path';

/**
 * Expand a path, resolving ~ to the home directory and making relative
 * paths absolute.
 *
 * @param inputPath - Path that may hold ~ or environment variables
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and variables expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (
    expanded === '~' ||
    expanded.startsWith('~/') ||
    expanded.startsWith('~\\')
  ) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand environment variables (Windows-style %VAR% and Unix-style $VAR)
  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Whether a path names a report file (by extension) rather than a directory.
 */
export function isReportFilePath(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return ext === '.csv' || ext === '.json';
}
