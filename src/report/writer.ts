/**
 * Report Writer
 *
 * Writes the run report to a timestamped file.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ReportEntry, RunSummary } from '../core/types.js';
import type { ResolvedSettings } from '../config/types.js';
import { ReportWriteError, errorMessage } from '../core/errors.js';
import { toCsv } from './csv.js';

/**
 * Format a time as YYYYMMDD-HHmmss in local time.
 */
export function formatFileTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Work out where the report goes: the explicit file, or
 * `{directory}/{prefix}-{timestamp}.{format}`.
 */
export function resolveReportPath(
  report: ResolvedSettings['report'],
  now: Date
): string {
  if (report.filePath) {
    return report.filePath;
  }
  const stamp = formatFileTimestamp(now);
  return join(report.directory, `${report.prefix}-${stamp}.${report.format}`);
}

/**
 * Serialize the report in the configured format.
 */
export function serializeReport(
  entries: readonly ReportEntry[],
  summary: RunSummary,
  format: ResolvedSettings['report']['format']
): string {
  if (format === 'json') {
    return `${JSON.stringify({ summary, entries }, null, 2)}\n`;
  }
  return toCsv(entries);
}

/**
 * Write the report, creating the directory when needed.
 *
 * @returns The path written
 * @throws ReportWriteError when the file cannot be written
 */
export async function writeReport(
  entries: readonly ReportEntry[],
  summary: RunSummary,
  report: ResolvedSettings['report'],
  now: Date
): Promise<string> {
  const destination = resolveReportPath(report, now);
  try {
    await mkdir(report.directory, { recursive: true });
    const content = serializeReport(entries, summary, report.format);
    await writeFile(destination, content, 'utf-8');
  } catch (error) {
    throw new ReportWriteError(
      `Could not write report to ${destination}: ${errorMessage(error)}`,
      destination
    );
  }
  return destination;
}
