/**
 * CSV Serialization
 *
 * RFC 4180 output for report entries: comma separated, CRLF line endings,
 * fields quoted when they contain a comma, quote, or line break.
 */

import type { ReportEntry } from '../core/types.js';

/**
 * Report columns, in order, with the entry field each one reads.
 */
export const REPORT_COLUMNS: ReadonlyArray<
  readonly [header: string, field: keyof ReportEntry]
> = [
  ['Timestamp', 'timestamp'],
  ['AccountContextId', 'accountContextId'],
  ['VMIdentifier', 'vmIdentifier'],
  ['DiskName', 'diskName'],
  ['SnapshotName', 'snapshotName'],
  ['Status', 'status'],
  ['ErrorMessage', 'errorMessage'],
  ['TicketReference', 'ticketReference'],
];

/**
 * Quote a field when needed. Null becomes an empty field.
 */
export function escapeCsvField(value: string | null): string {
  if (value === null) {
    return '';
  }
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize entries as CSV with a header row.
 */
export function toCsv(entries: readonly ReportEntry[]): string {
  const lines = [REPORT_COLUMNS.map(([header]) => header).join(',')];
  for (const entry of entries) {
    const fields = REPORT_COLUMNS.map(([, field]) =>
      escapeCsvField(entry[field])
    );
    lines.push(fields.join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
