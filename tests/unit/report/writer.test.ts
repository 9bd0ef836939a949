/**
 * Unit tests for report serialization and writing
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { escapeCsvField, toCsv } from '../../../src/report/csv.js';
import {
  formatFileTimestamp,
  resolveReportPath,
  serializeReport,
  writeReport,
} from '../../../src/report/writer.js';
import { ReportWriteError } from '../../../src/core/errors.js';
import type { ReportEntry, RunSummary } from '../../../src/core/types.js';

const ENTRIES: ReportEntry[] = [
  {
    timestamp: '2026-03-14T09:26:53.000Z',
    accountContextId: '11111111-1111-4111-8111-111111111111',
    vmIdentifier: 'web-01',
    diskName: 'web-01-os',
    snapshotName: 'web-01_web-01-os_INC-1',
    status: 'Success',
    errorMessage: null,
    ticketReference: 'INC-1',
  },
  {
    timestamp: '2026-03-14T09:26:54.000Z',
    accountContextId: 'N/A',
    vmIdentifier: 'ghost',
    diskName: 'N/A',
    snapshotName: 'N/A',
    status: 'NotFound',
    errorMessage: null,
    ticketReference: 'INC-1',
  },
];

const SUMMARY: RunSummary = {
  Success: 1,
  Failed: 0,
  NotFound: 1,
  Skipped: 0,
  total: 2,
};

const HEADER =
  'Timestamp,AccountContextId,VMIdentifier,DiskName,SnapshotName,Status,' +
  'ErrorMessage,TicketReference\r\n';

// Local time, so the file name does not depend on the host time zone
const NOW = new Date(2026, 2, 14, 9, 26, 53);

describe('escapeCsvField', () => {
  it('should leave plain values alone', () => {
    assert.strictEqual(escapeCsvField('web-01'), 'web-01');
    assert.strictEqual(escapeCsvField(null), '');
  });

  it('should quote values with separators, quotes or line breaks', () => {
    assert.strictEqual(escapeCsvField('a,b'), '"a,b"');
    assert.strictEqual(escapeCsvField('say "hi"'), '"say ""hi"""');
    assert.strictEqual(escapeCsvField('line1\nline2'), '"line1\nline2"');
  });
});

describe('toCsv', () => {
  it('should write a header and one CRLF-terminated row per entry', () => {
    assert.strictEqual(
      toCsv(ENTRIES),
      HEADER +
        '2026-03-14T09:26:53.000Z,11111111-1111-4111-8111-111111111111,' +
        'web-01,web-01-os,web-01_web-01-os_INC-1,Success,,INC-1\r\n' +
        '2026-03-14T09:26:54.000Z,N/A,ghost,N/A,N/A,NotFound,,INC-1\r\n'
    );
  });

  it('should write only the header for an empty report', () => {
    assert.strictEqual(toCsv([]), HEADER);
  });
});

describe('formatFileTimestamp', () => {
  it('should zero-pad every part', () => {
    assert.strictEqual(
      formatFileTimestamp(new Date(2026, 0, 5, 7, 8, 9)),
      '20260105-070809'
    );
    assert.strictEqual(formatFileTimestamp(NOW), '20260314-092653');
  });
});

describe('resolveReportPath', () => {
  it('should build a timestamped name in the directory', () => {
    const path = resolveReportPath(
      {
        directory: '/reports',
        prefix: 'snapshot-report',
        format: 'csv',
        filePath: null,
      },
      NOW
    );

    assert.strictEqual(
      path,
      join('/reports', 'snapshot-report-20260314-092653.csv')
    );
  });

  it('should prefer an explicit file', () => {
    const path = resolveReportPath(
      {
        directory: '/reports',
        prefix: 'snapshot-report',
        format: 'json',
        filePath: '/reports/run.json',
      },
      NOW
    );

    assert.strictEqual(path, '/reports/run.json');
  });
});

describe('serializeReport', () => {
  it('should write summary and entries as JSON', () => {
    const parsed: unknown = JSON.parse(
      serializeReport(ENTRIES, SUMMARY, 'json')
    );

    assert.deepStrictEqual(parsed, { summary: SUMMARY, entries: ENTRIES });
  });
});

describe('writeReport', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'disksnap-report-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the directory and write the file', async () => {
    const directory = join(dir, 'nested', 'reports');

    const written = await writeReport(
      ENTRIES,
      SUMMARY,
      { directory, prefix: 'chg', format: 'csv', filePath: null },
      NOW
    );

    assert.strictEqual(written, join(directory, 'chg-20260314-092653.csv'));
    assert.strictEqual(await readFile(written, 'utf-8'), toCsv(ENTRIES));
  });

  it('should fail with the destination when it cannot write', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');

    const report = {
      directory: blocker,
      prefix: 'chg',
      format: 'csv' as const,
      filePath: null,
    };

    await assert.rejects(
      () => writeReport(ENTRIES, SUMMARY, report, NOW),
      (err: unknown) => {
        assert.ok(err instanceof ReportWriteError);
        assert.strictEqual(
          err.destination,
          join(blocker, 'chg-20260314-092653.csv')
        );
        assert.strictEqual(err.exitCode, 2);
        return true;
      }
    );
  });
});
