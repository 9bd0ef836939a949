/**
 * Unit tests for CLI output formatting
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { OutputFormatter, formatTable } from '../../../src/cli/output.js';
import { AuthenticationError } from '../../../src/core/errors.js';
import type { ReportEntry, RunSummary } from '../../../src/core/types.js';

describe('formatTable', () => {
  it('should pad columns to the widest cell', () => {
    const lines = formatTable(
      ['VM', 'STATUS'],
      [
        ['web-01', 'Success'],
        ['db', 'NotFound'],
      ]
    );

    assert.deepStrictEqual(lines, [
      'VM      STATUS  ',
      'web-01  Success ',
      'db      NotFound',
    ]);
  });

  it('should print only the header for no rows', () => {
    assert.deepStrictEqual(formatTable(['STATUS', 'COUNT'], []), [
      'STATUS  COUNT',
    ]);
  });
});

describe('OutputFormatter', () => {
  it('should start successful', () => {
    const output = new OutputFormatter('snapshot', { json: true });

    assert.strictEqual(output.isJson(), true);
    assert.deepStrictEqual(output.getResult(), {
      success: true,
      command: 'snapshot',
    });
  });

  it('should record a fatal error', () => {
    const output = new OutputFormatter('snapshot', { json: true });

    const message = 'Authentication failed: expired';
    output.error(message, new AuthenticationError(message, 'Sign in again.'));

    assert.deepStrictEqual(output.getResult(), {
      success: false,
      command: 'snapshot',
      error: {
        code: 'AUTHENTICATION_FAILED',
        message,
        suggestion: 'Sign in again.',
      },
    });
  });

  it('should not fail the command for per-item errors', () => {
    const output = new OutputFormatter('snapshot', { json: true });

    output.error('web-01/os: Conflict');
    output.warning('db-01: not found in any account context');

    assert.strictEqual(output.getResult().success, true);
  });

  it('should record the run report', () => {
    const output = new OutputFormatter('snapshot', { json: true });
    const entries: ReportEntry[] = [
      {
        timestamp: '2026-03-14T09:26:53.000Z',
        accountContextId: 'N/A',
        vmIdentifier: 'ghost',
        diskName: 'N/A',
        snapshotName: 'N/A',
        status: 'NotFound',
        errorMessage: null,
        ticketReference: 'INC-1',
      },
    ];
    const summary: RunSummary = {
      Success: 0,
      Failed: 0,
      NotFound: 1,
      Skipped: 0,
      total: 1,
    };

    output.runReport(entries, summary, '/reports/r.csv');

    const result = output.getResult();
    assert.strictEqual(result.reportPath, '/reports/r.csv');
    assert.deepStrictEqual(result.entries, entries);
    assert.deepStrictEqual(result.summary, summary);
  });

  it('should record validation errors', () => {
    const output = new OutputFormatter('validate', { json: true });

    const errors = [
      {
        path: '/search/policy',
        message: 'must be equal to one of the allowed values',
      },
    ];
    output.validationError(errors);

    const result = output.getResult();
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error?.code, 'CONFIG_VALIDATION_FAILED');
    assert.deepStrictEqual(result.error?.details, { errors });
  });
});
