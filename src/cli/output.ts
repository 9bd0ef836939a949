/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes. The formatter doubles as the RunLogger
 * the orchestrator reports progress to.
 */

import type { ReportEntry, RunLogger, RunSummary } from '../core/types.js';
import { REPORT_STATUSES } from '../core/types.js';
import type { ErrorCode, DisksnapError } from '../core/errors.js';
import type { PlanResult } from '../core/runner.js';
import type { ResolvedSettings } from '../config/types.js';
import { summaryStatuses } from '../core/report.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  entries?: readonly ReportEntry[];
  plan?: PlanResult;
  settings?: ResolvedSettings;
  reportPath?: string;
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter implements RunLogger {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   *
   * With an error attached, the command is marked failed and the error is
   * recorded for JSON output; without one it is a per-item failure that
   * does not fail the command.
   */
  error(message: string, error?: DisksnapError): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    if (error) {
      this.fail({
        code: error.code,
        message,
        suggestion: error.suggestion,
      });
    }
  }

  /**
   * Mark the command failed with the given error.
   */
  fail(error: ErrorOutput): void {
    this.result.success = false;
    this.result.error = error;
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      for (const line of formatTable(headers, rows)) {
        console.log(`${this.getIndent()}${line}`);
      }
    }
  }

  // ===========================================================================
  // Run Output
  // ===========================================================================

  /**
   * Print the report entries and the per-status summary.
   */
  runReport(
    entries: readonly ReportEntry[],
    summary: RunSummary,
    reportPath: string
  ): void {
    if (this.mode === 'human') {
      this.newline();
      this.table(
        ['VM', 'CONTEXT', 'DISK', 'SNAPSHOT', 'STATUS'],
        entries.map((e) => [
          e.vmIdentifier,
          e.accountContextId,
          e.diskName,
          e.snapshotName,
          e.status,
        ])
      );
      this.newline();
      this.info(`Report written to ${reportPath}`);
      this.newline();
      this.info('Summary');
      this.indent();
      this.table(
        ['STATUS', 'COUNT'],
        summaryStatuses(summary).map((status) => [
          status,
          String(summary[status]),
        ])
      );
      this.dedent();
    }

    this.result.entries = entries;
    this.result.reportPath = reportPath;
    this.result.summary = toSummaryRecord(summary);
  }

  // ===========================================================================
  // Plan Output
  // ===========================================================================

  /**
   * Print the snapshots a run would create.
   */
  planSummary(plan: PlanResult, maxLength: number): void {
    const diskCount = plan.vms.reduce((n, vm) => n + vm.disks.length, 0);

    if (this.mode === 'human') {
      this.newline();
      if (plan.vms.length === 0) {
        this.info('No VMs found. Nothing would be snapshotted.');
      } else {
        const noun = diskCount === 1 ? 'snapshot' : 'snapshots';
        this.info(
          `Plan: ${diskCount} ${noun} across ${plan.vms.length} VM hit(s)`
        );
        this.newline();
        for (const vm of plan.vms) {
          const group = vm.resourceGroup || 'no resource group';
          console.log(
            `  + ${vm.vmIdentifier} (${vm.accountContextId}, ${group})`
          );
          if (vm.skippedReason) {
            console.log(`    skipped: ${vm.skippedReason}`);
          }
          for (const disk of vm.disks) {
            const flag = disk.exceedsLimit ? `  [exceeds ${maxLength}]` : '';
            const role = disk.role.padEnd(4);
            console.log(
              `    ${role} ${disk.diskName} -> ${disk.snapshotName}${flag}`
            );
          }
        }
      }
      for (const vmIdentifier of plan.notFound) {
        console.log(`  ? ${vmIdentifier} (not found)`);
      }
      this.newline();
      this.info('Run `disksnap snapshot <vm-list>` to create them.');
    }

    this.result.plan = plan;
    this.result.summary = {
      snapshots: diskCount,
      vms: plan.vms.length,
      notFound: plan.notFound.length,
    };
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  validationSuccess(settings: ResolvedSettings): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`Search policy: ${settings.searchPolicy}`);
      this.info(
        `Naming: ${settings.namingPolicy}, ` +
          `max ${settings.maxLength} characters`
      );
      const { include, exclude } = settings.contexts;
      if (include.length > 0) {
        this.info(`Contexts included: ${include.join(', ')}`);
      }
      if (exclude.length > 0) {
        this.info(`Contexts excluded: ${exclude.join(', ')}`);
      }
      const { directory, format } = settings.report;
      this.info(`Report: ${directory} (${format})`);
      this.dedent();
    }

    this.result.settings = settings;
  }

  validationError(errors: Array<{ path: string; message: string }>): void {
    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.fail({
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    });
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

/**
 * Lay out a table with columns padded to their widest cell, separated by
 * two spaces. Trailing padding is kept.
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const render = (cells: string[]): string =>
    cells.map((cell, i) => (cell ?? '').padEnd(widths[i] ?? 0)).join('  ');

  return [render(headers), ...rows.map(render)];
}

function toSummaryRecord(summary: RunSummary): Record<string, number> {
  const record: Record<string, number> = {};
  for (const status of REPORT_STATUSES) {
    record[status] = summary[status];
  }
  record['total'] = summary.total;
  return record;
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
