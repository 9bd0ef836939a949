/**
 * Outcome Aggregator
 *
 * Append-only accumulator of report entries, owned by the run orchestrator.
 */

import type {
  Clock,
  ReportEntry,
  ReportStatus,
  ResolvedVM,
  RunSummary,
  SnapshotOutcome,
} from './types.js';
import { REPORT_STATUSES, systemClock } from './types.js';

/**
 * Placeholder for fields that do not apply to an entry.
 */
export const NOT_APPLICABLE = 'N/A';

export class ReportAccumulator {
  private readonly rows: ReportEntry[] = [];
  private readonly ticketReference: string;
  private readonly clock: Clock;

  constructor(ticketReference: string, clock: Clock = systemClock) {
    this.ticketReference = ticketReference.trim();
    this.clock = clock;
  }

  /**
   * Record a VM that was absent from every searched context.
   */
  recordNotFound(vmIdentifier: string): ReportEntry {
    return this.push({
      accountContextId: NOT_APPLICABLE,
      vmIdentifier,
      diskName: NOT_APPLICABLE,
      snapshotName: NOT_APPLICABLE,
      status: 'NotFound',
      errorMessage: null,
    });
  }

  /**
   * Record a VM found in a context but not worked on there.
   */
  recordSkipped(vm: ResolvedVM, reason: string): ReportEntry {
    return this.push({
      accountContextId: vm.context.id,
      vmIdentifier: vm.identifier,
      diskName: NOT_APPLICABLE,
      snapshotName: NOT_APPLICABLE,
      status: 'Skipped',
      errorMessage: reason,
    });
  }

  /**
   * Record the outcome of one disk's snapshot attempt.
   */
  recordSnapshot(
    vm: ResolvedVM,
    diskName: string,
    snapshotName: string,
    outcome: SnapshotOutcome
  ): ReportEntry {
    return this.push({
      accountContextId: vm.context.id,
      vmIdentifier: vm.identifier,
      diskName,
      snapshotName,
      status: outcome.kind === 'created' ? 'Success' : 'Failed',
      errorMessage: outcome.kind === 'failed' ? outcome.reason : null,
    });
  }

  /**
   * All entries, in the order they were recorded.
   */
  entries(): readonly ReportEntry[] {
    return this.rows;
  }

  get size(): number {
    return this.rows.length;
  }

  summarize(): RunSummary {
    return summarize(this.rows);
  }

  private push(
    fields: Omit<ReportEntry, 'timestamp' | 'ticketReference'>
  ): ReportEntry {
    const entry: ReportEntry = {
      timestamp: this.clock().toISOString(),
      ...fields,
      ticketReference: this.ticketReference,
    };
    this.rows.push(entry);
    return entry;
  }
}

/**
 * Count entries per status.
 */
export function summarize(entries: readonly ReportEntry[]): RunSummary {
  const summary: RunSummary = {
    Success: 0,
    Failed: 0,
    NotFound: 0,
    Skipped: 0,
    total: 0,
  };
  for (const entry of entries) {
    summary[entry.status]++;
    summary.total++;
  }
  return summary;
}

/**
 * Statuses to print in the end-of-run summary: the three fixed rows, plus
 * Skipped when any entry has it.
 */
export function summaryStatuses(summary: RunSummary): ReportStatus[] {
  return REPORT_STATUSES.filter(
    (status) => status !== 'Skipped' || summary.Skipped > 0
  );
}
