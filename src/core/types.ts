/**
 * Core Types for disksnap
 *
 * Domain types for context discovery, VM resolution, snapshot naming,
 * execution outcomes, and the run report.
 */

// =============================================================================
// Policies
// =============================================================================

/**
 * How the locator walks the account contexts for one VM identifier.
 */
export type SearchPolicy =
  | 'first-match' // stop at the first context that has the VM
  | 'exhaustive'; // visit every context, processing each hit

/**
 * Snapshot naming scheme. The two are never mixed within a run.
 */
export type NamingPolicy =
  | 'vmDiskCombined' // "{vm}_{disk}_{ticket}", not re-clamped
  | 'diskOnly'; // "{disk}_{ticket}", re-clamped to the limit

export const SEARCH_POLICIES: readonly SearchPolicy[] = [
  'first-match',
  'exhaustive',
];
export const NAMING_POLICIES: readonly NamingPolicy[] = [
  'vmDiskCombined',
  'diskOnly',
];

/**
 * Naming settings for one run
 */
export interface NamingOptions {
  policy: NamingPolicy;
  /** Upper bound for composed snapshot names (default: 82) */
  maxLength: number;
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * An isolated access/billing scope the session can switch into
 * (an Azure subscription).
 */
export interface AccountContext {
  readonly id: string;
  readonly name?: string;
}

export type DiskRole = 'OS' | 'Data';

/**
 * A disk slot as reported by the provider. The name may be missing.
 */
export interface ReportedDisk {
  name: string | null;
  /** Managed disk resource id, when the VM's storage profile carries one */
  sourceDiskReference: string | null;
  role: DiskRole;
}

/**
 * A disk that can be snapshotted.
 */
export interface DiskDescriptor {
  name: string;
  sourceDiskReference: string | null;
  role: DiskRole;
}

/**
 * A VM bound to the context it was found in. Lives for one VM's processing.
 */
export interface ResolvedVM {
  /** VM identifier as given in the input list */
  identifier: string;
  context: AccountContext;
  resourceGroup: string;
  location: string;
  /** OS disk slot first (when present), then data disks in provider order */
  disks: ReportedDisk[];
}

// =============================================================================
// Tagged step outcomes
// =============================================================================

/**
 * Result of searching one context for a VM
 */
export type ContextLookupOutcome =
  | { kind: 'found'; vm: ResolvedVM }
  | { kind: 'not-found-here'; context: AccountContext }
  | { kind: 'context-unavailable'; context: AccountContext; reason: string };

/**
 * Result of collecting the disks of a resolved VM
 */
export type DiskCollection =
  | { kind: 'disks'; disks: DiskDescriptor[] }
  | { kind: 'skipped'; reason: string };

/**
 * Result of resolving a disk's source reference
 */
export type SourceResolution =
  | { kind: 'resolved'; sourceDiskReference: string }
  | { kind: 'failed'; reason: string };

/**
 * Result of a snapshot creation call
 */
export type SnapshotOutcome =
  | { kind: 'created'; snapshotId: string | null }
  | { kind: 'failed'; reason: string };

// =============================================================================
// Snapshot requests and report
// =============================================================================

/**
 * Everything needed to create one snapshot
 */
export interface SnapshotRequest {
  composedName: string;
  sourceDiskReference: string;
  location: string;
  targetResourceGroup: string;
  tags: Record<string, string>;
}

export type ReportStatus = 'Success' | 'Failed' | 'NotFound' | 'Skipped';

export const REPORT_STATUSES: readonly ReportStatus[] = [
  'Success',
  'Failed',
  'NotFound',
  'Skipped',
];

/**
 * One row of the run report
 */
export interface ReportEntry {
  /** ISO-8601 time the outcome was recorded */
  timestamp: string;
  /** Context id, or "N/A" for an unresolved VM */
  accountContextId: string;
  vmIdentifier: string;
  diskName: string;
  snapshotName: string;
  status: ReportStatus;
  errorMessage: string | null;
  ticketReference: string;
}

/**
 * Per-status counts of a run
 */
export type RunSummary = Record<ReportStatus, number> & { total: number };

// =============================================================================
// Ambient
// =============================================================================

/**
 * Sink for progress messages. The CLI output formatter satisfies it.
 */
export interface RunLogger {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/**
 * Source of the current time, replaceable in tests.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
