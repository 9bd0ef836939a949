/**
 * Run Orchestrator
 *
 * Drives one snapshot run: authenticate, enumerate contexts once, then for
 * each VM identifier locate it, collect its disks, and snapshot each disk,
 * recording one report entry per outcome. Everything is sequential.
 */

import type { CloudProvider } from './provider.js';
import type {
  AccountContext,
  Clock,
  DiskRole,
  NamingOptions,
  ReportEntry,
  ResolvedVM,
  RunLogger,
  RunSummary,
  SearchPolicy,
} from './types.js';
import {
  enumerateContexts,
  describeContext,
  type ContextFilter,
} from './contexts.js';
import { searchContexts } from './locator.js';
import { collectDisks, resolveSourceDisk } from './disks.js';
import {
  buildSnapshotRequest,
  executeSnapshot,
  snapshotNameFor,
} from './snapshots.js';
import { baseCapacity, exceedsLimit, ticketOverflowsLimit } from './naming.js';
import { ReportAccumulator } from './report.js';
import { AuthenticationError, errorMessage } from './errors.js';

/**
 * Options for a run or a plan
 */
export interface RunOptions {
  ticketReference: string;
  searchPolicy: SearchPolicy;
  naming: NamingOptions;
  contextFilter?: ContextFilter;
}

/**
 * Collaborators of a run
 */
export interface RunDependencies {
  provider: CloudProvider;
  logger: RunLogger;
  clock?: Clock;
}

/**
 * Result of a completed run
 */
export interface RunResult {
  contexts: AccountContext[];
  entries: readonly ReportEntry[];
  summary: RunSummary;
}

/**
 * A disk as it would be snapshotted
 */
export interface PlannedDisk {
  diskName: string;
  role: DiskRole;
  snapshotName: string;
  exceedsLimit: boolean;
}

/**
 * A VM hit as it would be processed
 */
export interface PlannedVM {
  vmIdentifier: string;
  accountContextId: string;
  resourceGroup: string;
  location: string;
  disks: PlannedDisk[];
  /** Set when the VM would be skipped in this context */
  skippedReason?: string;
}

/**
 * Result of a read-only plan
 */
export interface PlanResult {
  contexts: AccountContext[];
  vms: PlannedVM[];
  notFound: string[];
}

const NO_NAMED_DISKS = 'VM reports no named disks';

/**
 * Authenticate and enumerate the usable account contexts.
 *
 * @throws AuthenticationError when the session cannot be established
 * @throws NoValidContextsError when no usable context remains
 */
export async function openSession(
  provider: CloudProvider,
  logger: RunLogger,
  filter: ContextFilter = {}
): Promise<AccountContext[]> {
  try {
    await provider.authenticate();
  } catch (error) {
    throw new AuthenticationError(
      `Authentication failed: ${errorMessage(error)}`,
      error instanceof AuthenticationError ? error.suggestion : undefined
    );
  }
  logger.success('Authenticated');

  const contexts = await enumerateContexts(provider, filter);
  logger.success(`${contexts.length} account context(s) available`);
  return contexts;
}

/**
 * Run snapshots for every VM identifier.
 *
 * Fatal conditions (authentication, no contexts) throw before any entry is
 * recorded. Everything after that is captured as report entries, so the
 * run always gets through the whole list.
 */
export async function runSnapshots(
  vmIdentifiers: readonly string[],
  options: RunOptions,
  deps: RunDependencies
): Promise<RunResult> {
  const { provider, logger } = deps;
  const contexts = await openSession(provider, logger, options.contextFilter);
  warnOnTicketLength(options, logger);

  const report = new ReportAccumulator(options.ticketReference, deps.clock);

  for (const [index, vmIdentifier] of vmIdentifiers.entries()) {
    logger.info(`[${index + 1}/${vmIdentifiers.length}] ${vmIdentifier}`);

    const found = await forEachResolvedVM(
      provider,
      contexts,
      vmIdentifier,
      options.searchPolicy,
      logger,
      (vm) => snapshotVM(vm, options, deps, report)
    );

    if (!found) {
      logger.warning(`${vmIdentifier}: not found in any account context`);
      report.recordNotFound(vmIdentifier);
    }
  }

  return {
    contexts,
    entries: report.entries(),
    summary: report.summarize(),
  };
}

/**
 * Resolve every VM and compose its snapshot names without creating
 * anything.
 */
export async function planSnapshots(
  vmIdentifiers: readonly string[],
  options: RunOptions,
  deps: RunDependencies
): Promise<PlanResult> {
  const { provider, logger } = deps;
  const contexts = await openSession(provider, logger, options.contextFilter);
  warnOnTicketLength(options, logger);

  const vms: PlannedVM[] = [];
  const notFound: string[] = [];

  for (const vmIdentifier of vmIdentifiers) {
    const found = await forEachResolvedVM(
      provider,
      contexts,
      vmIdentifier,
      options.searchPolicy,
      logger,
      (vm) => {
        vms.push(planVM(vm, options));
        return Promise.resolve();
      }
    );
    if (!found) {
      notFound.push(vmIdentifier);
    }
  }

  return { contexts, vms, notFound };
}

/**
 * Search the contexts for one VM, handing every hit to `onFound` while its
 * context is active. Returns whether there was any hit.
 */
async function forEachResolvedVM(
  provider: CloudProvider,
  contexts: readonly AccountContext[],
  vmIdentifier: string,
  policy: SearchPolicy,
  logger: RunLogger,
  onFound: (vm: ResolvedVM) => Promise<void>
): Promise<boolean> {
  const outcomes = searchContexts(
    provider,
    contexts,
    vmIdentifier,
    policy,
    logger
  );

  let found = false;
  for await (const outcome of outcomes) {
    if (outcome.kind !== 'found') {
      continue;
    }
    found = true;
    logger.info(
      `${vmIdentifier}: found in ${describeContext(outcome.vm.context)}`
    );
    await onFound(outcome.vm);
  }
  return found;
}

async function snapshotVM(
  vm: ResolvedVM,
  options: RunOptions,
  deps: RunDependencies,
  report: ReportAccumulator
): Promise<void> {
  const { provider, logger } = deps;
  const { ticketReference, naming } = options;
  const collection = collectDisks(vm);

  if (collection.kind === 'skipped') {
    logger.warning(`${vm.identifier}: ${collection.reason}`);
    report.recordSkipped(vm, collection.reason);
    return;
  }
  if (collection.disks.length === 0) {
    logger.warning(`${vm.identifier}: ${NO_NAMED_DISKS}`);
    report.recordSkipped(vm, NO_NAMED_DISKS);
    return;
  }

  for (const disk of collection.disks) {
    const label = `${vm.identifier}/${disk.name}`;
    const snapshotName = snapshotNameFor(vm, disk, ticketReference, naming);
    if (exceedsLimit(snapshotName, naming.maxLength)) {
      logger.warning(
        `${snapshotName}: ${snapshotName.length} characters exceeds ` +
          `the ${naming.maxLength} character limit`
      );
    }

    const source = await resolveSourceDisk(provider, vm, disk);
    if (source.kind === 'failed') {
      logger.error(`${label}: could not resolve source disk: ${source.reason}`);
      report.recordSnapshot(vm, disk.name, snapshotName, source);
      continue;
    }

    const request = buildSnapshotRequest(
      vm,
      disk,
      source.sourceDiskReference,
      ticketReference,
      naming
    );
    const outcome = await executeSnapshot(provider, request);
    report.recordSnapshot(vm, disk.name, request.composedName, outcome);

    if (outcome.kind === 'created') {
      logger.success(`${label}: created ${request.composedName}`);
    } else {
      logger.error(`${label}: ${outcome.reason}`);
    }
  }
}

function planVM(vm: ResolvedVM, options: RunOptions): PlannedVM {
  const planned: PlannedVM = {
    vmIdentifier: vm.identifier,
    accountContextId: vm.context.id,
    resourceGroup: vm.resourceGroup,
    location: vm.location,
    disks: [],
  };

  const collection = collectDisks(vm);
  if (collection.kind === 'skipped') {
    planned.skippedReason = collection.reason;
    return planned;
  }
  if (collection.disks.length === 0) {
    planned.skippedReason = NO_NAMED_DISKS;
    return planned;
  }

  const { ticketReference, naming } = options;
  planned.disks = collection.disks.map((disk) => {
    const snapshotName = snapshotNameFor(vm, disk, ticketReference, naming);
    return {
      diskName: disk.name,
      role: disk.role,
      snapshotName,
      exceedsLimit: exceedsLimit(snapshotName, naming.maxLength),
    };
  });
  return planned;
}

/**
 * Warn once per run when the ticket alone decides every name: either it
 * pushes each name past the limit, or it leaves no room for the VM and
 * disk part so all names come out the same.
 */
function warnOnTicketLength(options: RunOptions, logger: RunLogger): void {
  const { ticketReference, naming } = options;
  const length = ticketReference.trim().length;

  if (ticketOverflowsLimit(ticketReference, naming.maxLength, naming.policy)) {
    logger.warning(
      `Ticket reference is ${length} characters; every snapshot name will ` +
        `exceed ${naming.maxLength} characters under ${naming.policy}. ` +
        'Use diskOnly naming to clamp names.'
    );
  } else if (baseCapacity(ticketReference, naming.maxLength) === 0) {
    logger.warning(
      `Ticket reference is ${length} characters and leaves no room for VM ` +
        `or disk names within ${naming.maxLength} characters; every ` +
        'snapshot will get the same name.'
    );
  }
}
