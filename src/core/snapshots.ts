/**
 * Snapshot Executor
 *
 * Builds snapshot requests and issues the copy-from-source creation call.
 */

import type { CloudProvider } from './provider.js';
import type {
  DiskDescriptor,
  NamingOptions,
  ResolvedVM,
  SnapshotOutcome,
  SnapshotRequest,
} from './types.js';
import { composeSnapshotName } from './naming.js';
import { errorMessage } from './errors.js';

/**
 * Tag keys written on every snapshot.
 */
export const SNAPSHOT_TAGS = {
  ticket: 'ticket',
  sourceVm: 'sourceVm',
  sourceDisk: 'sourceDisk',
  createdBy: 'createdBy',
} as const;

/**
 * Value of the createdBy tag.
 */
export const CREATED_BY = 'disksnap';

/**
 * Compose the snapshot name for a disk.
 */
export function snapshotNameFor(
  vm: ResolvedVM,
  disk: DiskDescriptor,
  ticketReference: string,
  naming: NamingOptions
): string {
  return composeSnapshotName({
    vmIdentifier: vm.identifier,
    diskName: disk.name,
    ticketReference,
    maxLength: naming.maxLength,
    policy: naming.policy,
  });
}

/**
 * Build the request for one disk. The snapshot lands in the VM's own
 * resource group and location.
 */
export function buildSnapshotRequest(
  vm: ResolvedVM,
  disk: DiskDescriptor,
  sourceDiskReference: string,
  ticketReference: string,
  naming: NamingOptions
): SnapshotRequest {
  return {
    composedName: snapshotNameFor(vm, disk, ticketReference, naming),
    sourceDiskReference,
    location: vm.location,
    targetResourceGroup: vm.resourceGroup,
    tags: {
      [SNAPSHOT_TAGS.ticket]: ticketReference.trim(),
      [SNAPSHOT_TAGS.sourceVm]: vm.identifier,
      [SNAPSHOT_TAGS.sourceDisk]: disk.name,
      [SNAPSHOT_TAGS.createdBy]: CREATED_BY,
    },
  };
}

/**
 * Issue one snapshot creation call.
 *
 * Any provider error becomes a failed outcome carrying the provider's
 * message unchanged. There is no retry.
 */
export async function executeSnapshot(
  provider: CloudProvider,
  request: SnapshotRequest
): Promise<SnapshotOutcome> {
  try {
    const created = await provider.createSnapshot({
      sourceDiskReference: request.sourceDiskReference,
      location: request.location,
      resourceGroup: request.targetResourceGroup,
      name: request.composedName,
      tags: request.tags,
    });
    return { kind: 'created', snapshotId: created.id };
  } catch (error) {
    return { kind: 'failed', reason: errorMessage(error) };
  }
}
