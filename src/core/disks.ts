/**
 * Disk Collector
 *
 * Turns a resolved VM's disk slots into the ordered list of disks to
 * snapshot, and resolves source references the storage profile left out.
 */

import type { CloudProvider } from './provider.js';
import type {
  DiskCollection,
  DiskDescriptor,
  ResolvedVM,
  SourceResolution,
} from './types.js';
import { errorMessage } from './errors.js';

/**
 * Collect the disks of a VM: OS disk first (when present), then data disks
 * in provider order. Slots without a name are dropped.
 *
 * A VM with a blank resource group cannot be worked on and is skipped.
 */
export function collectDisks(vm: ResolvedVM): DiskCollection {
  if (vm.resourceGroup.trim() === '') {
    return {
      kind: 'skipped',
      reason: 'VM has no resource group; disk collection skipped',
    };
  }

  const disks: DiskDescriptor[] = [];
  for (const disk of vm.disks) {
    const name = disk.name?.trim();
    if (!name) {
      continue;
    }
    disks.push({
      name,
      sourceDiskReference: disk.sourceDiskReference,
      role: disk.role,
    });
  }

  // OS slot first regardless of how the provider listed it
  disks.sort((a, b) => rank(a) - rank(b));
  return { kind: 'disks', disks };
}

function rank(disk: DiskDescriptor): number {
  return disk.role === 'OS' ? 0 : 1;
}

/**
 * Find the source reference of a disk, asking the provider when the
 * storage profile did not carry one.
 */
export async function resolveSourceDisk(
  provider: CloudProvider,
  vm: ResolvedVM,
  disk: DiskDescriptor
): Promise<SourceResolution> {
  if (disk.sourceDiskReference) {
    return { kind: 'resolved', sourceDiskReference: disk.sourceDiskReference };
  }

  try {
    const found = await provider.getDisk(vm.resourceGroup, disk.name);
    return { kind: 'resolved', sourceDiskReference: found.id };
  } catch (error) {
    return { kind: 'failed', reason: errorMessage(error) };
  }
}
