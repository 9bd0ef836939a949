/**
 * Unit tests for the Snapshot Executor
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  buildSnapshotRequest,
  executeSnapshot,
  snapshotNameFor,
  CREATED_BY,
} from '../../../src/core/snapshots.js';
import type {
  DiskDescriptor,
  NamingOptions,
  ResolvedVM,
} from '../../../src/core/types.js';
import { FakeCloudProvider, CONTEXT_A } from '../../helpers/fake-provider.js';

const VM: ResolvedVM = {
  identifier: 'web-vm-01',
  context: { id: CONTEXT_A, name: 'Dev' },
  resourceGroup: 'rg-web',
  location: 'westeurope',
  disks: [],
};

const OS_DISK: DiskDescriptor = {
  name: 'web-vm-01-osdisk',
  sourceDiskReference: '/disks/web-vm-01-osdisk',
  role: 'OS',
};

const NAMING: NamingOptions = { policy: 'vmDiskCombined', maxLength: 82 };

const NAME = 'web-vm-01_web-vm-01-osdisk_INC123456';
const SOURCE = '/disks/web-vm-01-osdisk';

describe('snapshotNameFor', () => {
  it('should compose under the run naming policy', () => {
    assert.strictEqual(
      snapshotNameFor(VM, OS_DISK, 'INC123456', NAMING),
      NAME
    );
    assert.strictEqual(
      snapshotNameFor(VM, OS_DISK, 'INC123456', {
        policy: 'diskOnly',
        maxLength: 82,
      }),
      'web-vm-01-osdisk_INC123456'
    );
  });
});

describe('buildSnapshotRequest', () => {
  it('should target the VM resource group and location', () => {
    const request = buildSnapshotRequest(
      VM,
      OS_DISK,
      SOURCE,
      ' INC123456 ',
      NAMING
    );

    assert.deepStrictEqual(request, {
      composedName: NAME,
      sourceDiskReference: SOURCE,
      location: 'westeurope',
      targetResourceGroup: 'rg-web',
      tags: {
        ticket: 'INC123456',
        sourceVm: 'web-vm-01',
        sourceDisk: 'web-vm-01-osdisk',
        createdBy: CREATED_BY,
      },
    });
  });
});

describe('executeSnapshot', () => {
  it('should pass the request to the provider', async () => {
    const provider = new FakeCloudProvider([{ id: CONTEXT_A }]);
    await provider.setActiveContext(CONTEXT_A);
    const request = buildSnapshotRequest(
      VM,
      OS_DISK,
      SOURCE,
      'INC123456',
      NAMING
    );

    const outcome = await executeSnapshot(provider, request);

    assert.deepStrictEqual(outcome, {
      kind: 'created',
      snapshotId: `/subscriptions/${CONTEXT_A}/snapshots/${NAME}`,
    });
    assert.deepStrictEqual(provider.created, [
      {
        sourceDiskReference: SOURCE,
        location: 'westeurope',
        resourceGroup: 'rg-web',
        name: NAME,
        tags: request.tags,
        contextId: CONTEXT_A,
      },
    ]);
  });

  it('should return the provider error message unchanged', async () => {
    const provider = new FakeCloudProvider([{ id: CONTEXT_A }]);
    const quota = 'QuotaExceeded: snapshot quota reached';
    provider.snapshotFailures.set(NAME, quota);
    await provider.setActiveContext(CONTEXT_A);
    const request = buildSnapshotRequest(
      VM,
      OS_DISK,
      SOURCE,
      'INC123456',
      NAMING
    );

    const outcome = await executeSnapshot(provider, request);

    assert.deepStrictEqual(outcome, { kind: 'failed', reason: quota });
  });

  it('should fail a second creation of the same name', async () => {
    const provider = new FakeCloudProvider([{ id: CONTEXT_A }]);
    await provider.setActiveContext(CONTEXT_A);
    const request = buildSnapshotRequest(
      VM,
      OS_DISK,
      SOURCE,
      'INC123456',
      NAMING
    );

    await executeSnapshot(provider, request);
    const second = await executeSnapshot(provider, request);

    assert.deepStrictEqual(second, {
      kind: 'failed',
      reason: `Snapshot '${NAME}' already exists in resource group 'rg-web'`,
    });
    assert.strictEqual(
      provider.calls.filter((c) => c.startsWith('createSnapshot')).length,
      2
    );
  });
});
