/**
 * Unit tests for Snapshot Naming
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  baseCapacity,
  composeSnapshotName,
  exceedsLimit,
  ticketOverflowsLimit,
  DEFAULT_MAX_NAME_LENGTH,
} from '../../../src/core/naming.js';

describe('composeSnapshotName', () => {
  describe('vmDiskCombined', () => {
    it('should join VM, disk and ticket when everything fits', () => {
      const name = composeSnapshotName({
        vmIdentifier: 'web-vm-01',
        diskName: 'web-vm-01-osdisk',
        ticketReference: 'INC123456',
        maxLength: DEFAULT_MAX_NAME_LENGTH,
      });

      assert.strictEqual(name, 'web-vm-01_web-vm-01-osdisk_INC123456');
      assert.strictEqual(name.length, 36);
    });

    it('should trim the ticket reference', () => {
      const name = composeSnapshotName({
        vmIdentifier: 'app',
        diskName: 'data0',
        ticketReference: '  CHG-42 \t',
        maxLength: 82,
      });

      assert.strictEqual(name, 'app_data0_CHG-42');
    });

    it('should cut the base to leave room for the ticket', () => {
      // available = 20 - (6 + 1) = 13
      const name = composeSnapshotName({
        vmIdentifier: 'database-server',
        diskName: 'datadisk-01',
        ticketReference: 'TKT-99',
        maxLength: 20,
      });

      assert.strictEqual(name, 'database-serv_TKT-99');
      assert.strictEqual(name.length, 20);
    });

    it('should keep the full ticket when it is longer than the limit', () => {
      const ticket = 'T'.repeat(10);
      const name = composeSnapshotName({
        vmIdentifier: 'vm',
        diskName: 'disk',
        ticketReference: ticket,
        maxLength: 10,
      });

      // available = max(0, 10 - 11) = 0, so the base disappears entirely
      assert.strictEqual(name, `_${ticket}`);
      assert.strictEqual(name.length, 11);
      assert.ok(exceedsLimit(name, 10));
    });

    it('should fit a ticket one shorter than the limit', () => {
      const name = composeSnapshotName({
        vmIdentifier: 'vm',
        diskName: 'disk',
        ticketReference: 'T'.repeat(9),
        maxLength: 10,
      });

      assert.strictEqual(name, '_TTTTTTTTT');
      assert.strictEqual(name.length, 10);
    });

    it('should be the default policy', () => {
      const input = {
        vmIdentifier: 'vm1',
        diskName: 'os',
        ticketReference: 'X1',
        maxLength: 82,
      };
      assert.strictEqual(
        composeSnapshotName(input),
        composeSnapshotName({ ...input, policy: 'vmDiskCombined' })
      );
    });
  });

  describe('diskOnly', () => {
    it('should leave the VM identifier out of the name', () => {
      const name = composeSnapshotName({
        vmIdentifier: 'web-vm-01',
        diskName: 'web-vm-01-osdisk',
        ticketReference: 'INC123456',
        maxLength: 82,
        policy: 'diskOnly',
      });

      assert.strictEqual(name, 'web-vm-01-osdisk_INC123456');
    });

    it('should clamp the result when the ticket alone is too long', () => {
      const name = composeSnapshotName({
        vmIdentifier: 'vm',
        diskName: 'disk',
        ticketReference: 'ABCDEFGHIJKL',
        maxLength: 10,
        policy: 'diskOnly',
      });

      assert.strictEqual(name, '_ABCDEFGHI');
      assert.strictEqual(name.length, 10);
    });

    it('should never exceed the limit', () => {
      const tickets = ['', 'A', 'INC1', 'X'.repeat(15), 'Y'.repeat(40)];
      const disks = [
        'os',
        'a-very-long-data-disk-name-that-goes-on',
        ' padded ',
      ];
      for (const maxLength of [1, 5, 16, 32, 82]) {
        for (const ticketReference of tickets) {
          for (const diskName of disks) {
            const name = composeSnapshotName({
              vmIdentifier: 'vm-long-identifier',
              diskName,
              ticketReference,
              maxLength,
              policy: 'diskOnly',
            });
            assert.ok(
              name.length <= maxLength,
              `"${name}" exceeds ${maxLength}`
            );
          }
        }
      }
    });
  });

  it('should return identical output for identical input', () => {
    const input = {
      vmIdentifier: 'sql-prod-03',
      diskName: 'sql-prod-03-data-02',
      ticketReference: 'CHG0034567',
      maxLength: 30,
    };

    const first = composeSnapshotName(input);
    for (let i = 0; i < 5; i++) {
      assert.strictEqual(composeSnapshotName(input), first);
    }
  });
});

describe('exceedsLimit', () => {
  it('should compare against the limit exclusively', () => {
    assert.strictEqual(exceedsLimit('abc', 3), false);
    assert.strictEqual(exceedsLimit('abcd', 3), true);
  });
});

describe('baseCapacity', () => {
  it('should leave room for the separator and the trimmed ticket', () => {
    assert.strictEqual(baseCapacity('INC123456', 82), 72);
    assert.strictEqual(baseCapacity('  CHG-42 ', 10), 3);
  });

  it('should be 0 when the ticket is one character short of the limit', () => {
    assert.strictEqual(baseCapacity('T'.repeat(9), 10), 0);
  });

  it('should not go below 0 for tickets at or past the limit', () => {
    assert.strictEqual(baseCapacity('T'.repeat(10), 10), 0);
    assert.strictEqual(baseCapacity('T'.repeat(40), 10), 0);
  });

  it('should give every disk the same name at 0', () => {
    const names = ['os', 'data0'].map((diskName) =>
      composeSnapshotName({
        vmIdentifier: 'vm',
        diskName,
        ticketReference: 'T'.repeat(9),
        maxLength: 10,
      })
    );

    assert.deepStrictEqual(names, ['_TTTTTTTTT', '_TTTTTTTTT']);
  });
});

describe('ticketOverflowsLimit', () => {
  it('should flag tickets as long as the limit under vmDiskCombined', () => {
    const policy = 'vmDiskCombined';
    assert.strictEqual(ticketOverflowsLimit('A'.repeat(82), 82, policy), true);
    assert.strictEqual(ticketOverflowsLimit('A'.repeat(81), 82, policy), false);
  });

  it('should ignore surrounding whitespace', () => {
    assert.strictEqual(
      ticketOverflowsLimit('  ABCDE  ', 6, 'vmDiskCombined'),
      false
    );
  });

  it('should never flag diskOnly', () => {
    assert.strictEqual(
      ticketOverflowsLimit('A'.repeat(200), 82, 'diskOnly'),
      false
    );
  });
});
