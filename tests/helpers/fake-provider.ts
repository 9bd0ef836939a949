/**
 * In-memory CloudProvider for tests.
 */

import type {
  CloudProvider,
  CreateSnapshotParams,
  CreatedSnapshot,
  ProviderContext,
  ProviderDisk,
  ProviderDiskRef,
  ProviderVM,
} from '../../src/core/provider.js';
import type { RunLogger } from '../../src/core/types.js';

export interface FakeDisk {
  name: string | null;
  /** Omit to leave the storage profile without a managed disk id */
  managedDiskId?: string | null;
}

export interface FakeVM {
  name: string;
  resourceGroup?: string | null;
  location?: string | null;
  osDisk?: FakeDisk | null;
  dataDisks?: FakeDisk[];
}

export interface FakeContext {
  id: string;
  name?: string;
  vms?: FakeVM[];
  /** setActiveContext rejects with this message */
  activationError?: string;
  /** getVM rejects with this message */
  lookupError?: string;
}

export interface CreatedRecord extends CreateSnapshotParams {
  contextId: string;
}

export class FakeCloudProvider implements CloudProvider {
  readonly calls: string[] = [];
  readonly created: CreatedRecord[] = [];
  /** authenticate rejects with this message */
  authError: string | null = null;
  /** Snapshot name -> message createSnapshot rejects with */
  readonly snapshotFailures = new Map<string, string>();
  /** "rg/disk" -> message getDisk rejects with */
  readonly diskFailures = new Map<string, string>();
  /** Snapshot names that already exist, per context */
  private readonly existing = new Map<string, Set<string>>();
  private active: FakeContext | null = null;

  constructor(private readonly contexts: FakeContext[]) {}

  async authenticate(): Promise<void> {
    this.calls.push('authenticate');
    if (this.authError) {
      throw new Error(this.authError);
    }
  }

  async listAccountContexts(): Promise<ProviderContext[]> {
    this.calls.push('listAccountContexts');
    return this.contexts.map((c) => ({ id: c.id, name: c.name ?? null }));
  }

  async setActiveContext(id: string): Promise<void> {
    this.calls.push(`setActiveContext ${id}`);
    this.active = null;
    const context = this.contexts.find((c) => c.id === id);
    if (!context) {
      throw new Error(`Subscription ${id} not found`);
    }
    if (context.activationError) {
      throw new Error(context.activationError);
    }
    this.active = context;
  }

  async getVM(name: string): Promise<ProviderVM | null> {
    const context = this.requireActive();
    this.calls.push(`getVM ${context.id} ${name}`);
    if (context.lookupError) {
      throw new Error(context.lookupError);
    }
    const vm = context.vms?.find((v) => v.name === name);
    if (!vm) {
      return null;
    }
    return {
      name: vm.name,
      resourceGroup:
        vm.resourceGroup === undefined ? 'rg-default' : vm.resourceGroup,
      location: vm.location === undefined ? 'westeurope' : vm.location,
      osDisk: vm.osDisk ? toRef(vm.osDisk) : null,
      dataDisks: (vm.dataDisks ?? []).map(toRef),
    };
  }

  async getDisk(resourceGroup: string, name: string): Promise<ProviderDisk> {
    const context = this.requireActive();
    this.calls.push(`getDisk ${resourceGroup} ${name}`);
    const failure = this.diskFailures.get(`${resourceGroup}/${name}`);
    if (failure) {
      throw new Error(failure);
    }
    return {
      id: diskId(context.id, resourceGroup, name),
      name,
      location: 'westeurope',
    };
  }

  async createSnapshot(params: CreateSnapshotParams): Promise<CreatedSnapshot> {
    const context = this.requireActive();
    this.calls.push(`createSnapshot ${context.id} ${params.name}`);

    const failure = this.snapshotFailures.get(params.name);
    if (failure) {
      throw new Error(failure);
    }

    const names = this.existing.get(context.id) ?? new Set<string>();
    if (names.has(params.name)) {
      throw new Error(
        `Snapshot '${params.name}' already exists in resource group ` +
          `'${params.resourceGroup}'`
      );
    }
    names.add(params.name);
    this.existing.set(context.id, names);

    this.created.push({ ...params, contextId: context.id });
    return {
      id: `/subscriptions/${context.id}/snapshots/${params.name}`,
      name: params.name,
    };
  }

  private requireActive(): FakeContext {
    if (!this.active) {
      throw new Error('No active context');
    }
    return this.active;
  }
}

export function diskId(
  contextId: string,
  resourceGroup: string,
  name: string
): string {
  return (
    `/subscriptions/${contextId}/resourceGroups/${resourceGroup}` +
    `/providers/Microsoft.Compute/disks/${name}`
  );
}

function toRef(disk: FakeDisk): ProviderDiskRef {
  return { name: disk.name, managedDiskId: disk.managedDiskId ?? null };
}

type LogLevel = 'info' | 'success' | 'warning' | 'error';

/**
 * RunLogger that keeps every message.
 */
export class RecordingLogger implements RunLogger {
  readonly messages: Array<{ level: LogLevel; message: string }> = [];

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  success(message: string): void {
    this.messages.push({ level: 'success', message });
  }

  warning(message: string): void {
    this.messages.push({ level: 'warning', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  at(level: LogLevel): string[] {
    return this.messages.filter((m) => m.level === level).map((m) => m.message);
  }
}

export const CONTEXT_A = '11111111-1111-4111-8111-111111111111';
export const CONTEXT_B = '22222222-2222-4222-8222-222222222222';
export const CONTEXT_C = '33333333-3333-4333-8333-333333333333';

/**
 * A clock that returns a fixed time.
 */
export function fixedClock(iso = '2026-03-14T09:26:53.000Z'): () => Date {
  return () => new Date(iso);
}
