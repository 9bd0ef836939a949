/**
 * PowerShell Az Provider
 *
 * CloudProvider implementation that runs Az module cmdlets through a
 * ScriptRunner. Executor failures surface as ProviderError, or as
 * AuthenticationError when the sign-in is missing, with the provider's
 * message unchanged.
 */

import type {
  CloudProvider,
  CreateSnapshotParams,
  CreatedSnapshot,
  ProviderContext,
  ProviderDisk,
  ProviderDiskRef,
  ProviderVM,
} from '../core/provider.js';
import {
  AuthenticationError,
  ProviderError,
  errorMessage,
  type DisksnapError,
} from '../core/errors.js';
import { PowerShellError, type ScriptRunner } from './executor.js';
import type {
  AzDisk,
  AzDiskSlot,
  AzSession,
  AzSnapshot,
  AzSubscription,
  AzVirtualMachine,
} from './types.js';
import {
  buildAuthenticateScript,
  buildCreateSnapshotScript,
  buildGetDiskScript,
  buildGetVMScript,
  buildListSubscriptionsScript,
  buildSetContextScript,
} from './commands.js';

/**
 * Options for PowerShellAzProvider
 */
export interface PowerShellAzProviderOptions {
  /** Sign in with the host's managed identity when no session exists */
  useManagedIdentity?: boolean;
}

const POWERSHELL_MISSING =
  'Install PowerShell 7 with the Az module, or set provider.powershell_path.';
const RAISE_TIMEOUT = 'Raise provider.timeout_ms in the configuration file.';

export class PowerShellAzProvider implements CloudProvider {
  private readonly runner: ScriptRunner;
  private readonly useManagedIdentity: boolean;
  private activeContextId: string | null = null;

  constructor(
    runner: ScriptRunner,
    options: PowerShellAzProviderOptions = {}
  ) {
    this.runner = runner;
    this.useManagedIdentity = options.useManagedIdentity ?? false;
  }

  /**
   * Id of the context set by the last successful setActiveContext.
   */
  getActiveContextId(): string | null {
    return this.activeContextId;
  }

  async authenticate(): Promise<void> {
    const session = await this.run<AzSession | null>(
      'authenticate',
      buildAuthenticateScript(this.useManagedIdentity)
    );
    if (!session?.Account) {
      throw new ProviderError(
        'Azure session has no signed-in account',
        'authenticate'
      );
    }
  }

  async listAccountContexts(): Promise<ProviderContext[]> {
    const result = await this.run<AzSubscription[] | AzSubscription | null>(
      'listAccountContexts',
      buildListSubscriptionsScript()
    );

    const contexts: ProviderContext[] = [];
    for (const sub of toArray(result)) {
      if (typeof sub.Id === 'string') {
        contexts.push({ id: sub.Id, name: sub.Name ?? null });
      }
    }
    return contexts;
  }

  async setActiveContext(id: string): Promise<void> {
    // A failed switch leaves no context active
    this.activeContextId = null;
    await this.run<unknown>('setActiveContext', buildSetContextScript(id));
    this.activeContextId = id;
  }

  async getVM(name: string): Promise<ProviderVM | null> {
    const vm = await this.run<AzVirtualMachine | null>(
      'getVM',
      buildGetVMScript(this.requireContext('getVM'), name)
    );
    if (!vm) {
      return null;
    }

    return {
      name: vm.Name,
      resourceGroup: vm.ResourceGroupName ?? null,
      location: vm.Location ?? null,
      osDisk: vm.OsDisk ? toDiskRef(vm.OsDisk) : null,
      dataDisks: toArray(vm.DataDisks).map(toDiskRef),
    };
  }

  async getDisk(resourceGroup: string, name: string): Promise<ProviderDisk> {
    const disk = await this.run<AzDisk | null>(
      'getDisk',
      buildGetDiskScript(this.requireContext('getDisk'), resourceGroup, name)
    );
    if (!disk) {
      throw new ProviderError(
        `Disk '${name}' not found in resource group '${resourceGroup}'`,
        'getDisk'
      );
    }
    return { id: disk.Id, name: disk.Name, location: disk.Location ?? null };
  }

  async createSnapshot(
    params: CreateSnapshotParams
  ): Promise<CreatedSnapshot> {
    const snapshot = await this.run<AzSnapshot | null>(
      'createSnapshot',
      buildCreateSnapshotScript(this.requireContext('createSnapshot'), params)
    );
    return { id: snapshot?.Id ?? null, name: snapshot?.Name ?? params.name };
  }

  private requireContext(operation: string): string {
    if (!this.activeContextId) {
      throw new ProviderError(
        'No active account context; call setActiveContext first',
        operation
      );
    }
    return this.activeContextId;
  }

  private async run<T>(operation: string, script: string): Promise<T> {
    try {
      return await this.runner.execute<T>(script);
    } catch (error) {
      throw toProviderFailure(error, operation);
    }
  }
}

/**
 * Map a runner failure to the error the core sees. The message is always
 * the provider's own; a lost sign-in becomes an AuthenticationError.
 */
function toProviderFailure(error: unknown, operation: string): DisksnapError {
  const message = errorMessage(error);
  if (!(error instanceof PowerShellError)) {
    return new ProviderError(
      message,
      operation,
      error instanceof Error ? error : undefined
    );
  }

  switch (error.code) {
    case 'NOT_AUTHENTICATED':
      return new AuthenticationError(message);
    case 'POWERSHELL_NOT_AVAILABLE':
      return new ProviderError(message, operation, error, POWERSHELL_MISSING);
    case 'TIMEOUT':
      return new ProviderError(message, operation, error, RAISE_TIMEOUT);
    default:
      return new ProviderError(message, operation, error);
  }
}

function toDiskRef(slot: AzDiskSlot): ProviderDiskRef {
  return {
    name: slot.Name ?? null,
    managedDiskId: slot.ManagedDiskId ?? null,
  };
}

function toArray<T>(value: T[] | T | null | undefined): T[] {
  if (value === null || value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
