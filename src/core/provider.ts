/**
 * Cloud Provider Contract
 *
 * The operations disksnap needs from the cloud. Every method either resolves
 * with data or rejects; callers in core turn rejections into tagged outcomes.
 */

/**
 * A context entry as listed by the provider, before validation.
 */
export interface ProviderContext {
  id: string;
  name: string | null;
}

/**
 * A disk slot in a VM's storage profile.
 */
export interface ProviderDiskRef {
  name: string | null;
  managedDiskId: string | null;
}

/**
 * VM metadata returned by a lookup by name.
 */
export interface ProviderVM {
  name: string;
  resourceGroup: string | null;
  location: string | null;
  osDisk: ProviderDiskRef | null;
  dataDisks: ProviderDiskRef[];
}

/**
 * A managed disk resource.
 */
export interface ProviderDisk {
  id: string;
  name: string;
  location: string | null;
}

/**
 * Parameters of a copy-from-source snapshot creation.
 */
export interface CreateSnapshotParams {
  sourceDiskReference: string;
  location: string;
  resourceGroup: string;
  name: string;
  tags: Record<string, string>;
}

/**
 * A snapshot the provider reports as created.
 */
export interface CreatedSnapshot {
  id: string | null;
  name: string;
}

export interface CloudProvider {
  /** Establish (or confirm) the ambient authenticated session. */
  authenticate(): Promise<void>;
  /** List candidate account contexts in provider order. */
  listAccountContexts(): Promise<ProviderContext[]>;
  /** Switch subsequent calls into the given context. */
  setActiveContext(id: string): Promise<void>;
  /** Look up a VM in the active context; null when absent. */
  getVM(name: string): Promise<ProviderVM | null>;
  getDisk(resourceGroup: string, name: string): Promise<ProviderDisk>;
  createSnapshot(params: CreateSnapshotParams): Promise<CreatedSnapshot>;
}
