/**
 * Az Output Types
 *
 * Shapes of the JSON the Az scripts print. Fields can be null when the
 * underlying object lacks them.
 */

/**
 * Session returned by the authenticate script
 */
export interface AzSession {
  Account: string | null;
  TenantId: string | null;
}

/**
 * Subscription entry from Get-AzSubscription
 */
export interface AzSubscription {
  Id: string | null;
  Name: string | null;
  /** Enabled, Disabled, Warned, ... */
  State: string | null;
}

/**
 * Disk slot from a VM's storage profile
 */
export interface AzDiskSlot {
  Name: string | null;
  /** Data disks only */
  Lun?: number | null;
  /** Null for unmanaged (VHD) disks */
  ManagedDiskId: string | null;
}

/**
 * VM metadata from Get-AzVM
 */
export interface AzVirtualMachine {
  Name: string;
  ResourceGroupName: string | null;
  Location: string | null;
  OsDisk: AzDiskSlot | null;
  /** ConvertTo-Json may collapse a one-element array to an object */
  DataDisks: AzDiskSlot[] | AzDiskSlot | null;
}

/**
 * Managed disk from Get-AzDisk
 */
export interface AzDisk {
  Id: string;
  Name: string;
  Location: string | null;
}

/**
 * Snapshot from New-AzSnapshot
 */
export interface AzSnapshot {
  Id: string | null;
  Name: string;
  ProvisioningState: string | null;
}
