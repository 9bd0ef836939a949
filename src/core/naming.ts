/**
 * Snapshot Naming
 *
 * Derives deterministic, length-bounded snapshot names from the VM
 * identifier, the disk name, and the run's ticket reference.
 */

import type { NamingPolicy } from './types.js';

/**
 * Default upper bound for composed snapshot names.
 */
export const DEFAULT_MAX_NAME_LENGTH = 82;

/**
 * Separator between name segments.
 */
export const NAME_SEPARATOR = '_';

/**
 * Input for composing a snapshot name
 */
export interface ComposeNameInput {
  vmIdentifier: string;
  diskName: string;
  ticketReference: string;
  maxLength: number;
  /** Default: vmDiskCombined */
  policy?: NamingPolicy;
}

/**
 * Compose a snapshot name.
 *
 * The ticket reference is always kept whole; the base is cut down to
 * `maxLength - (len(ticket) + 1)` characters to make room for it.
 *
 * - `vmDiskCombined`: base is `{vm}_{disk}`. The result is not clamped
 *   again, so a ticket of `maxLength` characters or more yields a name over
 *   the limit.
 * - `diskOnly`: base is `{disk}` and the full result is clamped to `maxLength`.
 *
 * The same input always yields the same name.
 */
export function composeSnapshotName(input: ComposeNameInput): string {
  const policy = input.policy ?? 'vmDiskCombined';
  const ticket = input.ticketReference.trim();

  const base =
    policy === 'diskOnly'
      ? input.diskName.trim()
      : `${input.vmIdentifier}${NAME_SEPARATOR}${input.diskName}`.trim();

  const available = baseCapacity(ticket, input.maxLength);
  const truncatedBase =
    base.length > available ? base.slice(0, available) : base;
  const composed = `${truncatedBase}${NAME_SEPARATOR}${ticket}`;

  if (policy === 'diskOnly') {
    return composed.slice(0, Math.max(0, input.maxLength));
  }
  return composed;
}

/**
 * Characters left for the base once the separator and the trimmed ticket
 * are counted. At 0 every name composed for the run is the same.
 */
export function baseCapacity(
  ticketReference: string,
  maxLength: number
): number {
  const reserved = ticketReference.trim().length + NAME_SEPARATOR.length;
  return Math.max(0, maxLength - reserved);
}

/**
 * Check whether a composed name is longer than the limit.
 */
export function exceedsLimit(name: string, maxLength: number): boolean {
  return name.length > maxLength;
}

/**
 * Check whether a ticket reference is long enough to push every name
 * composed under the policy past the limit.
 *
 * Only `vmDiskCombined` can overflow; `diskOnly` clamps.
 */
export function ticketOverflowsLimit(
  ticketReference: string,
  maxLength: number,
  policy: NamingPolicy
): boolean {
  if (policy === 'diskOnly') {
    return false;
  }
  return ticketReference.trim().length >= maxLength;
}
