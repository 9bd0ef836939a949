/**
 * Context Enumerator
 *
 * Lists the account contexts of the current session and keeps the ones
 * whose id has the canonical UUID shape.
 */

import type { CloudProvider } from './provider.js';
import type { AccountContext } from './types.js';
import { NoValidContextsError } from './errors.js';

/**
 * Canonical hexadecimal-grouped UUID shape (8-4-4-4-12).
 */
export const CONTEXT_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Optional narrowing of the enumerated contexts
 */
export interface ContextFilter {
  /** Keep only these ids */
  include?: string[];
  /** Drop these ids */
  exclude?: string[];
}

/**
 * Check whether a value is a well-formed context id.
 */
export function isValidContextId(id: unknown): id is string {
  return typeof id === 'string' && CONTEXT_ID_PATTERN.test(id);
}

/**
 * Enumerate the usable account contexts, in provider order.
 *
 * Entries with malformed ids are dropped, as are repeats of an id already
 * seen. The include/exclude filter is applied last (ids compare
 * case-insensitively).
 *
 * @throws NoValidContextsError when nothing is left
 */
export async function enumerateContexts(
  provider: CloudProvider,
  filter: ContextFilter = {}
): Promise<AccountContext[]> {
  const listed = await provider.listAccountContexts();

  const include = toIdSet(filter.include);
  const exclude = toIdSet(filter.exclude);
  const seen = new Set<string>();
  const contexts: AccountContext[] = [];

  for (const entry of listed) {
    const id = entry.id.trim();
    if (!isValidContextId(id)) {
      continue;
    }

    const key = id.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    if (include && !include.has(key)) {
      continue;
    }
    if (exclude?.has(key)) {
      continue;
    }

    contexts.push(entry.name ? { id, name: entry.name } : { id });
  }

  if (contexts.length === 0) {
    const filtered = include !== null || exclude !== null;
    throw new NoValidContextsError(listed.length, filtered);
  }

  return contexts;
}

function toIdSet(ids: string[] | undefined): Set<string> | null {
  if (!ids || ids.length === 0) {
    return null;
  }
  return new Set(ids.map((id) => id.trim().toLowerCase()));
}

/**
 * Label a context for log output: "Name (id)" or just the id.
 */
export function describeContext(context: AccountContext): string {
  return context.name ? `${context.name} (${context.id})` : context.id;
}
