/**
 * VM Locator
 *
 * Searches account contexts for a VM identifier, one context at a time.
 */

import type { CloudProvider, ProviderVM } from './provider.js';
import type {
  AccountContext,
  ContextLookupOutcome,
  ReportedDisk,
  ResolvedVM,
  RunLogger,
  SearchPolicy,
} from './types.js';
import { describeContext } from './contexts.js';
import { errorMessage } from './errors.js';

/**
 * Activate a context and look the VM up in it.
 *
 * Activation and lookup failures make the context unavailable for this VM;
 * they never throw.
 */
export async function lookupInContext(
  provider: CloudProvider,
  context: AccountContext,
  vmIdentifier: string
): Promise<ContextLookupOutcome> {
  try {
    await provider.setActiveContext(context.id);
  } catch (error) {
    return unavailable(context, error);
  }

  let vm: ProviderVM | null;
  try {
    vm = await provider.getVM(vmIdentifier);
  } catch (error) {
    return unavailable(context, error);
  }

  if (!vm) {
    return { kind: 'not-found-here', context };
  }

  return { kind: 'found', vm: toResolvedVM(vmIdentifier, context, vm) };
}

function unavailable(
  context: AccountContext,
  error: unknown
): ContextLookupOutcome {
  return { kind: 'context-unavailable', context, reason: errorMessage(error) };
}

/**
 * Walk the contexts in order, yielding one outcome per context searched.
 *
 * Under `first-match` the walk ends right after the first hit. The caller
 * consumes each outcome before the next context is activated, so work on a
 * hit happens while its context is still active.
 */
export async function* searchContexts(
  provider: CloudProvider,
  contexts: readonly AccountContext[],
  vmIdentifier: string,
  policy: SearchPolicy,
  logger: RunLogger
): AsyncGenerator<ContextLookupOutcome, void, undefined> {
  for (const context of contexts) {
    const outcome = await lookupInContext(provider, context, vmIdentifier);

    if (outcome.kind === 'context-unavailable') {
      logger.warning(
        `${vmIdentifier}: skipping context ${describeContext(context)}: ` +
          outcome.reason
      );
    }

    yield outcome;

    if (outcome.kind === 'found' && policy === 'first-match') {
      return;
    }
  }
}

/**
 * Bind provider VM metadata to the context it was found in.
 */
export function toResolvedVM(
  identifier: string,
  context: AccountContext,
  vm: ProviderVM
): ResolvedVM {
  const disks: ReportedDisk[] = [];
  if (vm.osDisk) {
    disks.push({
      name: vm.osDisk.name,
      sourceDiskReference: vm.osDisk.managedDiskId,
      role: 'OS',
    });
  }
  for (const dataDisk of vm.dataDisks) {
    disks.push({
      name: dataDisk.name,
      sourceDiskReference: dataDisk.managedDiskId,
      role: 'Data',
    });
  }

  return {
    identifier,
    context,
    resourceGroup: vm.resourceGroup ?? '',
    location: vm.location ?? '',
    disks,
  };
}
