/**
 * PowerShell Script Builders
 *
 * Builds Az module scripts. Every script stops on the first error and
 * writes only the exception message to stderr; results come back as JSON
 * via ConvertTo-Json.
 */

import type { CreateSnapshotParams } from '../core/provider.js';

/**
 * Escape a string for a PowerShell single-quoted literal.
 * Single quotes are escaped by doubling them.
 */
export function escapePowerShellString(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Quote a value as a PowerShell single-quoted literal.
 */
export function quote(value: string): string {
  return `'${escapePowerShellString(value)}'`;
}

const PRELUDE = `
$ErrorActionPreference = 'Stop'
$WarningPreference = 'SilentlyContinue'
trap { [Console]::Error.WriteLine($_.Exception.Message); exit 1 }
`.trim();

/**
 * Wrap a script body with the error-handling prelude and, when given, a
 * process-scoped switch into the subscription.
 *
 * Each script runs in a fresh process, so the active context has to be
 * re-established every time.
 */
export function withPrelude(body: string, contextId?: string): string {
  const parts = [PRELUDE];
  if (contextId) {
    const target = `-Subscription ${quote(contextId)} -Scope Process`;
    parts.push(`Set-AzContext ${target} | Out-Null`);
  }
  parts.push(body.trim());
  return parts.join('\n');
}

/**
 * Build script that confirms (or establishes) the Azure session.
 *
 * Without a managed identity an existing signed-in context is required;
 * interactive sign-in is not possible from a non-interactive process.
 *
 * Returns: AzSession
 */
export function buildAuthenticateScript(useManagedIdentity: boolean): string {
  const connect = useManagedIdentity
    ? `  Connect-AzAccount -Identity | Out-Null
  $ctx = Get-AzContext`
    : `  throw 'No signed-in Azure session. Run Connect-AzAccount first.'`;

  return withPrelude(`
$ctx = Get-AzContext
if (-not $ctx -or -not $ctx.Account) {
${connect}
}
[ordered]@{
  Account = [string]$ctx.Account.Id
  TenantId = [string]$ctx.Tenant.Id
} | ConvertTo-Json
`);
}

/**
 * Build script to list the subscriptions visible to the session.
 *
 * Returns: AzSubscription[]
 */
export function buildListSubscriptionsScript(): string {
  return withPrelude(`
$subs = @(
  Get-AzSubscription | Select-Object -Property @(
    @{ N = 'Id'; E = { [string]$_.Id } }
    'Name'
    @{ N = 'State'; E = { [string]$_.State } }
  )
)
ConvertTo-Json -InputObject $subs -Depth 3
`);
}

/**
 * Build script to switch into a subscription.
 *
 * Returns: { Id: string }
 */
export function buildSetContextScript(contextId: string): string {
  return withPrelude(`
$ctx = Set-AzContext -Subscription ${quote(contextId)} -Scope Process
[ordered]@{ Id = [string]$ctx.Subscription.Id } | ConvertTo-Json
`);
}

/**
 * Build script to look up a VM by name in a subscription.
 *
 * A missing VM is not an error: the script prints null.
 *
 * Returns: AzVirtualMachine | null
 */
export function buildGetVMScript(contextId: string, name: string): string {
  return withPrelude(
    `
$vm = Get-AzVM -Name ${quote(name)} -ErrorAction SilentlyContinue |
  Select-Object -First 1
if (-not $vm) { 'null'; exit 0 }
$os = $vm.StorageProfile.OsDisk
$osDisk = $null
if ($os) {
  $osDisk = [ordered]@{ Name = $os.Name; ManagedDiskId = $os.ManagedDisk.Id }
}
$dataDisks = @($vm.StorageProfile.DataDisks | ForEach-Object {
  [ordered]@{
    Name = $_.Name
    Lun = $_.Lun
    ManagedDiskId = $_.ManagedDisk.Id
  }
})
[ordered]@{
  Name = $vm.Name
  ResourceGroupName = $vm.ResourceGroupName
  Location = $vm.Location
  OsDisk = $osDisk
  DataDisks = $dataDisks
} | ConvertTo-Json -Depth 5
`,
    contextId
  );
}

/**
 * Build script to fetch a managed disk.
 *
 * Returns: AzDisk
 */
export function buildGetDiskScript(
  contextId: string,
  resourceGroup: string,
  name: string
): string {
  return withPrelude(
    `
$diskParams = @{
  ResourceGroupName = ${quote(resourceGroup)}
  DiskName = ${quote(name)}
}
$disk = Get-AzDisk @diskParams
[ordered]@{
  Id = $disk.Id
  Name = $disk.Name
  Location = $disk.Location
} | ConvertTo-Json
`,
    contextId
  );
}

/**
 * Build a PowerShell hashtable literal for resource tags.
 */
export function buildTagTable(tags: Record<string, string>): string {
  const pairs = Object.entries(tags).map(
    ([key, value]) => `${quote(key)} = ${quote(value)}`
  );
  return `@{ ${pairs.join('; ')} }`;
}

/**
 * Build script to create a full copy snapshot of a managed disk.
 *
 * Returns: AzSnapshot
 */
export function buildCreateSnapshotScript(
  contextId: string,
  params: CreateSnapshotParams
): string {
  return withPrelude(
    `
$configParams = @{
  SourceUri = ${quote(params.sourceDiskReference)}
  Location = ${quote(params.location)}
  CreateOption = 'Copy'
  Tag = ${buildTagTable(params.tags)}
}
$config = New-AzSnapshotConfig @configParams
$snapshotParams = @{
  Snapshot = $config
  SnapshotName = ${quote(params.name)}
  ResourceGroupName = ${quote(params.resourceGroup)}
}
$snapshot = New-AzSnapshot @snapshotParams
[ordered]@{
  Id = $snapshot.Id
  Name = $snapshot.Name
  ProvisioningState = $snapshot.ProvisioningState
} | ConvertTo-Json
`,
    contextId
  );
}
