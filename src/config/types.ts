/**
 * Configuration Types for disksnap
 *
 * The YAML configuration structure and the resolved settings with defaults
 * and command-line overrides applied.
 */

import type { NamingPolicy, SearchPolicy } from '../core/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from disksnap.yaml. Every section is
 * optional.
 */
export interface DisksnapConfig {
  search?: SearchConfig;
  naming?: NamingConfig;
  contexts?: ContextsConfig;
  report?: ReportConfig;
  provider?: ProviderConfig;
}

export interface SearchConfig {
  /** Default: first-match */
  policy?: SearchPolicy;
}

export interface NamingConfig {
  /** Default: vmDiskCombined */
  policy?: NamingPolicy;
  /** Default: 82 */
  max_length?: number;
}

/**
 * Subscription allow/deny lists
 */
export interface ContextsConfig {
  include?: string[];
  exclude?: string[];
}

export type ReportFormat = 'csv' | 'json';

export interface ReportConfig {
  /** Directory for report files. Default: current directory */
  directory?: string;
  /** File name prefix. Default: snapshot-report */
  prefix?: string;
  /** Default: csv */
  format?: ReportFormat;
}

export interface ProviderConfig {
  /** PowerShell executable. Default: pwsh */
  powershell_path?: string;
  /** Per-call timeout in milliseconds. Default: 300000 */
  timeout_ms?: number;
  /** Sign in with the host's managed identity. Default: false */
  use_managed_identity?: boolean;
}

// =============================================================================
// Command-line overrides
// =============================================================================

/**
 * Values given on the command line; they win over the configuration file.
 */
export interface CliOverrides {
  search?: SearchPolicy;
  naming?: NamingPolicy;
  maxLength?: number;
  output?: string;
  format?: ReportFormat;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Fully resolved settings ready for a run
 */
export interface ResolvedSettings {
  searchPolicy: SearchPolicy;
  namingPolicy: NamingPolicy;
  maxLength: number;
  contexts: {
    include: string[];
    exclude: string[];
  };
  report: {
    /** Absolute directory for a timestamped report file */
    directory: string;
    prefix: string;
    format: ReportFormat;
    /** Absolute file path when --output names a file; overrides the rest */
    filePath: string | null;
  };
  provider: {
    powershellPath: string;
    timeoutMs: number;
    useManagedIdentity: boolean;
  };
  /** Absolute path of the configuration file, when one was loaded */
  configPath: string | null;
}
