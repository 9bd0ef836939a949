/**
 * Error Types for disksnap
 *
 * Custom error classes with error codes for structured error handling.
 * Only fatal conditions are thrown as errors; per-VM and per-disk failures
 * are captured as report entries by the run orchestrator.
 */

/**
 * Error codes for all disksnap errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'VM_LIST_NOT_FOUND'
  | 'VM_LIST_EMPTY'
  | 'AUTHENTICATION_FAILED'
  | 'NO_VALID_CONTEXTS'
  | 'PROVIDER_ERROR'
  | 'REPORT_WRITE_FAILED'
  | 'OPERATION_FAILED';

/**
 * Mapping of error codes to exit codes.
 *
 * Missing input, authentication failure and an empty context set each get
 * their own status so wrapping scripts can tell them apart.
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  VM_LIST_NOT_FOUND: 3,
  VM_LIST_EMPTY: 3,
  AUTHENTICATION_FAILED: 4,
  NO_VALID_CONTEXTS: 5,
  PROVIDER_ERROR: 2,
  REPORT_WRITE_FAILED: 2,
  OPERATION_FAILED: 2,
};

/**
 * Base error class for all disksnap errors.
 */
export class DisksnapError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'DisksnapError';
    Object.setPrototypeOf(this, DisksnapError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends DisksnapError {
  constructor(
    message: string,
    code:
      | 'CONFIG_NOT_FOUND'
      | 'CONFIG_INVALID_YAML'
      | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * The VM list file is missing, unreadable, or holds no identifiers.
 */
export class VmListError extends DisksnapError {
  constructor(
    message: string,
    code: 'VM_LIST_NOT_FOUND' | 'VM_LIST_EMPTY',
    public readonly filePath: string
  ) {
    super(
      message,
      code,
      code === 'VM_LIST_EMPTY'
        ? 'Add one VM name per line to the list file.'
        : 'Pass the path of a readable, newline-delimited VM list.'
    );
    this.name = 'VmListError';
    Object.setPrototypeOf(this, VmListError.prototype);
  }
}

/**
 * The ambient cloud session could not be established.
 */
export class AuthenticationError extends DisksnapError {
  constructor(message: string, suggestion?: string) {
    super(
      message,
      'AUTHENTICATION_FAILED',
      suggestion ??
        'Sign in with Connect-AzAccount, or enable use_managed_identity ' +
          'on a host with a managed identity.'
    );
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * No account context with a well-formed id survived enumeration and
 * filtering.
 */
export class NoValidContextsError extends DisksnapError {
  constructor(
    public readonly listedCount: number,
    public readonly filtered: boolean
  ) {
    super(
      listedCount === 0
        ? 'The session has no account contexts'
        : `None of the ${listedCount} listed account context(s) is usable`,
      'NO_VALID_CONTEXTS',
      filtered
        ? 'Check contexts.include / contexts.exclude in the configuration file.'
        : 'Make sure the signed-in identity can access a subscription.'
    );
    this.name = 'NoValidContextsError';
    Object.setPrototypeOf(this, NoValidContextsError.prototype);
  }
}

/**
 * A provider call failed. The message is the provider's own, unaltered.
 */
export class ProviderError extends DisksnapError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly original?: Error,
    suggestion?: string
  ) {
    super(message, 'PROVIDER_ERROR', suggestion);
    this.name = 'ProviderError';
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/**
 * The report could not be written to its destination.
 */
export class ReportWriteError extends DisksnapError {
  constructor(
    message: string,
    public readonly destination: string
  ) {
    super(
      message,
      'REPORT_WRITE_FAILED',
      'Check that the output directory exists and is writable.'
    );
    this.name = 'ReportWriteError';
    Object.setPrototypeOf(this, ReportWriteError.prototype);
  }
}

/**
 * Check if an error is a DisksnapError.
 */
export function isDisksnapError(error: unknown): error is DisksnapError {
  return error instanceof DisksnapError;
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isDisksnapError(error)) {
    return error.exitCode;
  }
  return 2;
}
