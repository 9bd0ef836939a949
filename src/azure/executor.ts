/**
 * PowerShell Executor for Az Operations
 *
 * Spawns PowerShell to run Az cmdlets and parses their JSON output.
 */

import { spawn } from 'node:child_process';

import { formatScript, supportsAnsi } from './verbose.js';

/**
 * Error codes for PowerShell executions
 */
export type PowerShellErrorCode =
  | 'NOT_AUTHENTICATED'
  | 'INVALID_RESPONSE'
  | 'TIMEOUT'
  | 'EXECUTION_FAILED'
  | 'POWERSHELL_NOT_AVAILABLE';

/**
 * Error thrown when a PowerShell execution fails
 */
export class PowerShellError extends Error {
  constructor(
    message: string,
    public readonly code: PowerShellErrorCode,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly script: string
  ) {
    super(message);
    this.name = 'PowerShellError';
  }
}

/**
 * Anything that can run a PowerShell script and hand back parsed JSON.
 */
export interface ScriptRunner {
  execute<T>(script: string): Promise<T>;
}

/**
 * Options for constructing a PowerShellExecutor
 */
export interface PowerShellExecutorOptions {
  /** PowerShell executable (default: 'pwsh') */
  powershellPath?: string;
  /** Timeout per script in milliseconds (default: 300000) */
  timeoutMs?: number;
  /** Print scripts to stderr before execution (default: false) */
  verbose?: boolean;
}

export const DEFAULT_POWERSHELL_PATH = 'pwsh';
export const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * Runs scripts in a fresh, non-interactive PowerShell process each time.
 */
export class PowerShellExecutor implements ScriptRunner {
  private readonly powershellPath: string;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  constructor(options?: PowerShellExecutorOptions) {
    this.powershellPath = options?.powershellPath ?? DEFAULT_POWERSHELL_PATH;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Execute a script and return its parsed JSON output.
   *
   * Empty output and a literal `null` resolve to null.
   *
   * @throws PowerShellError if the process fails, times out, or prints
   *   something that is not JSON
   */
  async execute<T>(script: string): Promise<T> {
    const timeout = this.timeoutMs;

    if (this.verbose) {
      process.stderr.write(formatScript(script, supportsAnsi()));
    }

    return new Promise<T>((resolve, reject) => {
      const ps = spawn(this.powershellPath, [
        '-NoProfile',
        '-NonInteractive',
        '-Command',
        script,
      ]);

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        ps.kill('SIGTERM');
        reject(
          new PowerShellError(
            `PowerShell execution timed out after ${timeout}ms`,
            'TIMEOUT',
            null,
            stderr,
            script
          )
        );
      }, timeout);

      ps.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      ps.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ps.on('error', (error: Error) => {
        clearTimeout(timeoutId);
        if (!killed) {
          reject(
            new PowerShellError(
              `Failed to spawn ${this.powershellPath}: ${error.message}`,
              'POWERSHELL_NOT_AVAILABLE',
              null,
              stderr,
              script
            )
          );
        }
      });

      ps.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        if (code !== 0) {
          reject(
            new PowerShellError(
              formatErrorMessage(stderr, code),
              classifyError(stderr),
              code,
              stderr,
              script
            )
          );
          return;
        }

        try {
          resolve(parseJsonOutput<T>(stdout));
        } catch {
          const excerpt = stdout.trim().slice(0, 200);
          reject(
            new PowerShellError(
              `Invalid JSON response from PowerShell: ${excerpt}`,
              'INVALID_RESPONSE',
              code,
              stderr,
              script
            )
          );
        }
      });
    });
  }
}

/**
 * Parse script output. Empty output and `null` become null.
 *
 * @throws SyntaxError when the output is not JSON
 */
export function parseJsonOutput<T>(stdout: string): T {
  const trimmed = stdout.trim();
  if (trimmed === '' || trimmed === 'null') {
    return null as T;
  }
  return JSON.parse(trimmed) as T;
}

/**
 * Classify a failed script from its stderr text.
 *
 * Only a missing or expired sign-in is told apart; every other failure
 * carries the Az message as-is.
 */
export function classifyError(stderr: string): PowerShellErrorCode {
  const lower = stderr.toLowerCase();

  if (
    lower.includes('connect-azaccount') ||
    lower.includes('no subscription found in the context')
  ) {
    return 'NOT_AUTHENTICATED';
  }

  return 'EXECUTION_FAILED';
}

/**
 * Strip ANSI escape sequences and carriage returns.
 */
export function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * The error message of a failed script.
 *
 * Scripts write the exception message alone to stderr, so the cleaned
 * stderr text is the provider's message as-is.
 */
export function formatErrorMessage(
  stderr: string,
  exitCode: number | null
): string {
  const clean = stripAnsiCodes(stderr).trim();
  if (clean) {
    return clean;
  }
  return `PowerShell exited with code ${exitCode}`;
}
