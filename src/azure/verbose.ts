/**
 * Verbose Output Helpers
 *
 * Formats PowerShell scripts for --verbose output on stderr.
 */

const PREFIX = '[pwsh] ';
const CONTINUATION_INDENT = ' '.repeat(PREFIX.length);

// SGR 90 (bright black) and reset
const ANSI_GRAY = '\x1b[90m';
const ANSI_RESET = '\x1b[0m';

/**
 * Whether stderr is an interactive terminal.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a script as a fenced block: a blank line before and after, the
 * first line prefixed with `[pwsh] `, continuation lines indented to match.
 * With `ansi`, the block is wrapped in gray.
 */
export function formatScript(script: string, ansi: boolean): string {
  const body = script
    .split('\n')
    .map((line, i) => `${i === 0 ? PREFIX : CONTINUATION_INDENT}${line}\n`)
    .join('');

  const plain = `\n${body}\n`;
  return ansi ? `${ANSI_GRAY}${plain}${ANSI_RESET}` : plain;
}
