/**
 * VM List Reader
 *
 * Reads the newline-delimited list of VM identifiers.
 */

import { readFile } from 'node:fs/promises';

import { VmListError } from './errors.js';

/**
 * Split list text into VM identifiers.
 *
 * Lines are trimmed and blank lines dropped. Order and duplicates are kept;
 * there is no escaping or comment syntax.
 */
export function parseVmList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Read and parse a VM list file.
 *
 * @throws VmListError when the file cannot be read or lists no VMs
 */
export async function readVmList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    const reason =
      err.code === 'ENOENT'
        ? 'not found'
        : `unreadable (${err.code ?? err.message})`;
    throw new VmListError(
      `VM list ${reason}: ${filePath}`,
      'VM_LIST_NOT_FOUND',
      filePath
    );
  }

  // Strip a UTF-8 BOM left by Windows editors
  const identifiers = parseVmList(content.replace(/^\uFEFF/, ''));
  if (identifiers.length === 0) {
    throw new VmListError(
      `VM list contains no VM names: ${filePath}`,
      'VM_LIST_EMPTY',
      filePath
    );
  }
  return identifiers;
}
