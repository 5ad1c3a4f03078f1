/**
 * Source list file handling
 *
 * The list is read in full before processing and rewritten in full at the end.
 */

import fs from 'fs';
import { extractErrorMessage } from '../../utils/errorHandler';

/**
 * The list file could not be read; nothing has been processed
 */
export class SourceListError extends Error {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'SourceListError';
    this.filePath = filePath;
  }
}

/**
 * Read the raw lines of the list file (untrimmed, final newline dropped)
 * @throws {SourceListError} If the file is missing or unreadable
 */
export function readSourceList(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new SourceListError(`${filePath} not found`, filePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new SourceListError(`Cannot read ${filePath}: ${extractErrorMessage(error)}`, filePath);
  }

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Overwrite the list file with exactly these entries, one per line
 */
export function writeSourceList(filePath: string, links: readonly string[]): void {
  fs.writeFileSync(filePath, links.map(link => `${link}\n`).join(''), 'utf8');
}
