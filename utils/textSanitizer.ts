/**
 * Text sanitization utilities for file names and release tags
 */

import path from 'path';
import { RELEASE } from './constants';

// Anything outside this set becomes "_" (one per code point)
const UNSAFE_NAME_CHARS_REGEX = /[^a-zA-Z0-9_-]/gu;

/**
 * Split a display name into its base and extension.
 * Only the last path component counts; a trailing bare dot is not an extension.
 */
export function splitFileName(displayName: string): { base: string; extension: string } {
  const fileName = path.posix.basename(displayName);
  const extension = path.posix.extname(fileName);

  if (!extension || extension === '.') {
    return { base: fileName, extension: '' };
  }

  return {
    base: fileName.slice(0, -extension.length),
    extension
  };
}

/**
 * Make a string safe for use as a file name and release tag
 * @param maxLength - Cap applied after replacement
 */
export function sanitizeFileBase(text: string, maxLength: number = RELEASE.MAX_BASE_LENGTH): string {
  if (!text || typeof text !== 'string') {
    return '';
  }

  return Array.from(text.replace(UNSAFE_NAME_CHARS_REGEX, '_'))
    .slice(0, maxLength)
    .join('');
}

/**
 * Shorten a line for log output
 */
export function truncateForLog(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}
