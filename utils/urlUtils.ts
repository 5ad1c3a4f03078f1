/**
 * URL Utilities
 *
 * Classification of source-list entries. Matching is by substring, the same
 * way the list has always been curated: anything mentioning github.com is
 * already migrated.
 */

import { HOSTS } from './constants';

export type SourceLineKind = 'blank' | 'github' | 'drive' | 'unsupported';

export function isGithubUrl(line: string): boolean {
  return line.includes(HOSTS.GITHUB);
}

export function isDriveUrl(line: string): boolean {
  return line.includes(HOSTS.DRIVE);
}

/**
 * Decide how the migrator treats a trimmed source line.
 * GitHub wins over Drive when a line mentions both.
 */
export function classifySourceLine(line: string): SourceLineKind {
  if (!line) {
    return 'blank';
  }
  if (isGithubUrl(line)) {
    return 'github';
  }
  if (isDriveUrl(line)) {
    return 'drive';
  }
  return 'unsupported';
}
