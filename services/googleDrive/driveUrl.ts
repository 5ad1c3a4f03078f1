/**
 * Google Drive URL parsing
 */

import { DRIVE } from '../../utils/constants';

// Tried in order: path form, query form, short form
const FILE_ID_PATTERNS: readonly RegExp[] = [
    /\/file\/d\/([a-zA-Z0-9_-]+)/,
    /id=([a-zA-Z0-9_-]+)/,
    /\/d\/([a-zA-Z0-9_-]+)/,
];

/**
 * Extract the file identifier from a Drive link.
 * The identifier is not checked against Drive's own ID grammar.
 * @returns The identifier, or null when no pattern matches
 */
export function extractDriveFileId(url: string): string | null {
    for (const pattern of FILE_ID_PATTERNS) {
        const match = url.match(pattern);
        if (match && match[1]) {
            return match[1];
        }
    }
    return null;
}

/**
 * Synthetic name used when Drive will not tell us the real one
 */
export function fallbackDriveFileName(fileId: string): string {
    return `video_${fileId.slice(0, DRIVE.ID_PREFIX_LENGTH)}${DRIVE.DEFAULT_EXTENSION}`;
}
