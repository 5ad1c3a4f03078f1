/**
 * Google Drive metadata and artifact naming
 */

import { getPublicDriveClient } from './driveClient';
import { fallbackDriveFileName } from './driveUrl';
import logger from '../../utils/logger';
import { extractErrorMessage } from '../../utils/errorHandler';
import { sanitizeFileBase, splitFileName } from '../../utils/textSanitizer';
import { DRIVE } from '../../utils/constants';

/**
 * Local name for a downloaded Drive file
 */
export interface ArtifactName {
    safeBase: string;
    extension: string;
    fileName: string;
}

/**
 * Look up the display name of a shared Drive file.
 * Anonymous lookups are often refused, so every failure quietly falls back
 * to a synthetic name built from the identifier.
 */
export async function resolveDriveFileName(fileId: string): Promise<string> {
    try {
        const drive = getPublicDriveClient();
        const response = await drive.files.get({
            fileId,
            fields: 'name,size',
            supportsAllDrives: true
        });

        const name = response.data.name;
        if (response.status === 200 && typeof name === 'string' && name) {
            return name;
        }

        logger.debug(`[Google Drive] Metadata for ${fileId} has no name (status ${response.status})`);
    } catch (error) {
        logger.debug(`[Google Drive] Metadata lookup failed for ${fileId}: ${extractErrorMessage(error)}`);
    }

    return fallbackDriveFileName(fileId);
}

/**
 * Derive the local file name and release base from a display name
 */
export function buildArtifactName(displayName: string, fileId: string): ArtifactName {
    const { base, extension } = splitFileName(displayName);

    const safeBase = sanitizeFileBase(base) ||
        sanitizeFileBase(`video_${fileId.slice(0, DRIVE.ID_PREFIX_LENGTH)}`);
    const finalExtension = extension || DRIVE.DEFAULT_EXTENSION;

    return {
        safeBase,
        extension: finalExtension,
        fileName: `${safeBase}${finalExtension}`
    };
}
