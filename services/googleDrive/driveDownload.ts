/**
 * Google Drive Download Operations
 *
 * Streams a shared Drive file to local storage.
 */

import fs from 'fs';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { ConfirmTokenByteSource, DriveByteSource } from './driveByteSource';
import logger from '../../utils/logger';
import { extractErrorMessage } from '../../utils/errorHandler';
import { formatMegabytes } from '../../utils/tempFileUtils';
import { DRIVE, FILE_SIZE } from '../../utils/constants';

export interface DownloadProgress {
    downloadedBytes: number;
    totalBytes: number;
    /** null when the server declared no length */
    percent: number | null;
}

export type DownloadProgressCallback = (progress: DownloadProgress) => void;

const defaultByteSource = new ConfirmTokenByteSource();

/**
 * Progress reporter that logs every DRIVE.PROGRESS_STEP_PERCENT percent
 */
export function createProgressLogger(step: number = DRIVE.PROGRESS_STEP_PERCENT): DownloadProgressCallback {
    let lastStep = -1;
    return ({ downloadedBytes, totalBytes, percent }) => {
        if (percent === null) return;
        const currentStep = Math.floor(percent / step);
        if (currentStep === lastStep) return;
        lastStep = currentStep;
        logger.info(`⏬ Download progress: ${percent.toFixed(1)}% (${formatMegabytes(downloadedBytes, 1)}/${formatMegabytes(totalBytes, 1)} MB)`);
    };
}

/**
 * Download a Drive file to outputPath.
 * Errors are logged and reported as false; a partial file may remain.
 */
export async function downloadDriveFile(
    fileId: string,
    outputPath: string,
    source: DriveByteSource = defaultByteSource,
    onProgress: DownloadProgressCallback = createProgressLogger()
): Promise<boolean> {
    logger.info(`📥 Downloading file ID: ${fileId}`);

    try {
        const { stream, totalBytes } = await source.open(fileId);
        logger.info(`📦 File size: ${formatMegabytes(totalBytes)} MB`);

        let downloadedBytes = 0;
        const progress = new Transform({
            transform(chunk: Buffer, _encoding, callback) {
                downloadedBytes += chunk.length;
                onProgress({
                    downloadedBytes,
                    totalBytes,
                    percent: totalBytes > 0 ? (downloadedBytes / totalBytes) * 100 : null
                });
                callback(null, chunk);
            }
        });

        await pipeline(
            stream,
            progress,
            fs.createWriteStream(outputPath, { highWaterMark: FILE_SIZE.DOWNLOAD_CHUNK })
        );

        logger.info(`✅ Download completed: ${outputPath}`);
        return true;
    } catch (error) {
        logger.error(`❌ Error downloading: ${extractErrorMessage(error)}`, { fileId });
        return false;
    }
}
