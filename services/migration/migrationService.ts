/**
 * Migration Service
 * Rewrites a URL list so every Drive link becomes a GitHub release asset.
 *
 * Lines are handled one at a time. A failure at any step drops that line
 * and the batch moves on; nothing is retried.
 */

import path from 'path';
import { readSourceList, writeSourceList } from './sourceList';
import {
    buildArtifactName,
    downloadDriveFile,
    extractDriveFileId,
    resolveDriveFileName
} from '../googleDrive';
import { createUniqueRelease, ReleaseResult, uploadReleaseAsset } from '../github';
import logger from '../../utils/logger';
import { cleanupTempFile, createTempFilePath, ensureTempDir } from '../../utils/tempFileUtils';
import { classifySourceLine } from '../../utils/urlUtils';
import { truncateForLog } from '../../utils/textSanitizer';
import { extractErrorMessage } from '../../utils/errorHandler';
import { LOG, RELEASE } from '../../utils/constants';

/**
 * Collaborators for each pipeline step
 */
export interface MigrationDeps {
    extractFileId: (url: string) => string | null;
    resolveFileName: (fileId: string) => Promise<string>;
    download: (fileId: string, outputPath: string) => Promise<boolean>;
    createRelease: (baseName: string) => Promise<ReleaseResult>;
    uploadAsset: (releaseId: number, filePath: string) => Promise<string | null>;
    cleanup: (filePath: string) => boolean;
}

export interface MigrationOptions {
    listFile: string;
    tempDir: string;
}

export interface MigrationSummary {
    /** Non-blank entries read from the list */
    total: number;
    passedThrough: number;
    migrated: number;
    dropped: number;
    /** Exactly what was written back to the list */
    links: string[];
}

export const defaultMigrationDeps: MigrationDeps = {
    extractFileId: extractDriveFileId,
    resolveFileName: resolveDriveFileName,
    download: (fileId, outputPath) => downloadDriveFile(fileId, outputPath),
    createRelease: baseName => createUniqueRelease(baseName),
    uploadAsset: (releaseId, filePath) => uploadReleaseAsset(releaseId, filePath),
    cleanup: cleanupTempFile
};

class MigrationService {
    private deps: MigrationDeps;

    constructor(deps: MigrationDeps = defaultMigrationDeps) {
        this.deps = deps;
    }

    /**
     * Process the whole list and overwrite it with the surviving URLs
     * @throws {SourceListError} If the list cannot be read (before any processing)
     */
    async run(options: MigrationOptions): Promise<MigrationSummary> {
        const lines = readSourceList(options.listFile);
        ensureTempDir(options.tempDir);

        const summary: MigrationSummary = { total: 0, passedThrough: 0, migrated: 0, dropped: 0, links: [] };

        for (const [index, rawLine] of lines.entries()) {
            const line = rawLine.trim();
            const position = `[${index + 1}/${lines.length}]`;
            const kind = classifySourceLine(line);

            if (kind === 'blank') {
                continue;
            }
            summary.total++;

            if (kind === 'github') {
                logger.info(`${position} Already GitHub link - keeping it`);
                summary.links.push(line);
                summary.passedThrough++;
                continue;
            }

            if (kind === 'unsupported') {
                logger.info(`${position} Not a Drive URL - skipping`);
                summary.dropped++;
                continue;
            }

            logger.info(`${position} Processing Drive URL...`);
            logger.info(`URL: ${truncateForLog(line, LOG.URL_PREVIEW_LENGTH)}`);

            const githubUrl = await this.migrateDriveLine(line, options.tempDir);
            if (githubUrl) {
                summary.links.push(githubUrl);
                summary.migrated++;
                logger.info('✅ Successfully processed!');
            } else {
                summary.dropped++;
            }
            logger.info(LOG.SEPARATOR);
        }

        writeSourceList(options.listFile, summary.links);

        logger.info(LOG.BANNER);
        logger.info(`✅ ${path.basename(options.listFile)} updated - contains ${summary.links.length} GitHub links`, {
            migrated: summary.migrated,
            passedThrough: summary.passedThrough,
            dropped: summary.dropped
        });
        logger.info(LOG.BANNER);

        return summary;
    }

    /**
     * Run one Drive link through download, release and upload
     * @returns The new asset URL, or null if any step failed
     */
    async migrateDriveLine(url: string, tempDir: string): Promise<string | null> {
        const fileId = this.deps.extractFileId(url);
        if (!fileId) {
            logger.warn('❌ Could not extract file ID - skipping');
            return null;
        }

        let tempPath: string | null = null;
        try {
            const displayName = await this.deps.resolveFileName(fileId);
            const { safeBase, fileName } = buildArtifactName(displayName, fileId);
            tempPath = createTempFilePath(fileName, tempDir);

            if (!(await this.deps.download(fileId, tempPath))) {
                logger.warn('❌ Download failed - skipping this video');
                return null;
            }

            const result = await this.deps.createRelease(`${RELEASE.TAG_PREFIX}${safeBase}`);
            if (!result.success) {
                logger.warn('❌ Failed to create release');
                return null;
            }

            const githubUrl = await this.deps.uploadAsset(result.release.id, tempPath);
            if (!githubUrl) {
                logger.warn('❌ Upload failed - video not added');
                return null;
            }

            return githubUrl;
        } catch (error) {
            logger.error(`❌ Error processing video: ${extractErrorMessage(error)}`, { fileId });
            return null;
        } finally {
            if (tempPath) {
                this.deps.cleanup(tempPath);
            }
        }
    }
}

export default MigrationService;
