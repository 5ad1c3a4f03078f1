/**
 * Google Drive Service - Main Entry Point
 *
 * Identifier extraction, best-effort naming and large-file download for
 * files shared by link.
 */

export * from './driveUrl';
export * from './driveMetadata';
export * from './driveByteSource';
export * from './driveDownload';
