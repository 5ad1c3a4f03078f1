/**
 * Temporary File Utilities
 *
 * Downloaded artifacts live here between the Drive download and the
 * GitHub upload. One slot is used per source line and removed afterwards.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { FILE_SIZE } from './constants';
import logger from './logger';

/**
 * Get the temporary directory path
 */
export function getTempDir(): string {
  return config.paths.tmp;
}

/**
 * Ensure the temporary directory exists
 * @returns Path to the temporary directory
 */
export function ensureTempDir(tempDir: string = getTempDir()): string {
  if (!fs.existsSync(tempDir)) {
    fs.mkdirSync(tempDir, { recursive: true });
    logger.info(`📁 Created temp directory: ${tempDir}`);
  }
  return tempDir;
}

/**
 * Create a full path for a temporary file
 * @param filename - The filename (with extension)
 * @param tempDir - Directory override, defaults to the configured one
 */
export function createTempFilePath(filename: string, tempDir: string = getTempDir()): string {
  ensureTempDir(tempDir);
  return path.join(tempDir, filename);
}

/**
 * Clean up a temporary file
 * @returns True if deleted, false otherwise
 */
export function cleanupTempFile(filePath: string): boolean {
  try {
    if (filePath && fs.existsSync(filePath)) {
      fs.unlinkSync(filePath);
      logger.debug(`🧹 Cleaned up temporary file: ${path.basename(filePath)}`);
      return true;
    }
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.warn(`⚠️ Failed to cleanup file ${filePath}: ${errorMessage}`);
  }
  return false;
}

/**
 * Size of a file in megabytes, for log lines
 */
export function formatMegabytes(bytes: number, digits: number = 2): string {
  return (bytes / FILE_SIZE.MB).toFixed(digits);
}
