/**
 * Centralized Configuration File
 *
 * Single Source of Truth for the migrator's configuration.
 * Environment values come from ./env, endpoints and limits live here.
 */

import path from 'path';
import env from './env';
import logger from '../utils/logger';

const REPO_NAME_PATTERN = /^[^/\s]+\/[^/\s]+$/;

/**
 * Configuration object
 */
export const config = {
  // Environment
  env: env.env,

  // GitHub target repository
  github: {
    token: env.github.token,
    repoName: env.github.repoName,
    apiBaseUrl: 'https://api.github.com',
    uploadBaseUrl: 'https://uploads.github.com',
    apiVersion: '2022-11-28',
    userAgent: 'drive-release-migrator',
    releasesPerPage: 100,
  },

  // Google Drive endpoints (unauthenticated)
  drive: {
    // Optional; without it the metadata lookup is anonymous and usually refused
    apiKey: env.googleDriveApiKey || null,
    downloadUrl: 'https://drive.google.com/uc',
  },

  // Paths
  paths: {
    driveFile: path.resolve(process.cwd(), env.driveFile),
    tmp: path.resolve(process.cwd(), env.tempDir),
  },

  // Timeout Configuration
  timeouts: {
    upload: env.uploadTimeoutMs, // 10 minutes by default
  },
};

export type AppConfig = typeof config;

/**
 * Warn about credentials the run will need.
 * Missing values are not fatal: they surface later as GitHub auth failures.
 */
export function validateConfig(current: AppConfig = config): string[] {
  const warnings: string[] = [];

  if (!current.github.token) {
    warnings.push('GITHUB_TOKEN is not set (release creation will fail)');
  }
  if (!current.github.repoName) {
    warnings.push('REPO_NAME is not set (expected owner/repository)');
  } else if (!REPO_NAME_PATTERN.test(current.github.repoName)) {
    warnings.push(`REPO_NAME "${current.github.repoName}" is not in owner/repository form`);
  }

  warnings.forEach(warning => {
    logger.warn(`⚠️ ${warning}`, { service: 'drive-release-migrator' });
  });

  return warnings;
}
