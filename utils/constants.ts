/**
 * Application-wide constants
 * SSOT for magic numbers used by the migration pipeline.
 */

/**
 * Byte size constants
 */
export const FILE_SIZE = {
  MB: 1024 * 1024,
  DOWNLOAD_CHUNK: 32 * 1024, // 32KB write chunks
} as const;

/**
 * Google Drive constants
 */
export const DRIVE = {
  ID_PREFIX_LENGTH: 8,
  DEFAULT_EXTENSION: '.mp4',
  WARNING_COOKIE_PREFIX: 'download_warning',
  PROGRESS_STEP_PERCENT: 10,
} as const;

/**
 * Release naming constants
 */
export const RELEASE = {
  TAG_PREFIX: 'video-',
  MAX_BASE_LENGTH: 50,
  SUFFIX_LENGTH: 6,
  SUFFIX_ALPHABET: 'abcdefghijklmnopqrstuvwxyz0123456789',
  MAX_TAG_ATTEMPTS: 10,
  BODY_PREFIX: 'Auto-uploaded video',
} as const;

/**
 * Source list markers
 */
export const HOSTS = {
  GITHUB: 'github.com',
  DRIVE: 'drive.google.com',
} as const;

/**
 * Log presentation
 */
export const LOG = {
  URL_PREVIEW_LENGTH: 60,
  SEPARATOR: '-'.repeat(80),
  BANNER: '='.repeat(80),
} as const;
