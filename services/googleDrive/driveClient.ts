import { google } from 'googleapis';
import { config } from '../../config';

/**
 * Google Drive client for public metadata lookups
 *
 * No service account or OAuth here: the files being migrated are shared by
 * link, so the client is anonymous unless GOOGLE_DRIVE_API_KEY is set.
 */
export function getPublicDriveClient() {
  const apiKey = config.drive.apiKey;
  return apiKey
    ? google.drive({ version: 'v3', auth: apiKey })
    : google.drive({ version: 'v3' });
}
