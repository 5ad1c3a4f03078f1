/**
 * GitHub release asset upload
 */

import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { assetUploadUrl, buildGitHubHeaders, getDefaultTarget, GitHubTarget } from './githubClient';
import { githubAssetSchema } from '../../schemas/github.schema';
import { config } from '../../config';
import logger from '../../utils/logger';
import { describeResponseBody, extractErrorMessage } from '../../utils/errorHandler';
import { formatMegabytes } from '../../utils/tempFileUtils';

/**
 * Stream a local file to a release as a binary asset.
 * @returns The asset's public download URL, or null on any failure
 */
export async function uploadReleaseAsset(
  releaseId: number,
  filePath: string,
  target: GitHubTarget = getDefaultTarget()
): Promise<string | null> {
  const fileName = path.basename(filePath);

  try {
    const { size } = fs.statSync(filePath);
    logger.info(`📤 Uploading: ${fileName} (${formatMegabytes(size)} MB)`);

    const response = await axios.post<unknown>(
      assetUploadUrl(target.repoName, releaseId),
      fs.createReadStream(filePath),
      {
        params: { name: fileName },
        headers: buildGitHubHeaders(target.token, {
          'Content-Type': 'application/octet-stream',
          'Content-Length': String(size)
        }),
        timeout: config.timeouts.upload,
        // follow-redirects buffers the body to replay it; the plain transport streams
        maxRedirects: 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true
      }
    );

    if (response.status !== 201) {
      logger.error(`❌ Upload failed: ${response.status}`, { fileName });
      logger.error(describeResponseBody(response.data));
      return null;
    }

    const parsed = githubAssetSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.error('❌ Upload succeeded but the asset URL is missing', { fileName });
      return null;
    }

    logger.info('✅ Upload successful!');
    logger.info(`🔗 Download URL: ${parsed.data.browser_download_url}`);
    return parsed.data.browser_download_url;
  } catch (error) {
    logger.error(`❌ Error uploading: ${extractErrorMessage(error)}`, { fileName });
    return null;
  }
}
