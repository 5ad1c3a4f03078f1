/**
 * GitHub REST API plumbing shared by the release and asset operations
 */

import { config } from '../../config';

/**
 * Target repository and credential for one run
 */
export interface GitHubTarget {
  /** owner/repository */
  repoName: string;
  token: string;
}

export function getDefaultTarget(): GitHubTarget {
  return {
    repoName: config.github.repoName,
    token: config.github.token
  };
}

export function buildGitHubHeaders(token: string, extra: Record<string, string> = {}): Record<string, string> {
  return {
    Authorization: `token ${token}`,
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': config.github.apiVersion,
    'User-Agent': config.github.userAgent,
    ...extra
  };
}

export function releasesUrl(repoName: string): string {
  return `${config.github.apiBaseUrl}/repos/${repoName}/releases`;
}

export function assetUploadUrl(repoName: string, releaseId: number): string {
  return `${config.github.uploadBaseUrl}/repos/${repoName}/releases/${releaseId}/assets`;
}
