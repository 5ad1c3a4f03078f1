/**
 * GitHub release operations
 */

import axios from 'axios';
import { parse as parseUuid, v4 as uuidv4 } from 'uuid';
import { buildGitHubHeaders, getDefaultTarget, GitHubTarget, releasesUrl } from './githubClient';
import { GitHubRelease, githubReleaseListSchema, githubReleaseSchema } from '../../schemas/github.schema';
import { config } from '../../config';
import logger from '../../utils/logger';
import { describeResponseBody, extractErrorMessage } from '../../utils/errorHandler';
import { formatLocalTimestamp, toUnixSeconds } from '../../utils/dateUtils';
import { RELEASE } from '../../utils/constants';

export type ReleaseResult =
  | { success: true; release: GitHubRelease }
  | { success: false; error: string };

/**
 * Sources of randomness and time for tag generation
 */
export interface TagGenerationDeps {
  randomSuffix: () => string;
  now: () => number;
}

/**
 * Random lowercase alphanumeric suffix
 */
export function generateRandomSuffix(length: number = RELEASE.SUFFIX_LENGTH): string {
  const alphabet = RELEASE.SUFFIX_ALPHABET;
  let suffix = '';
  while (suffix.length < length) {
    for (const byte of parseUuid(uuidv4())) {
      if (suffix.length === length) {
        break;
      }
      suffix += alphabet[byte % alphabet.length];
    }
  }
  return suffix;
}

const defaultTagDeps: TagGenerationDeps = {
  randomSuffix: () => generateRandomSuffix(),
  now: () => Date.now()
};

/**
 * List every release of the repository.
 * Any failure yields an empty list; the caller treats that as "no tags taken".
 */
export async function listReleases(target: GitHubTarget = getDefaultTarget()): Promise<GitHubRelease[]> {
  const perPage = config.github.releasesPerPage;
  const releases: GitHubRelease[] = [];

  try {
    for (let page = 1; ; page++) {
      const response = await axios.get<unknown>(releasesUrl(target.repoName), {
        headers: buildGitHubHeaders(target.token),
        params: { per_page: perPage, page },
        validateStatus: () => true
      });

      if (response.status !== 200) {
        logger.debug(`[GitHub] Listing releases returned HTTP ${response.status}`);
        return [];
      }

      const parsed = githubReleaseListSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.debug('[GitHub] Unexpected release list payload', { issues: parsed.error.issues.length });
        return [];
      }

      releases.push(...parsed.data);
      if (parsed.data.length < perPage) {
        return releases;
      }
    }
  } catch (error) {
    logger.debug(`[GitHub] Listing releases failed: ${extractErrorMessage(error)}`);
    return [];
  }
}

/**
 * Pick a tag not present in existingTags.
 * On collision a random suffix is tried; once the attempt counter passes
 * RELEASE.MAX_TAG_ATTEMPTS the Unix timestamp is used instead.
 */
export function generateUniqueTag(
  baseName: string,
  existingTags: ReadonlySet<string>,
  deps: TagGenerationDeps = defaultTagDeps
): string {
  let tagName = baseName;
  let counter = 1;

  while (existingTags.has(tagName)) {
    tagName = `${baseName}-${deps.randomSuffix()}`;
    counter++;

    if (counter > RELEASE.MAX_TAG_ATTEMPTS) {
      tagName = `${baseName}-${toUnixSeconds(deps.now())}`;
      break;
    }
  }

  return tagName;
}

/**
 * Create a published release whose tag does not clash with existing ones
 */
export async function createUniqueRelease(
  baseName: string,
  target: GitHubTarget = getDefaultTarget(),
  deps: TagGenerationDeps = defaultTagDeps
): Promise<ReleaseResult> {
  const existingReleases = await listReleases(target);
  const existingTags = new Set(existingReleases.map(release => release.tag_name));
  const tagName = generateUniqueTag(baseName, existingTags, deps);

  const payload = {
    tag_name: tagName,
    name: tagName,
    body: `${RELEASE.BODY_PREFIX} - ${formatLocalTimestamp(new Date(deps.now()))}`,
    draft: false,
    prerelease: false
  };

  try {
    const response = await axios.post<unknown>(releasesUrl(target.repoName), payload, {
      headers: buildGitHubHeaders(target.token),
      validateStatus: () => true
    });

    if (response.status !== 201) {
      const body = describeResponseBody(response.data);
      logger.error(`❌ Error creating release: ${response.status}`, { tagName });
      logger.error(body);
      return { success: false, error: `HTTP ${response.status}: ${body}` };
    }

    const parsed = githubReleaseSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.error('❌ Release created but the response could not be read', { tagName });
      return { success: false, error: 'Unexpected release payload' };
    }

    logger.info(`✅ Created release: ${tagName}`);
    return { success: true, release: parsed.data };
  } catch (error) {
    const message = extractErrorMessage(error);
    logger.error(`❌ Error creating release: ${message}`, { tagName });
    return { success: false, error: message };
  }
}
