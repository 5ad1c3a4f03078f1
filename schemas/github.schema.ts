import { z } from 'zod';

/**
 * Schema for a GitHub release (only the fields the migrator reads)
 */
export const githubReleaseSchema = z.object({
  id: z.number().int(),
  tag_name: z.string().min(1, "Release tag is required"),
  name: z.string().nullable().optional(),
  html_url: z.string().optional(),
  upload_url: z.string().optional()
}).passthrough();

export const githubReleaseListSchema = z.array(githubReleaseSchema);

/**
 * Schema for an uploaded release asset
 */
export const githubAssetSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  size: z.number().optional(),
  browser_download_url: z.string().url()
}).passthrough();

export type GitHubRelease = z.infer<typeof githubReleaseSchema>;
export type GitHubAsset = z.infer<typeof githubAssetSchema>;
