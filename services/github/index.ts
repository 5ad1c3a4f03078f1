/**
 * GitHub Service - Main Entry Point
 *
 * Release creation with tag collision avoidance, and asset upload.
 */

export * from './githubClient';
export * from './releases';
export * from './assets';
