/**
 * Centralized Path Management
 *
 * Single source of truth for all paths in the application.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { config } from './config.js';

// Get the directory containing this file (src/ under tsx, dist/ once built)
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/ and dist/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * Directory holding the toolkit's programs
 */
export const SRC_DIR = __dirname;

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');

/**
 * Cache file name for a bucket, relative to the working directory
 */
export function getCacheFileName(bucket: string): string {
  return `${bucket}${config.cacheExtension}`;
}

/**
 * Absolute cache file path for a bucket
 */
export function getCachePath(bucket: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, getCacheFileName(bucket));
}

/**
 * Bucket name as shown in reports: the listing file name without directory or extension
 */
export function getBucketLabel(listingFile: string): string {
  return path.basename(listingFile, path.extname(listingFile));
}
