/**
 * Environment Configuration
 *
 * Loads environment variables from .env file.
 * Must be imported before any other modules that need env vars.
 */

import dotenv from 'dotenv';
import { ENV_FILE } from './paths.js';

// Load .env file
dotenv.config({ path: ENV_FILE });

const DEFAULT_FETCH_TIMEOUT = 30 * 60 * 1000;

// Export typed environment access
export const env = {
  get AWS_CLI(): string {
    return process.env.AWS_CLI?.trim() || 'aws';
  },
  get FETCH_TIMEOUT_MS(): number {
    const raw = Number.parseInt(process.env.FETCH_TIMEOUT_MS ?? '', 10);
    return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_FETCH_TIMEOUT;
  },
  get DEBUG(): boolean {
    return process.env.DEBUG === 'true' || process.env.DEBUG === '1';
  },
};
