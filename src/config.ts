/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

import type { AppConfig } from './types.js';

export const config: AppConfig = {
  // Cache file is <bucket><cacheExtension> in the working directory
  cacheExtension: '.json',

  // Listing file used when the fetch/process programs get no file argument
  defaultListingFile: 'output.json',

  // Temp files for in-flight listings are created beside the output
  tempPrefix: 'tmp-output',

  // SIGTERM → SIGKILL escalation
  killGracePeriodMs: 2_000,

  // Humanized report columns ("%10s: %20s: %s")
  reportLineWidths: {
    status: 10,
    field: 20,
  },

  // Sibling programs run by the driver (basename, no extension)
  scripts: {
    fetch: 'get-bucket-contents',
    process: 'process-bucket-contents',
  },
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.reportLineWidths);
Object.freeze(config.scripts);
