#!/usr/bin/env node
/**
 * Bucket Report CLI
 *
 * Downloads a bucket's version listing (once, cached as <bucket>.json)
 * and reports on the space it uses.
 */

import './env.js';

import { formatUsage, parseDriverArgs, runBucketReport } from './driver.js';
import { env } from './env.js';
import { toErrorMessage } from './utils/errors.js';

const PROGRAM = 'bucket-report';

async function main(): Promise<void> {
  const args = parseDriverArgs(process.argv);

  if (args.kind === 'usage') {
    if (args.error) {
      console.error(args.error);
    }
    console.log(formatUsage(PROGRAM));
    process.exit(1);
    return;
  }

  if (env.DEBUG) {
    console.error(`[Driver] Bucket: ${args.bucket}, humanize: ${args.humanize}`);
  }

  const result = await runBucketReport({ bucket: args.bucket, humanize: args.humanize });
  if (!result.success) {
    console.error(`[Driver] ${result.failedStep} step failed: ${result.errorMessage}`);
  }
  process.exit(result.exitCode);
}

main().catch((error) => {
  console.error(`Failed to report on bucket: ${toErrorMessage(error)}`);
  process.exit(1);
});
