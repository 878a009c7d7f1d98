#!/usr/bin/env node
/**
 * Process Bucket Contents CLI
 *
 * Reads the JSON written by get-bucket-contents, combines versions with
 * delete markers and prints disk usage, especially for deleted files.
 */

import './env.js';

import { env } from './env.js';
import { formatProcessUsage, parseProcessArgs, renderBucketReport } from './report-runner.js';
import { toErrorMessage } from './utils/errors.js';

const PROGRAM = 'process-bucket-contents';

async function main(): Promise<void> {
  const args = parseProcessArgs(process.argv);

  if (args.help) {
    console.log(formatProcessUsage(PROGRAM));
    process.exit(0);
    return;
  }

  if (args.error) {
    console.error(`[Process] ! ${args.error}`);
    console.log(formatProcessUsage(PROGRAM));
    process.exit(1);
    return;
  }

  if (env.DEBUG) {
    console.error(`[Process] Args: file=${args.file} humanize=${args.humanize}`);
  }

  console.log(await renderBucketReport(args.file, args.humanize));
  process.exit(0);
}

main().catch((error) => {
  console.error(`Failed to process bucket contents: ${toErrorMessage(error)}`);
  process.exit(1);
});
