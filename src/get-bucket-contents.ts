#!/usr/bin/env node
/**
 * Get Bucket Contents CLI
 *
 * Writes the full version listing of an S3 bucket (including delete markers)
 * to a JSON file.
 */

import './env.js';

import { env } from './env.js';
import { fetchBucketContents, formatFetchUsage, parseFetchArgs } from './fetch-runner.js';
import { buildListVersionsArgs } from './integrations/aws-cli.js';
import { formatCommandLine, toExitStatus } from './integrations/process-runner.js';
import { toErrorMessage } from './utils/errors.js';

const PROGRAM = 'get-bucket-contents';

async function main(): Promise<void> {
  const args = parseFetchArgs(process.argv);

  if (args.help) {
    console.log(formatFetchUsage(PROGRAM));
    process.exit(0);
    return;
  }

  if (args.error || !args.bucket) {
    console.error(`[Fetch] ! ${args.error ?? 'Missing bucket'}`);
    console.log(formatFetchUsage(PROGRAM));
    process.exit(1);
    return;
  }

  if (env.DEBUG) {
    console.error(`[Fetch] Args: bucket=${args.bucket} file=${args.file}`);
  }

  console.error(`[Fetch] Executing command '${formatCommandLine(env.AWS_CLI, buildListVersionsArgs(args.bucket))}'`);
  console.error('[Fetch] Note that this may take a long time, perhaps a minute or more!');

  const result = await fetchBucketContents(args.bucket, args.file);

  if (!result.ok) {
    if (result.errorType === 'exit_error') {
      console.error(`[Fetch] ! Process '${result.commandLine}' exited with return code '${result.exitCode}'`);
    } else {
      console.error(`[Fetch] ! ${result.errorMessage}`);
    }
    process.exit(toExitStatus(result));
    return;
  }

  process.exit(0);
}

main().catch((error) => {
  console.error(`Failed to fetch bucket contents: ${toErrorMessage(error)}`);
  process.exit(1);
});
