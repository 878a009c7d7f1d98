/**
 * AWS CLI Runner
 *
 * Executes the AWS CLI as a subprocess. The bucket listing is written straight
 * to a file descriptor; it can be far too large to buffer in memory.
 */

import { env } from '../env.js';
import type { AwsCliOptions, AwsCliResult } from '../types.js';
import { formatCommandLine, runProcess } from './process-runner.js';

export function buildListVersionsArgs(bucket: string): string[] {
  return ['s3api', 'list-object-versions', '--bucket', bucket];
}

/**
 * Run `aws s3api list-object-versions` with stdout going to `outputFd`.
 * stderr stays on the terminal so AWS credential errors remain visible.
 */
export async function listObjectVersions(
  bucket: string,
  outputFd: number,
  options: AwsCliOptions = {}
): Promise<AwsCliResult> {
  const {
    command = env.AWS_CLI,
    prefixArgs = [],
    timeout = env.FETCH_TIMEOUT_MS,
    cwd,
    env: childEnv = process.env,
  } = options;

  const subcommandArgs = buildListVersionsArgs(bucket);
  const result = await runProcess(command, [...prefixArgs, ...subcommandArgs], {
    stdio: ['ignore', outputFd, 'inherit'],
    timeout,
    cwd,
    env: childEnv,
  });

  return {
    ...result,
    // Logged without prefixArgs: those only exist to wrap the CLI
    commandLine: formatCommandLine(command, subcommandArgs),
  };
}
