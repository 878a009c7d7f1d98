import path from 'path';
import { config } from './config.js';
import { listObjectVersions } from './integrations/aws-cli.js';
import type { AwsCliOptions, AwsCliResult, FetchArgs } from './types.js';
import { createTempFile } from './utils/temp-file.js';

export interface FetchOptions extends AwsCliOptions {
  /** Directory that receives the temp file. Default: the output file's directory */
  tempDir?: string;
}

export function formatFetchUsage(program: string): string {
  return [
    `Usage: ${program} <bucket> [file]`,
    '',
    'Extract all versions of files in an S3 bucket.',
    '',
    'Arguments:',
    '  bucket   Bucket to list',
    `  file     JSON file to write (default: ${config.defaultListingFile})`,
  ].join('\n');
}

export function parseFetchArgs(argv: string[]): FetchArgs {
  const options: FetchArgs = { bucket: null, file: config.defaultListingFile, help: false };
  const positional: string[] = [];

  for (const arg of argv.slice(2)) {
    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }
    if (arg.startsWith('-')) {
      options.error ??= `Unknown option: ${arg}`;
      continue;
    }
    positional.push(arg);
  }

  const [bucket, file, ...extra] = positional;
  if (bucket) {
    options.bucket = bucket;
  }
  if (file) {
    options.file = file;
  }
  if (extra.length > 0) {
    options.error ??= `Unexpected argument: ${extra[0]}`;
  }

  return options;
}

/**
 * List every version and delete marker of `bucket` into `file`.
 * The file only appears once the AWS CLI has exited successfully.
 */
export async function fetchBucketContents(
  bucket: string,
  file: string,
  options: FetchOptions = {}
): Promise<AwsCliResult> {
  const { tempDir, ...awsOptions } = options;
  const destination = path.resolve(options.cwd ?? process.cwd(), file);
  const tempFile = await createTempFile(tempDir ?? path.dirname(destination), config.tempPrefix);
  console.error(`[Fetch] Temp file '${tempFile.path}' created`);

  let result: AwsCliResult;
  try {
    result = await listObjectVersions(bucket, tempFile.fd, awsOptions);
  } catch (e) {
    await tempFile.discard();
    throw e;
  }

  if (!result.ok) {
    await tempFile.discard();
    return result;
  }

  console.error(`[Fetch] Renaming temp file '${tempFile.path}' to '${file}'...`);
  await tempFile.commit(destination);
  return result;
}
