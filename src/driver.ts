import { existsSync } from 'fs';
import { config } from './config.js';
import { runScript, type ScriptRunner } from './integrations/script-runner.js';
import { toExitStatus } from './integrations/process-runner.js';
import { getCacheFileName, getCachePath } from './paths.js';
import type { DriverArgs } from './types.js';

export interface BucketReportOptions {
  bucket: string;
  humanize?: boolean;
}

export interface BucketReportDeps {
  runScript?: ScriptRunner;
  cwd?: string;
}

export interface BucketReportResult {
  success: boolean;
  exitCode: number;
  fetched: boolean;
  failedStep?: 'fetch' | 'process';
  errorMessage?: string;
}

const HELP_FLAGS = new Set(['-h', '--help']);

export function formatUsage(program: string): string {
  return ['! ', `! Syntax: ${program} bucket`, '! '].join('\n');
}

/**
 * Parse driver arguments (full process.argv).
 * A help flag anywhere wins; otherwise the last non-flag argument is the bucket.
 */
export function parseDriverArgs(argv: string[]): DriverArgs {
  const args = argv.slice(2);

  if (args.some((arg) => HELP_FLAGS.has(arg))) {
    return { kind: 'usage' };
  }

  let bucket: string | null = null;
  let humanize = true;

  for (const arg of args) {
    if (arg === '--raw') {
      humanize = false;
      continue;
    }
    if (arg.startsWith('-')) {
      return { kind: 'usage', error: `Unknown option: ${arg}` };
    }
    if (arg.trim()) {
      bucket = arg;
    }
  }

  if (!bucket) {
    return { kind: 'usage' };
  }

  return { kind: 'run', bucket, humanize };
}

/**
 * Fetch the bucket listing unless it is already cached, then report on it.
 * The first failing step ends the run.
 */
export async function runBucketReport(
  options: BucketReportOptions,
  deps: BucketReportDeps = {}
): Promise<BucketReportResult> {
  const { bucket, humanize = true } = options;
  const run = deps.runScript ?? runScript;
  const output = getCacheFileName(bucket);
  let fetched = false;

  if (existsSync(getCachePath(bucket, deps.cwd))) {
    console.error('# ');
    console.error(`# Output file '${output}' already exists, skipping!`);
    console.error('# ');
  } else {
    const fetchResult = await run(config.scripts.fetch, [bucket, output]);
    if (!fetchResult.ok) {
      return {
        success: false,
        exitCode: toExitStatus(fetchResult),
        fetched: false,
        failedStep: 'fetch',
        errorMessage: fetchResult.errorMessage,
      };
    }
    fetched = true;
  }

  const processArgs = humanize ? [output, '--humanize'] : [output];
  const processResult = await run(config.scripts.process, processArgs);
  if (!processResult.ok) {
    return {
      success: false,
      exitCode: toExitStatus(processResult),
      fetched,
      failedStep: 'process',
      errorMessage: processResult.errorMessage,
    };
  }

  return { success: true, exitCode: 0, fetched };
}
