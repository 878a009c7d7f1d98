import { config } from './config.js';
import { summarizeListing } from './bucket-stats.js';
import { loadListing } from './listing.js';
import { getBucketLabel } from './paths.js';
import { formatHumanReport, formatJsonReport } from './report.js';
import type { ProcessArgs, UsageStats } from './types.js';

export function formatProcessUsage(program: string): string {
  return [
    `Usage: ${program} [file] [--humanize]`,
    '',
    'Get stats from files in an S3 bucket.',
    '',
    'Arguments:',
    `  file         JSON file to load (default: ${config.defaultListingFile})`,
    '  --humanize   Humanize output',
  ].join('\n');
}

export function parseProcessArgs(argv: string[]): ProcessArgs {
  const options: ProcessArgs = { file: config.defaultListingFile, humanize: false, help: false };
  let fileGiven = false;

  for (const arg of argv.slice(2)) {
    if (arg === '--humanize') {
      options.humanize = true;
    } else if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg.startsWith('-')) {
      options.error ??= `Unknown option: ${arg}`;
    } else if (fileGiven) {
      options.error ??= `Unexpected argument: ${arg}`;
    } else {
      options.file = arg;
      fileGiven = true;
    }
  }

  return options;
}

export async function computeBucketStats(file: string): Promise<UsageStats> {
  const listing = await loadListing(file);
  console.error(
    `[Process] Loaded ${listing.Versions.length} versions and ${listing.DeleteMarkers.length} delete markers from ${file}`
  );
  return summarizeListing(listing);
}

/**
 * Render the usage report for a listing file
 */
export async function renderBucketReport(file: string, humanize: boolean): Promise<string> {
  const stats = await computeBucketStats(file);
  return humanize ? formatHumanReport(stats) : formatJsonReport(stats, getBucketLabel(file));
}
