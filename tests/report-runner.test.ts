import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { computeBucketStats, formatProcessUsage, parseProcessArgs, renderBucketReport } from '../src/report-runner.js';
import { writeListing } from './helpers/listing.js';
import { withTempDir } from './helpers/temp-dir.js';

describe('parseProcessArgs', () => {
  it('defaults to output.json without humanizing', () => {
    expect(parseProcessArgs(['node', 'process-bucket-contents'])).toEqual({
      file: 'output.json',
      humanize: false,
      help: false,
    });
  });

  it('reads the file and humanize flag in any order', () => {
    expect(parseProcessArgs(['node', 'process-bucket-contents', '--humanize', 'foo.json'])).toEqual({
      file: 'foo.json',
      humanize: true,
      help: false,
    });
  });

  it('recognizes help', () => {
    expect(parseProcessArgs(['node', 'process-bucket-contents', '-h']).help).toBe(true);
  });

  it('rejects unknown options instead of reading them as the file', () => {
    expect(parseProcessArgs(['node', 'process-bucket-contents', '--humanise', 'foo.json'])).toEqual({
      file: 'foo.json',
      humanize: false,
      help: false,
      error: 'Unknown option: --humanise',
    });
  });

  it('rejects a second file', () => {
    expect(parseProcessArgs(['node', 'process-bucket-contents', 'foo.json', 'bar.json'])).toEqual({
      file: 'foo.json',
      humanize: false,
      help: false,
      error: 'Unexpected argument: bar.json',
    });
  });
});

describe('formatProcessUsage', () => {
  it('documents the humanize flag', () => {
    expect(formatProcessUsage('process-bucket-contents')).toContain('  --humanize   Humanize output');
  });
});

describe('renderBucketReport', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('names the bucket after the listing file', async () => {
    await withTempDir('report-runner-', async (dir) => {
      const file = await writeListing(dir, 'my-bucket.json');

      const report = JSON.parse(await renderBucketReport(file, false));

      expect(report.bucket).toBe('my-bucket');
      expect(report.present.total_size).toBe(450);
      expect(report.deleted.num_files).toBe(2);
    });
  });

  it('renders the humanized table', async () => {
    await withTempDir('report-runner-', async (dir) => {
      const file = await writeListing(dir, 'my-bucket.json');

      const report = await renderBucketReport(file, true);

      expect(report.split('\n')[1]).toBe('   Present:            num_files: 2');
    });
  });

  it('logs what it loaded', async () => {
    await withTempDir('report-runner-', async (dir) => {
      const file = await writeListing(dir, 'my-bucket.json');

      await computeBucketStats(file);

      expect(console.error).toHaveBeenCalledWith(
        `[Process] Loaded 5 versions and 3 delete markers from ${file}`
      );
    });
  });

  it('reports an empty bucket', async () => {
    await withTempDir('report-runner-', async (dir) => {
      const file = await writeListing(dir, 'empty-bucket.json', {});

      const stats = await computeBucketStats(file);

      expect(stats.present.numFiles).toBe(0);
      expect(stats.deleted.averageSize).toBe(0);
    });
  });
});
