import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { chmod, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { resolveTsxLoader } from '../src/integrations/script-runner.js';
import { SRC_DIR } from '../src/paths.js';
import { writeListing } from './helpers/listing.js';
import { withTempDir } from './helpers/temp-dir.js';

// Runs the real driver and both programs from source, against a stand-in AWS CLI
const RUN_TIMEOUT = 60_000;

// Stand-in AWS CLI: logs each call, then prints the listing or fails for the "broken" bucket
const FAKE_AWS = `#!/bin/sh
echo "$*" >> "$AWS_CALLS_FILE"
if [ "$4" = "broken" ]; then
  printf '{"Versions": ['
  exit 7
fi
cat "$LISTING_FILE"
`;

interface DriverRun {
  status: number | null;
  stdout: string;
  stderr: string;
}

function runDriver(cwd: string, bucket: string, env: NodeJS.ProcessEnv): Promise<DriverRun> {
  const entry = path.join(SRC_DIR, 'bucket-report.ts');
  const child = spawn(process.execPath, ['--import', resolveTsxLoader(), entry, bucket], {
    cwd,
    env: { ...process.env, ...env },
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let stdout = '';
  let stderr = '';
  child.stdout.setEncoding('utf-8').on('data', (chunk: string) => (stdout += chunk));
  child.stderr.setEncoding('utf-8').on('data', (chunk: string) => (stderr += chunk));

  return new Promise((resolve, reject) => {
    child.on('error', reject);
    child.on('close', (status) => resolve({ status, stdout, stderr }));
  });
}

async function setUp(dir: string) {
  const tools = path.join(dir, 'tools');
  const work = path.join(dir, 'work');
  await mkdir(tools);
  await mkdir(work);

  const aws = path.join(tools, 'aws');
  await writeFile(aws, FAKE_AWS);
  await chmod(aws, 0o755);

  const callsFile = path.join(tools, 'calls.log');
  const env = {
    AWS_CLI: aws,
    AWS_CALLS_FILE: callsFile,
    LISTING_FILE: await writeListing(tools, 'listing.json'),
    DEBUG: 'false',
  };

  const calls = async (): Promise<string[]> =>
    existsSync(callsFile) ? (await readFile(callsFile, 'utf-8')).trim().split('\n') : [];

  return { work, env, calls };
}

describe('bucket-report run from another directory', () => {
  it(
    'fetches once, caches the listing and prints the report',
    async () => {
      await withTempDir('bucket-report-run-', async (dir) => {
        const { work, env, calls } = await setUp(dir);

        const first = await runDriver(work, 'foo', env);

        expect(first.status).toBe(0);
        expect(await readdir(work)).toEqual(['foo.json']);
        expect(await calls()).toEqual(['s3api list-object-versions --bucket foo']);
        expect(first.stdout).toContain(`${'Present'.padStart(10)}: ${'num_files'.padStart(20)}: 2\n`);
        expect(first.stdout).toContain(`${'Present'.padStart(10)}: ${'pct_used_by_latest'.padStart(20)}: 77.78%\n`);

        const second = await runDriver(work, 'foo', env);

        expect(second.status).toBe(0);
        expect(second.stderr).toContain("# Output file 'foo.json' already exists, skipping!");
        expect(await calls()).toHaveLength(1);
        expect(second.stdout).toBe(first.stdout);
      });
    },
    RUN_TIMEOUT
  );

  it(
    'propagates a failed fetch and never processes',
    async () => {
      await withTempDir('bucket-report-run-', async (dir) => {
        const { work, env, calls } = await setUp(dir);

        const run = await runDriver(work, 'broken', env);

        expect(run.status).toBe(7);
        expect(run.stdout).toBe('');
        expect(run.stderr).toContain('[Driver] fetch step failed: Exit code 7');
        expect(await calls()).toEqual(['s3api list-object-versions --bucket broken']);
        expect(await readdir(work)).toEqual([]);
      });
    },
    RUN_TIMEOUT
  );
});
