/**
 * Toolkit Script Runner
 *
 * Runs one of the toolkit's own programs (the fetch or process step) as a
 * subprocess with inherited stdio.
 */

import { existsSync } from 'fs';
import { createRequire } from 'module';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { SRC_DIR } from '../paths.js';
import type { ScriptResult } from '../types.js';
import { runProcess } from './process-runner.js';

const projectRequire = createRequire(import.meta.url);

export type ScriptRunner = (script: string, args: string[]) => Promise<ScriptResult>;

/**
 * URL of the tsx loader installed with this toolkit.
 * Resolved here so that a run from any working directory finds it.
 */
export function resolveTsxLoader(): string {
  return pathToFileURL(projectRequire.resolve('tsx')).href;
}

/**
 * Determine how to run a sibling program.
 * Prefers the compiled file, otherwise loads the source through tsx.
 */
export function getScriptCommand(script: string, dir: string = SRC_DIR): { command: string; args: string[] } {
  const compiled = join(dir, `${script}.js`);
  const source = join(dir, `${script}.ts`);

  if (existsSync(compiled)) {
    return { command: process.execPath, args: [compiled] };
  }
  if (existsSync(source)) {
    return { command: process.execPath, args: ['--import', resolveTsxLoader(), source] };
  }

  throw new Error(`Program '${script}' not found in ${dir}`);
}

/**
 * Run a toolkit program to completion
 */
export const runScript: ScriptRunner = async (script, args) => {
  const { command, args: baseArgs } = getScriptCommand(script);
  return runProcess(command, [...baseArgs, ...args], { stdio: 'inherit' });
};
