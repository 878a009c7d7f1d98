/**
 * Temp Files With Atomic Commit
 *
 * A temp file is created beside its destination and renamed over it once
 * complete, so readers never see a partially-written file under the final name.
 */

import { randomBytes } from 'crypto';
import { open, rename, unlink, type FileHandle } from 'fs/promises';
import path from 'path';
import { isFileExistsError, isNotFoundError } from './errors.js';

const MAX_NAME_ATTEMPTS = 5;

export interface TempFile {
  path: string;
  fd: number;
  /** Close and rename over `destination` */
  commit(destination: string): Promise<void>;
  /** Close and delete */
  discard(): Promise<void>;
}

async function openExclusive(dir: string, prefix: string): Promise<{ handle: FileHandle; tempPath: string }> {
  let lastError: unknown;

  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const tempPath = path.join(dir, `${prefix}${process.pid}.${randomBytes(4).toString('hex')}`);
    try {
      const handle = await open(tempPath, 'wx', 0o600);
      return { handle, tempPath };
    } catch (e) {
      if (!isFileExistsError(e)) throw e;
      lastError = e;
    }
  }

  throw lastError;
}

/**
 * Create an empty temp file in `dir` named `<prefix><pid>.<random>`.
 */
export async function createTempFile(dir: string, prefix: string): Promise<TempFile> {
  const { handle, tempPath } = await openExclusive(dir, prefix);
  let closed = false;

  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await handle.close();
  };

  return {
    path: tempPath,
    fd: handle.fd,
    async commit(destination: string): Promise<void> {
      await close();
      await rename(tempPath, destination);
    },
    async discard(): Promise<void> {
      await close();
      try {
        await unlink(tempPath);
      } catch (e) {
        if (!isNotFoundError(e)) throw e;
      }
    },
  };
}
