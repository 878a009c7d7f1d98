/**
 * JSON File Reading
 *
 * Distinguishes "file not found" from "file corrupted" in the error message.
 */

import { readFile } from 'fs/promises';
import { isNotFoundError, toErrorMessage } from './errors.js';

/**
 * Read and parse a JSON file.
 *
 * @throws Error if the file is missing, empty or not valid JSON
 */
export async function readJsonFile(filepath: string): Promise<unknown> {
  let data: string;
  try {
    data = await readFile(filepath, 'utf-8');
  } catch (e) {
    if (isNotFoundError(e)) {
      throw new Error(`File not found: ${filepath}`);
    }
    throw e;
  }

  if (!data.trim()) {
    throw new Error(`Corrupted JSON file (empty): ${filepath}`);
  }

  try {
    return JSON.parse(data);
  } catch (parseError) {
    throw new Error(`Corrupted JSON file: ${filepath} - ${toErrorMessage(parseError)}`);
  }
}
