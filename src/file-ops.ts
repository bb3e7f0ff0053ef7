/**
 * Filesystem primitives used by the transcoder and the replacer.
 *
 * Kept behind an interface so tests can fail a single rename or delete at a
 * chosen step of the replace transaction.
 */

import { promises as fs } from 'fs';
import * as path from 'path';

export interface FileOperations {
  exists(filePath: string): Promise<boolean>;
  size(filePath: string): Promise<number>;
  rename(from: string, to: string): Promise<void>;
  remove(filePath: string): Promise<void>;
  ensureDir(dir: string): Promise<void>;
}

export const nodeFileOperations: FileOperations = {
  async exists(filePath) {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  },
  async size(filePath) {
    return (await fs.stat(filePath)).size;
  },
  rename(from, to) {
    return fs.rename(from, to);
  },
  remove(filePath) {
    return fs.unlink(filePath);
  },
  async ensureDir(dir) {
    await fs.mkdir(dir, { recursive: true });
  },
};

/**
 * Delete a file if it exists. Returns the error instead of throwing so
 * callers can log it next to the outcome they are already reporting.
 */
export async function removeIfExists(
  ops: FileOperations,
  filePath: string
): Promise<Error | undefined> {
  try {
    if (await ops.exists(filePath)) {
      await ops.remove(filePath);
    }
    return undefined;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * `<basename-without-extension>.av1.mkv` in the given directory
 */
export function candidatePathFor(sourcePath: string, dir: string): string {
  const { name } = path.parse(sourcePath);
  return path.join(dir, `${name}.av1.mkv`);
}
