/**
 * Media enumeration: recursive walk yielding files with a recognized
 * video extension. Entries are visited in sorted order; symlinked
 * directories are not followed.
 */

import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import * as path from 'path';
import type { Logger } from './observability/index.js';
import { NoopLogger } from './observability/index.js';
import { toError } from './errors/index.js';

export function hasVideoExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext.length > 0 && extensions.includes(ext);
}

/**
 * Keep the directories that exist, warning about the rest
 */
export async function existingDirectories(
  directories: readonly string[],
  logger: Logger
): Promise<string[]> {
  const found: string[] = [];
  for (const dir of directories) {
    const stat = await fs.stat(dir).catch(() => undefined);
    if (!stat?.isDirectory()) {
      logger.warn(`Media directory not found, skipping: ${dir}`);
      continue;
    }
    found.push(dir);
  }
  return found;
}

async function* walk(dir: string, logger: Logger): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot read directory ${dir}: ${toError(error).message}`);
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(fullPath, logger);
    } else if (entry.isFile()) {
      yield fullPath;
    } else if (entry.isSymbolicLink() && (await isLinkToFile(fullPath, logger))) {
      yield fullPath;
    }
  }
}

/**
 * Symlinked files are yielded; symlinked directories are not descended into
 */
async function isLinkToFile(linkPath: string, logger: Logger): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (error) {
    logger.warn(`Cannot resolve link ${linkPath}: ${toError(error).message}`);
    return false;
  }
}

/**
 * Yield every media file under the given directories. Unreadable
 * directories are logged and skipped.
 */
export async function* scanMediaFiles(
  directories: readonly string[],
  extensions: readonly string[],
  logger: Logger = new NoopLogger()
): AsyncGenerator<string> {
  const normalized = extensions.map((ext) => ext.toLowerCase());
  for (const dir of directories) {
    for await (const filePath of walk(dir, logger)) {
      if (hasVideoExtension(filePath, normalized)) {
        yield filePath;
      }
    }
  }
}
