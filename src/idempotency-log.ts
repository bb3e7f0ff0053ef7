/**
 * Idempotency log: the durable record of files already handled.
 *
 * A UTF-8 text file, one absolute path per line, only ever appended to.
 * Readers treat it as a set; writers do not deduplicate. A path's presence
 * means it needs no further inspection, not that its current content still
 * meets the policy.
 */

import { promises as fs } from 'fs';
import * as path from 'path';

export class IdempotencyLog {
  private readonly entries: Set<string>;

  private constructor(
    readonly filePath: string,
    entries: Iterable<string>
  ) {
    this.entries = new Set(entries);
  }

  /**
   * Load the log; a missing file is an empty log
   */
  static async open(filePath: string): Promise<IdempotencyLog> {
    let content = '';
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
    return new IdempotencyLog(filePath, parseEntries(content));
  }

  get size(): number {
    return this.entries.size;
  }

  has(filePath: string): boolean {
    return this.entries.has(filePath);
  }

  /**
   * Append one path and flush it to disk before resolving
   */
  async append(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const handle = await fs.open(this.filePath, 'a');
    try {
      await handle.appendFile(`${filePath}\n`, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    this.entries.add(filePath);
  }
}

export function parseEntries(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
