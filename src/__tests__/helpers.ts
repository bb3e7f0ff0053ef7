/**
 * Shared fixtures for the test suite.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InMemoryEventSink, InMemoryLogger, createContext } from '../index.js';
import type { ExecutionContext } from '../index.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'watchdog-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export interface TestContext {
  ctx: ExecutionContext;
  logger: InMemoryLogger;
  events: InMemoryEventSink;
}

export function testContext(): TestContext {
  const logger = new InMemoryLogger();
  const events = new InMemoryEventSink();
  const ctx = createContext({ logger, events, runId: 'test-run' });
  return { ctx, logger, events };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
