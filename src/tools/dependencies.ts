/**
 * Startup check that every required external tool can be run.
 */

import type { CommandRunner } from '../types/executor.js';
import type { ToolPaths } from '../config.js';
import type { Logger } from '../observability/index.js';
import { ToolMissingError, err, ok } from '../errors/index.js';
import type { Result } from '../errors/index.js';

interface ToolProbe {
  name: string;
  binary: string;
  versionArgs: string[];
}

function toolProbes(tools: ToolPaths): ToolProbe[] {
  return [
    { name: 'ffprobe', binary: tools.ffprobe, versionArgs: ['-version'] },
    { name: 'HandBrakeCLI', binary: tools.handbrake, versionArgs: ['--version'] },
    { name: 'rsync', binary: tools.rsync, versionArgs: ['--version'] },
  ];
}

/**
 * A tool counts as present when it can be spawned at all; its exit code
 * is not consulted
 */
async function isRunnable(runner: CommandRunner, probe: ToolProbe): Promise<boolean> {
  try {
    await runner.run(probe.binary, probe.versionArgs);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check ffprobe, HandBrakeCLI and rsync once, before any file is processed
 */
export async function verifyDependencies(
  runner: CommandRunner,
  tools: ToolPaths,
  logger: Logger
): Promise<Result<void, ToolMissingError>> {
  const missing: string[] = [];
  for (const probe of toolProbes(tools)) {
    if (!(await isRunnable(runner, probe))) {
      missing.push(probe.binary);
    }
  }

  if (missing.length > 0) {
    logger.error(`Missing required tools: ${missing.join(', ')}`);
    logger.error('Ensure they are installed and available in PATH.');
    return err(new ToolMissingError(missing));
  }

  logger.info(`All required CLI tools found: ${toolProbes(tools).map((p) => p.binary).join(', ')}`);
  return ok(undefined);
}
