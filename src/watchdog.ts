/**
 * Watchdog run: wires configuration to the real tools and drives one pass
 * over the configured media directories.
 */

import * as path from 'path';
import type { WatchdogConfig } from './config.js';
import type { ExecutionContext } from './context.js';
import type { CommandRunner } from './types/executor.js';
import type { RunSummary } from './types/pipeline.js';
import type { Encoder, MetadataProber, RemoteCopier } from './tools/index.js';
import {
  FfprobeProber,
  HandBrakeEncoder,
  RsyncCopier,
  verifyDependencies,
} from './tools/index.js';
import type { FileOperations } from './file-ops.js';
import { nodeFileOperations } from './file-ops.js';
import { ProcessRunner } from './process-executor.js';
import { IdempotencyLog } from './idempotency-log.js';
import { Inspector } from './inspector.js';
import { Transcoder } from './transcoder.js';
import { Verifier } from './verifier.js';
import { Replacer } from './replacer.js';
import { WatchdogPipeline } from './pipeline.js';
import { existingDirectories, scanMediaFiles } from './scanner.js';

/**
 * Exit status of a watchdog run
 */
export const EXIT_OK = 0;
export const EXIT_TOOL_MISSING = 1;
export const EXIT_INVALID_CONFIG = 2;

/**
 * Collaborators of a run. Anything left out is built from the
 * configuration on top of a ProcessRunner.
 */
export interface WatchdogDependencies {
  runner?: CommandRunner;
  prober?: MetadataProber;
  encoder?: Encoder;
  copier?: RemoteCopier;
  files?: FileOperations;
  /** Skip the startup tool check, for runs on injected tools */
  skipDependencyCheck?: boolean;
}

export interface WatchdogRun {
  exitCode: number;
  summary?: RunSummary;
}

export async function runWatchdog(
  config: WatchdogConfig,
  ctx: ExecutionContext,
  deps: WatchdogDependencies = {}
): Promise<WatchdogRun> {
  const { logger } = ctx;
  const runner = deps.runner ?? new ProcessRunner({ logger });

  if (!deps.skipDependencyCheck) {
    const checked = await verifyDependencies(runner, config.tools, logger);
    if (!checked.success) {
      return { exitCode: EXIT_TOOL_MISSING };
    }
  }

  const files = deps.files ?? nodeFileOperations;
  const prober = deps.prober ?? new FfprobeProber(runner, config.tools.ffprobe);
  const encoder = deps.encoder ?? new HandBrakeEncoder(runner, config.tools.handbrake);
  const copier = deps.copier ?? new RsyncCopier(runner, config.tools.rsync);

  await files.ensureDir(config.stagingDirectory);
  await files.ensureDir(path.dirname(config.inspectedLogPath));

  const log = await IdempotencyLog.open(config.inspectedLogPath);
  logger.info(`Loaded ${log.size} previously inspected files from ${config.inspectedLogPath}`);

  const pipeline = new WatchdogPipeline({
    log,
    inspector: new Inspector(prober, log, {
      targetCodec: config.targetCodec,
      maxSizeGB: config.maxSizeGB,
    }),
    transcoder: new Transcoder(
      copier,
      encoder,
      {
        stagingDirectory: config.stagingDirectory,
        presetFile: config.presetFile,
        presetName: config.presetName,
      },
      files
    ),
    verifier: new Verifier(prober),
    replacer: new Replacer(copier, config.replaceStrategy, files),
    stagingDirectory: config.stagingDirectory,
    files,
  });

  const directories = await existingDirectories(config.mediaDirectories, logger);
  const summary = await pipeline.run(scanMediaFiles(directories, config.videoExtensions, logger), ctx);

  const { counts } = summary;
  logger.info(
    `Run complete: ${counts.replaced} replaced, ${counts.passed} passed, ${counts.skipped} skipped, ` +
      `${summary.discovered - counts.replaced - counts.passed - counts.skipped} not replaced`,
    { ...counts }
  );
  return { exitCode: EXIT_OK, summary };
}
