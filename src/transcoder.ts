/**
 * Transcoder: stages a queued file locally and encodes a candidate.
 */

import * as path from 'path';
import type { ExecutionContext } from './context.js';
import type { Encoder, RemoteCopier } from './tools/index.js';
import type { TranscodeFailure, TranscodeJob } from './types/pipeline.js';
import type { FileOperations } from './file-ops.js';
import { candidatePathFor, nodeFileOperations, removeIfExists } from './file-ops.js';
import { CopyFailureError, EncodeFailureError, err, ok } from './errors/index.js';
import type { Result } from './errors/index.js';
import { succeeded } from './types/executor.js';

export interface TranscoderSettings {
  stagingDirectory: string;
  presetFile: string;
  presetName: string;
}

/**
 * Local paths a job will use for a source file
 */
export function planJob(sourcePath: string, stagingDirectory: string): TranscodeJob {
  return {
    sourcePath,
    localStagedPath: path.join(stagingDirectory, path.basename(sourcePath)),
    localCandidatePath: candidatePathFor(sourcePath, stagingDirectory),
  };
}

export class Transcoder {
  constructor(
    private readonly copier: RemoteCopier,
    private readonly encoder: Encoder,
    private readonly settings: TranscoderSettings,
    private readonly files: FileOperations = nodeFileOperations
  ) {}

  /**
   * Copy the source into staging and encode it against the preset.
   * On failure no partial staged copy or partial output is left behind.
   */
  async transcode(
    job: TranscodeJob,
    ctx: ExecutionContext
  ): Promise<Result<TranscodeJob, TranscodeFailure>> {
    await this.files.ensureDir(this.settings.stagingDirectory);

    const copied = await this.copier.copy(job.sourcePath, job.localStagedPath);
    if (!succeeded(copied)) {
      ctx.logger.error(`Failed to rsync source to local temp: ${job.sourcePath}`);
      await this.discard(job.localStagedPath, ctx);
      return err<TranscodeFailure>({
        kind: 'copy_failure',
        error: new CopyFailureError(job.sourcePath, job.localStagedPath, copied.exitCode),
      });
    }

    const encoded = await this.encoder.encode({
      presetFile: this.settings.presetFile,
      presetName: this.settings.presetName,
      inputPath: job.localStagedPath,
      outputPath: job.localCandidatePath,
    });

    const outputExists = await this.files.exists(job.localCandidatePath);
    if (encoded.exitCode !== 0 || !outputExists) {
      const reason =
        encoded.exitCode !== 0
          ? `encoder exited with code ${encoded.exitCode ?? encoded.signal ?? 'n/a'}`
          : 'encoder produced no output file';
      ctx.logger.error(`Transcode failed for ${job.sourcePath}`, { reason });
      await this.discard(job.localCandidatePath, ctx);
      return err<TranscodeFailure>({
        kind: 'encode_failure',
        error: new EncodeFailureError(job.localStagedPath, job.localCandidatePath, reason),
      });
    }

    ctx.events.emit({
      type: 'transcode_completed',
      path: job.sourcePath,
      candidatePath: job.localCandidatePath,
    });
    return ok(job);
  }

  private async discard(filePath: string, ctx: ExecutionContext): Promise<void> {
    const failure = await removeIfExists(this.files, filePath);
    if (failure) {
      ctx.logger.warn(`Could not remove partial file ${filePath}`, { error: failure.message });
    }
  }
}
