/**
 * Per-file pipeline and run loop.
 *
 * Files are processed strictly one at a time, each to completion, before
 * the next one starts. Every failure is turned into a FileOutcome; nothing
 * raised while handling one file reaches the next.
 */

import type { ExecutionContext } from './context.js';
import { forFile } from './context.js';
import type { IdempotencyLog } from './idempotency-log.js';
import type { Inspector } from './inspector.js';
import type { Transcoder } from './transcoder.js';
import { planJob } from './transcoder.js';
import type { Verifier } from './verifier.js';
import type { Replacer } from './replacer.js';
import { isEfficient } from './efficiency.js';
import type { FileOperations } from './file-ops.js';
import { nodeFileOperations, removeIfExists } from './file-ops.js';
import type { FileOutcome, InspectionVerdict, RunSummary, TranscodeJob } from './types/pipeline.js';
import { REASON_UNKNOWN, emptyCounts } from './types/pipeline.js';
import { toError } from './errors/index.js';

export interface PipelineStages {
  log: IdempotencyLog;
  inspector: Inspector;
  transcoder: Transcoder;
  verifier: Verifier;
  replacer: Replacer;
  stagingDirectory: string;
  files?: FileOperations;
}

export class WatchdogPipeline {
  private readonly files: FileOperations;

  constructor(private readonly stages: PipelineStages) {
    this.files = stages.files ?? nodeFileOperations;
  }

  /**
   * Process every path in order and aggregate the outcomes
   */
  async run(
    paths: AsyncIterable<string> | Iterable<string>,
    ctx: ExecutionContext
  ): Promise<RunSummary> {
    const summary: RunSummary = { discovered: 0, counts: emptyCounts(), outcomes: [] };

    for await (const filePath of paths) {
      summary.discovered += 1;
      const outcome = await this.processFile(filePath, ctx);
      summary.counts[outcome.kind] += 1;
      summary.outcomes.push(outcome);
    }

    ctx.logger.info(`Discovered ${summary.discovered} candidate files`, { ...summary.counts });
    return summary;
  }

  /**
   * Process one file; never throws
   */
  async processFile(filePath: string, runCtx: ExecutionContext): Promise<FileOutcome> {
    const ctx = forFile(runCtx, filePath);
    try {
      return await this.handle(filePath, ctx);
    } catch (error) {
      const cause = toError(error);
      ctx.logger.error(`Unhandled error processing ${filePath}: ${cause.message}`, {
        error: cause.name,
        stack: cause.stack,
      });
      return { kind: 'unhandled_failure', path: filePath, error: cause };
    }
  }

  private async handle(filePath: string, ctx: ExecutionContext): Promise<FileOutcome> {
    if (this.stages.log.has(filePath)) {
      ctx.logger.info(`SKIP inspected: ${filePath}`);
      ctx.events.emit({ type: 'file_skipped', path: filePath });
      return { kind: 'skipped', path: filePath };
    }

    const verdict = await this.inspect(filePath, ctx);
    if (verdict.decision === 'pass') {
      return { kind: 'passed', path: filePath };
    }

    const job = planJob(filePath, this.stages.stagingDirectory);
    try {
      return await this.processQueued(job, ctx);
    } finally {
      await this.cleanup(job, ctx);
    }
  }

  /**
   * An inspection that throws queues the file, like a probe failure
   */
  private async inspect(filePath: string, ctx: ExecutionContext): Promise<InspectionVerdict> {
    try {
      return await this.stages.inspector.inspect(filePath, ctx);
    } catch (error) {
      ctx.logger.error(`Inspection error for ${filePath}: ${toError(error).message}`);
      return { decision: 'queue', reasons: [REASON_UNKNOWN] };
    }
  }

  private async processQueued(job: TranscodeJob, ctx: ExecutionContext): Promise<FileOutcome> {
    const { sourcePath } = job;

    const transcoded = await this.stages.transcoder.transcode(job, ctx);
    if (!transcoded.success) {
      return { ...transcoded.error, path: sourcePath };
    }

    const verification = await this.stages.verifier.verify(
      job.localStagedPath,
      job.localCandidatePath,
      ctx
    );
    if (!verification.passed) {
      ctx.logger.error('Verification failed; deleting transcoded file');
      return { kind: 'verification_failure', path: sourcePath, error: verification.error };
    }

    const originalSize = await this.files.size(job.localStagedPath);
    const candidateSize = await this.files.size(job.localCandidatePath);
    if (!isEfficient(originalSize, candidateSize)) {
      ctx.logger.info(
        `Not space-efficient (new ${candidateSize} >= orig ${originalSize}); skipping replace`
      );
      ctx.events.emit({ type: 'efficiency_rejected', path: sourcePath, originalSize, candidateSize });
      return { kind: 'efficiency_rejection', path: sourcePath, originalSize, candidateSize };
    }

    const replaced = await this.stages.replacer.replace(sourcePath, job.localCandidatePath, ctx);
    if (!replaced.committed) {
      ctx.logger.error('Safe replace failed; see transaction log above', {
        state: replaced.state,
        needsAttention: replaced.error.needsAttention,
        critical: true,
      });
      return { kind: 'replace_failure', path: sourcePath, error: replaced.error };
    }

    await this.stages.log.append(sourcePath);
    ctx.logger.info(`SUCCESS: Replaced ${sourcePath}`, { originalSize, candidateSize });
    ctx.events.emit({ type: 'file_replaced', path: sourcePath, originalSize, candidateSize });
    return { kind: 'replaced', path: sourcePath, originalSize, candidateSize };
  }

  /**
   * Local working files never outlive their job
   */
  private async cleanup(job: TranscodeJob, ctx: ExecutionContext): Promise<void> {
    for (const localPath of [job.localStagedPath, job.localCandidatePath]) {
      const failure = await removeIfExists(this.files, localPath);
      if (failure) {
        ctx.logger.warn(`Could not remove local file ${localPath}`, { error: failure.message });
      }
    }
  }
}
