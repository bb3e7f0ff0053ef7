/**
 * Inspector: decides whether a file already meets the encoding policy.
 */

import type { ExecutionContext } from './context.js';
import type { IdempotencyLog } from './idempotency-log.js';
import type { MetadataProber } from './tools/index.js';
import { findVideoCodec } from './types/media-info.js';
import {
  REASON_METADATA_UNAVAILABLE,
  REASON_SIZE_OVER_LIMIT,
  REASON_UNKNOWN,
} from './types/pipeline.js';
import type { InspectionVerdict } from './types/pipeline.js';

const BYTES_PER_GB = 1024 ** 3;

export interface InspectionPolicy {
  targetCodec: string;
  maxSizeGB: number;
}

/**
 * Size limit in bytes, truncated: 0.005 GB is 5368709 bytes
 */
export function sizeLimitBytes(maxSizeGB: number): number {
  return Math.floor(maxSizeGB * BYTES_PER_GB);
}

export class Inspector {
  private readonly limitBytes: number;

  constructor(
    private readonly prober: MetadataProber,
    private readonly log: IdempotencyLog,
    private readonly policy: InspectionPolicy
  ) {
    this.limitBytes = sizeLimitBytes(policy.maxSizeGB);
  }

  /**
   * Probe the file and decide Pass or Queue. A Pass is appended to the
   * idempotency log before this resolves. Probe failure queues the file.
   */
  async inspect(filePath: string, ctx: ExecutionContext): Promise<InspectionVerdict> {
    const probed = await this.prober.probe(filePath);
    if (!probed.success) {
      ctx.logger.info(`Inspection failed to read metadata; queueing for transcode: ${filePath}`, {
        reason: probed.error.message,
      });
      return this.report(filePath, { decision: 'queue', reasons: [REASON_METADATA_UNAVAILABLE] }, ctx);
    }

    const info = probed.data;
    const videoCodec = findVideoCodec(info);
    const codecMatches = videoCodec === this.policy.targetCodec;
    const sizeWithinLimit = info.size < this.limitBytes;

    if (codecMatches && sizeWithinLimit) {
      ctx.logger.info(
        `PASS: ${filePath} (codec=${videoCodec}, size=${info.size} < ${this.limitBytes})`
      );
      await this.log.append(filePath);
      return this.report(filePath, { decision: 'pass' }, ctx);
    }

    const reasons: string[] = [];
    if (!codecMatches) {
      reasons.push(`codec is ${videoCodec ?? 'none'}`);
    }
    if (!sizeWithinLimit) {
      reasons.push(REASON_SIZE_OVER_LIMIT);
    }
    if (reasons.length === 0) {
      reasons.push(REASON_UNKNOWN);
    }

    ctx.logger.info(`QUEUE: ${filePath} (reasons: ${reasons.join(', ')})`);
    return this.report(filePath, { decision: 'queue', reasons }, ctx);
  }

  private report(
    filePath: string,
    verdict: InspectionVerdict,
    ctx: ExecutionContext
  ): InspectionVerdict {
    ctx.events.emit({ type: 'file_inspected', path: filePath, verdict });
    return verdict;
  }
}
