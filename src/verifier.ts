/**
 * Verifier: checks a candidate against the original before publication.
 *
 * The candidate must pass the prober's health check, both files must probe
 * cleanly, durations must agree within the tolerance and video/audio stream
 * counts must match. A changed subtitle count is allowed but reported.
 */

import type { ExecutionContext } from './context.js';
import type { MetadataProber } from './tools/index.js';
import { countStreams } from './types/media-info.js';
import type { VerificationReport, VerificationResult } from './types/pipeline.js';
import { VerificationFailureError } from './errors/index.js';

/**
 * Largest accepted duration difference, in seconds
 */
export const DURATION_TOLERANCE_SECONDS = 1.0;

export class Verifier {
  constructor(private readonly prober: MetadataProber) {}

  async verify(
    localOriginal: string,
    candidate: string,
    ctx: ExecutionContext
  ): Promise<VerificationResult> {
    const result = await this.check(localOriginal, candidate, ctx);
    ctx.events.emit({
      type: 'verification_completed',
      path: localOriginal,
      passed: result.passed,
      report: result.report,
    });
    return result;
  }

  private async check(
    localOriginal: string,
    candidate: string,
    ctx: ExecutionContext
  ): Promise<VerificationResult> {
    if (!(await this.prober.healthCheck(candidate))) {
      ctx.logger.error(`Health check failed for ${candidate}`);
      return fail(candidate, 'health check failed');
    }

    const original = await this.prober.probe(localOriginal);
    const encoded = await this.prober.probe(candidate);
    if (!original.success || !encoded.success) {
      ctx.logger.error('Failed to read metadata for verification');
      return fail(candidate, 'metadata unavailable');
    }

    const sourceStreamCounts = countStreams(original.data);
    const candidateStreamCounts = countStreams(encoded.data);
    const report: VerificationReport = {
      durationDelta: Math.abs(original.data.duration - encoded.data.duration),
      sourceStreamCounts,
      candidateStreamCounts,
      subtitleDelta: candidateStreamCounts.subtitle - sourceStreamCounts.subtitle,
    };

    if (report.durationDelta > DURATION_TOLERANCE_SECONDS) {
      ctx.logger.error(
        `Duration mismatch: original=${original.data.duration.toFixed(3)}s new=${encoded.data.duration.toFixed(3)}s`
      );
      return fail(candidate, 'duration mismatch', report);
    }

    if (
      sourceStreamCounts.video !== candidateStreamCounts.video ||
      sourceStreamCounts.audio !== candidateStreamCounts.audio
    ) {
      ctx.logger.error(
        `Stream count mismatch (video/audio): orig(v${sourceStreamCounts.video},a${sourceStreamCounts.audio}) vs new(v${candidateStreamCounts.video},a${candidateStreamCounts.audio})`
      );
      return fail(candidate, 'stream count mismatch', report);
    }

    if (report.subtitleDelta !== 0) {
      ctx.logger.info(
        `Subtitle track count changed: orig s${sourceStreamCounts.subtitle} -> new s${candidateStreamCounts.subtitle} (allowed)`
      );
      ctx.events.emit({
        type: 'subtitle_count_changed',
        path: localOriginal,
        originalCount: sourceStreamCounts.subtitle,
        candidateCount: candidateStreamCounts.subtitle,
      });
    }

    return { passed: true, report };
  }
}

function fail(
  candidate: string,
  reason: string,
  report?: VerificationReport
): VerificationResult {
  return {
    passed: false,
    error: new VerificationFailureError(candidate, reason, report ? { report } : {}),
    report,
  };
}
