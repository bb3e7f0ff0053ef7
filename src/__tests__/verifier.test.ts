/**
 * Tests for candidate verification and the efficiency gate.
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { DURATION_TOLERANCE_SECONDS, Verifier, isEfficient } from '../index.js';
import type { StreamType } from '../index.js';
import { FakeProber, mediaInfo } from '../testing/fakes.js';
import { testContext } from './helpers.js';

const ORIGINAL = '/staging/show.mkv';
const CANDIDATE = '/staging/show.av1.mkv';

function streams(video: number, audio: number, subtitle: number): Array<[StreamType, string?]> {
  return [
    ...Array.from({ length: video }, (): [StreamType, string?] => ['video', 'h264']),
    ...Array.from({ length: audio }, (): [StreamType, string?] => ['audio', 'aac']),
    ...Array.from({ length: subtitle }, (): [StreamType, string?] => ['subtitle', 'subrip']),
  ];
}

describe('Verifier', () => {
  let prober: FakeProber;
  let verifier: Verifier;

  beforeEach(() => {
    prober = new FakeProber();
    verifier = new Verifier(prober);
    prober.set(ORIGINAL, mediaInfo(ORIGINAL, { duration: 3600, streams: streams(1, 2, 0) }));
  });

  it('should use a one second tolerance', () => {
    expect(DURATION_TOLERANCE_SECONDS).toBe(1);
  });

  it('should accept a duration difference within tolerance', async () => {
    prober.set(CANDIDATE, mediaInfo(CANDIDATE, { duration: 3600.9, streams: streams(1, 2, 0) }));
    const { ctx, events } = testContext();

    const result = await verifier.verify(ORIGINAL, CANDIDATE, ctx);

    expect(result.passed).toBe(true);
    expect(result.report?.durationDelta).toBeCloseTo(0.9, 6);
    expect(events.ofType('verification_completed')).toHaveLength(1);
    expect(events.ofType('verification_completed')[0].passed).toBe(true);
  });

  it('should reject a duration difference beyond tolerance', async () => {
    prober.set(CANDIDATE, mediaInfo(CANDIDATE, { duration: 3601.1, streams: streams(1, 2, 0) }));
    const { ctx, events } = testContext();

    const result = await verifier.verify(ORIGINAL, CANDIDATE, ctx);

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.error.message).toBe(`Verification failed for ${CANDIDATE}: duration mismatch`);
    }
    expect(events.ofType('verification_completed')[0].passed).toBe(false);
  });

  it('should allow a changed subtitle count and report it', async () => {
    prober.set(ORIGINAL, mediaInfo(ORIGINAL, { duration: 100, streams: streams(1, 2, 3) }));
    prober.set(CANDIDATE, mediaInfo(CANDIDATE, { duration: 100, streams: streams(1, 2, 0) }));
    const { ctx, events, logger } = testContext();

    const result = await verifier.verify(ORIGINAL, CANDIDATE, ctx);

    expect(result.passed).toBe(true);
    expect(result.report?.subtitleDelta).toBe(-3);
    expect(events.ofType('subtitle_count_changed')).toEqual([
      { type: 'subtitle_count_changed', path: ORIGINAL, originalCount: 3, candidateCount: 0 },
    ]);
    expect(logger.hasMessage('Subtitle track count changed: orig s3 -> new s0 (allowed)')).toBe(true);
  });

  it('should reject a changed audio count', async () => {
    prober.set(ORIGINAL, mediaInfo(ORIGINAL, { duration: 100, streams: streams(1, 2, 3) }));
    prober.set(CANDIDATE, mediaInfo(CANDIDATE, { duration: 100, streams: streams(1, 1, 3) }));
    const { ctx, events } = testContext();

    const result = await verifier.verify(ORIGINAL, CANDIDATE, ctx);

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.error.message).toBe(`Verification failed for ${CANDIDATE}: stream count mismatch`);
    }
    expect(events.ofType('subtitle_count_changed')).toEqual([]);
  });

  it('should reject a candidate failing the health check without probing', async () => {
    prober.set(CANDIDATE, mediaInfo(CANDIDATE, { duration: 3600, streams: streams(1, 2, 0) }));
    prober.markUnhealthy(CANDIDATE);

    const result = await verifier.verify(ORIGINAL, CANDIDATE, testContext().ctx);

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.error.message).toBe(`Verification failed for ${CANDIDATE}: health check failed`);
    }
    expect(prober.probed).toEqual([]);
  });

  it('should reject a candidate whose metadata cannot be read', async () => {
    const result = await verifier.verify(ORIGINAL, CANDIDATE, testContext().ctx);

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.error.message).toBe(`Verification failed for ${CANDIDATE}: metadata unavailable`);
      expect(result.report).toBeUndefined();
    }
  });
});

describe('isEfficient', () => {
  it('should reject a candidate of equal size', () => {
    expect(isEfficient(1_000_000, 1_000_000)).toBe(false);
  });

  it('should accept a candidate one byte smaller', () => {
    expect(isEfficient(1_000_000, 999_999)).toBe(true);
  });

  it('should reject a larger candidate', () => {
    expect(isEfficient(1_000_000, 1_000_001)).toBe(false);
  });
});
