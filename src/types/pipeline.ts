/**
 * Pipeline types: verdicts, jobs, reports and per-file outcomes.
 */

import type { StreamCounts } from './media-info.js';
import type {
  CopyFailureError,
  EncodeFailureError,
  ReplaceFailureError,
  VerificationFailureError,
} from '../errors/index.js';

// ============================================================================
// Inspection
// ============================================================================

export type InspectionVerdict =
  | { decision: 'pass' }
  | { decision: 'queue'; reasons: string[] };

export const REASON_METADATA_UNAVAILABLE = 'metadata unavailable';
export const REASON_SIZE_OVER_LIMIT = 'file size exceeds limit';
export const REASON_UNKNOWN = 'unknown';

// ============================================================================
// Transcode
// ============================================================================

/**
 * Local working files for one queued source file
 */
export interface TranscodeJob {
  /** Original path on durable storage */
  sourcePath: string;
  /** Copy of the source in the staging directory */
  localStagedPath: string;
  /** Encoder output in the staging directory */
  localCandidatePath: string;
}

export type TranscodeFailure =
  | { kind: 'copy_failure'; error: CopyFailureError }
  | { kind: 'encode_failure'; error: EncodeFailureError };

// ============================================================================
// Verification
// ============================================================================

export interface VerificationReport {
  /** |original duration - candidate duration| in seconds */
  durationDelta: number;
  sourceStreamCounts: StreamCounts;
  candidateStreamCounts: StreamCounts;
  /** candidate subtitle count minus original subtitle count */
  subtitleDelta: number;
}

export type VerificationResult =
  | { passed: true; report: VerificationReport }
  | { passed: false; error: VerificationFailureError; report?: VerificationReport };

// ============================================================================
// Replace
// ============================================================================

export type ReplaceState =
  | 'pending'
  | 'temp_written'
  | 'swapped'
  | 'committed'
  | 'rolled_back'
  | 'failed';

/**
 * Paths touched by one replace transaction, all in the original's directory
 */
export interface ReplacePaths {
  original: string;
  temp: string;
  backup: string;
}

export type ReplaceResult =
  | { committed: true; state: 'committed'; paths: ReplacePaths }
  | {
      committed: false;
      state: 'rolled_back' | 'failed';
      paths: ReplacePaths;
      error: ReplaceFailureError;
    };

// ============================================================================
// Outcomes
// ============================================================================

/**
 * Result of processing one discovered file
 */
export type FileOutcome =
  | { kind: 'skipped'; path: string }
  | { kind: 'passed'; path: string }
  | { kind: 'replaced'; path: string; originalSize: number; candidateSize: number }
  | { kind: 'copy_failure'; path: string; error: CopyFailureError }
  | { kind: 'encode_failure'; path: string; error: EncodeFailureError }
  | { kind: 'verification_failure'; path: string; error: VerificationFailureError }
  | { kind: 'efficiency_rejection'; path: string; originalSize: number; candidateSize: number }
  | { kind: 'replace_failure'; path: string; error: ReplaceFailureError }
  | { kind: 'unhandled_failure'; path: string; error: Error };

export type FileOutcomeKind = FileOutcome['kind'];

export interface RunSummary {
  /** Files yielded by the scanner */
  discovered: number;
  /** Number of outcomes of each kind */
  counts: Record<FileOutcomeKind, number>;
  outcomes: FileOutcome[];
}

export function emptyCounts(): Record<FileOutcomeKind, number> {
  return {
    skipped: 0,
    passed: 0,
    replaced: 0,
    copy_failure: 0,
    encode_failure: 0,
    verification_failure: 0,
    efficiency_rejection: 0,
    replace_failure: 0,
    unhandled_failure: 0,
  };
}
