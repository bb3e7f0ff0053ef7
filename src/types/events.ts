/**
 * Structured pipeline events.
 *
 * Stages report what happened to a file through an EventSink carried by the
 * execution context; the default sink writes them to the logger.
 */

import type { InspectionVerdict, ReplaceState, VerificationReport } from './pipeline.js';

export type PipelineEvent =
  | { type: 'file_skipped'; path: string }
  | { type: 'file_inspected'; path: string; verdict: InspectionVerdict }
  | { type: 'transcode_completed'; path: string; candidatePath: string }
  | { type: 'verification_completed'; path: string; passed: boolean; report?: VerificationReport }
  | {
      type: 'subtitle_count_changed';
      path: string;
      originalCount: number;
      candidateCount: number;
    }
  | {
      type: 'efficiency_rejected';
      path: string;
      originalSize: number;
      candidateSize: number;
    }
  | { type: 'replace_state'; path: string; state: ReplaceState }
  | { type: 'file_replaced'; path: string; originalSize: number; candidateSize: number };

export type PipelineEventType = PipelineEvent['type'];

export interface EventSink {
  emit(event: PipelineEvent): void;
}
