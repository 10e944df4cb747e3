import { ExtractionFailureReason } from '../../extraction/interfaces/extraction.interface';
import {
  SubmissionPatch,
  SubmissionRecord,
} from '../../submissions/interfaces/submission.interface';

export type PipelineEvent =
  | { type: 'start' }
  | { type: 'extraction_succeeded'; text: string }
  | {
      type: 'extraction_failed';
      reason: ExtractionFailureReason;
      retryable: boolean;
      message: string;
    }
  | { type: 'evaluation_started' }
  | { type: 'evaluation_succeeded' }
  | {
      type: 'evaluation_failed';
      outcome: 'transient_failure' | 'rejected';
      message: string;
    }
  | { type: 'graded' }
  | { type: 'synced' }
  | { type: 'cancel' }
  | { type: 'retry' }
  | { type: 'manual_graded' };

export type PipelineEventType = PipelineEvent['type'];

export type SubmissionSnapshot = Pick<
  SubmissionRecord,
  'state' | 'retry' | 'gradedAt'
>;

export type TransitionResult =
  | {
      ok: true;
      patch: SubmissionPatch;
      /** Set when the same stage should run again after this delay. */
      retryInMs: number | null;
    }
  | { ok: false; error: string };
