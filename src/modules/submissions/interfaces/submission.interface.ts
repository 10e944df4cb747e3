export enum SubmissionState {
  NEW = 'new',
  EXTRACTING = 'extracting',
  EXTRACTED = 'extracted',
  EVALUATING = 'evaluating',
  EVALUATED = 'evaluated',
  GRADED = 'graded',
  SYNCED = 'synced',
  EXTRACTION_FAILED = 'extraction_failed',
  EVALUATION_FAILED = 'evaluation_failed',
  CANCELLED = 'cancelled',
}

export const IN_FLIGHT_STATES: ReadonlySet<SubmissionState> = new Set([
  SubmissionState.NEW,
  SubmissionState.EXTRACTING,
  SubmissionState.EXTRACTED,
  SubmissionState.EVALUATING,
  SubmissionState.EVALUATED,
]);

export const FAILED_STATES: ReadonlySet<SubmissionState> = new Set([
  SubmissionState.EXTRACTION_FAILED,
  SubmissionState.EVALUATION_FAILED,
]);

export type TextInput = { kind: 'text'; text: string };
export type FileInput = {
  kind: 'file';
  fileKey: string;
  mimeType: string;
  filename: string;
};
export type SubmissionInput = TextInput | FileInput;

export type FailureReason =
  | 'illegible'
  | 'engine_unavailable'
  | 'bad_input'
  | 'transient_failure'
  | 'rejected';

export interface FailureInfo {
  reason: FailureReason;
  message: string;
}

/** Bounded retry bookkeeping for the stage the submission is currently in. */
export interface RetryState {
  attempts: number;
  nextAttemptAt: Date | null;
  strictRubric: boolean;
}

export const FRESH_RETRY: RetryState = Object.freeze({
  attempts: 0,
  nextAttemptAt: null,
  strictRubric: false,
});

export interface SubmissionRecord {
  id: string;
  studentRef: string;
  studentEmail?: string;
  assignmentRef: string;
  courseRef: string;
  input: SubmissionInput;
  state: SubmissionState;
  extractedText: string | null;
  failure: FailureInfo | null;
  retry: RetryState;
  evaluationAttempts: number;
  gradedAt: Date | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewSubmission {
  studentRef: string;
  studentEmail?: string;
  assignmentRef: string;
  courseRef: string;
  input: SubmissionInput;
}

export type SubmissionPatch = Partial<
  Pick<
    SubmissionRecord,
    'state' | 'extractedText' | 'failure' | 'retry' | 'gradedAt'
  >
>;
