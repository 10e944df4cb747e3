export const GRADE_READY_EVENT = 'grade.ready';
export const SUBMISSION_FAILED_EVENT = 'submission.failed';
export const SYNC_FAILED_EVENT = 'sync.failed';

export interface GradeReadyPayload {
  submissionId: string;
  studentRef: string;
  studentEmail?: string;
  score: number;
  source: string;
}

export interface SubmissionFailedPayload {
  submissionId: string;
  state: string;
  reason: string;
  message: string;
}

export interface SyncFailedPayload {
  syncJobId: string;
  submissionId: string;
  integrationId: string;
  errorClass: string | null;
  message: string | null;
}

export interface AppEventMap {
  [GRADE_READY_EVENT]: GradeReadyPayload;
  [SUBMISSION_FAILED_EVENT]: SubmissionFailedPayload;
  [SYNC_FAILED_EVENT]: SyncFailedPayload;
}
