import {
  NewSubmission,
  SubmissionPatch,
  SubmissionRecord,
  SubmissionState,
} from './interfaces/submission.interface';

/**
 * Storage boundary for submissions. `update` is a compare-and-set on
 * `version`: it returns null when another writer got there first.
 */
export abstract class SubmissionRepository {
  abstract create(data: NewSubmission): Promise<SubmissionRecord>;
  abstract findById(id: string): Promise<SubmissionRecord | null>;
  abstract update(
    id: string,
    expectedVersion: number,
    patch: SubmissionPatch,
  ): Promise<SubmissionRecord | null>;
  /** Atomically issues the next evaluation attempt number. */
  abstract reserveEvaluationAttempt(id: string): Promise<number>;
  abstract list(filter: {
    state?: SubmissionState;
    courseRef?: string;
    limit: number;
  }): Promise<SubmissionRecord[]>;
  /**
   * Submissions whose pipeline should be running but may have no queued job:
   * retries that are due, and in-flight records untouched since `staleBefore`.
   */
  abstract findStalled(
    now: Date,
    staleBefore: Date,
    limit: number,
  ): Promise<SubmissionRecord[]>;
}
