import {
  NewSyncJob,
  SyncJobPatch,
  SyncJobRecord,
} from './interfaces/sync.interface';

export abstract class SyncJobRepository {
  abstract create(data: NewSyncJob): Promise<SyncJobRecord>;
  abstract findById(id: string): Promise<SyncJobRecord | null>;
  abstract update(id: string, patch: SyncJobPatch): Promise<SyncJobRecord>;
  abstract findPending(
    gradeId: string,
    integrationId: string,
  ): Promise<SyncJobRecord | null>;
  abstract listByGrade(gradeId: string): Promise<SyncJobRecord[]>;
  abstract listBySubmission(submissionId: string): Promise<SyncJobRecord[]>;
  /**
   * Pending jobs that should be delivered now: retries whose time has come and
   * deliveries that were claimed but not finished before `staleBefore`.
   */
  abstract findDue(
    now: Date,
    staleBefore: Date,
    limit: number,
  ): Promise<SyncJobRecord[]>;
  /**
   * Takes a due pending job for delivery by clearing `nextAttemptAt`. Returns
   * null when the job is not due or another worker took it.
   */
  abstract claim(
    id: string,
    now: Date,
    staleBefore: Date,
  ): Promise<SyncJobRecord | null>;
  /**
   * Takes a pending job that is waiting for a scheduled retry, setting the
   * score it should deliver. Null when nobody has it scheduled: the job is
   * already being pushed, or is no longer pending.
   */
  abstract takeOver(id: string, score: number): Promise<SyncJobRecord | null>;
  /** Changes the score of a job that is still pending. */
  abstract rescore(id: string, score: number): Promise<SyncJobRecord | null>;
  /**
   * Records a finished push, provided the job still carries the score that
   * was pushed. Null when the score changed in the meantime.
   */
  abstract completeDelivery(
    id: string,
    deliveredScore: number,
    patch: SyncJobPatch,
  ): Promise<SyncJobRecord | null>;
}
