import { SyncErrorClass } from '../../../common/errors';

export type LmsType = 'canvas' | 'moodle' | 'blackboard';

/** Read-only integration configuration for one course and one LMS. */
export interface LmsIntegrationConfig {
  readonly id: string;
  readonly courseRef: string;
  readonly type: LmsType;
  readonly baseUrl: string;
  readonly apiToken: string;
  readonly externalCourseId: string;
  /** assignmentRef -> LMS assignment, activity or grade column id */
  readonly assignmentMap: Readonly<Record<string, string>>;
  /** studentRef -> LMS user id */
  readonly studentMap: Readonly<Record<string, string>>;
  readonly active: boolean;
  readonly syncEnabled: boolean;
}

export type SyncJobState = 'pending' | 'sent' | 'failed' | 'disabled';

export interface SyncJobRecord {
  id: string;
  gradeId: string;
  submissionId: string;
  integrationId: string;
  state: SyncJobState;
  attempts: number;
  /** Score this job delivers. */
  score: number;
  lastErrorClass: SyncErrorClass | null;
  lastError: string | null;
  lastAttemptAt: Date | null;
  nextAttemptAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewSyncJob = Pick<
  SyncJobRecord,
  'gradeId' | 'submissionId' | 'integrationId' | 'state' | 'score'
>;

export type SyncJobPatch = Partial<
  Pick<
    SyncJobRecord,
    | 'state'
    | 'attempts'
    | 'score'
    | 'lastErrorClass'
    | 'lastError'
    | 'lastAttemptAt'
    | 'nextAttemptAt'
  >
>;

export interface GradePush {
  externalCourseId: string;
  externalStudentId: string;
  externalItemId: string;
  score: number;
}

export interface GradeAck {
  status: number;
  reference?: string;
}

export interface DispatchOptions {
  mode: 'initial' | 'regrade';
}
