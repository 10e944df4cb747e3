export const PIPELINE_QUEUE = 'grading-pipeline';

export enum PipelineJobs {
  ADVANCE = 'advance-submission',
  DELIVER_SYNC = 'deliver-sync',
}

export interface AdvanceJobData {
  submissionId: string;
}

export interface DeliverSyncJobData {
  syncJobId: string;
}

/** In-flight work untouched for this long is considered abandoned. */
export const STALE_AFTER_MS = 5 * 60 * 1000;

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
