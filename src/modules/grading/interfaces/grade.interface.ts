export type GradeSource = 'ai' | 'manual' | 'ai-overridden';

export interface ManualOverride {
  score: number;
  instructorRef: string;
  comment?: string;
}

export interface GradeRevision {
  score: number;
  source: GradeSource;
  instructorRef: string | null;
  evaluationId: string | null;
  changedAt: Date;
}

export interface GradeRecord {
  id: string;
  submissionId: string;
  score: number;
  source: GradeSource;
  evaluationId: string | null;
  instructorRef: string | null;
  comment: string | null;
  /** Earlier values of this grade, oldest first. */
  history: GradeRevision[];
  createdAt: Date;
  updatedAt: Date;
}

export type GradeDraft = Pick<
  GradeRecord,
  'score' | 'source' | 'evaluationId' | 'instructorRef' | 'comment'
>;
