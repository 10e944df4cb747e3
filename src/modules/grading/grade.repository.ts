import {
  GradeDraft,
  GradeRecord,
  GradeRevision,
} from './interfaces/grade.interface';

export abstract class GradeRepository {
  abstract findBySubmission(submissionId: string): Promise<GradeRecord | null>;
  abstract findById(id: string): Promise<GradeRecord | null>;
  /** Fails if a grade already exists for the submission. */
  abstract create(submissionId: string, draft: GradeDraft): Promise<GradeRecord>;
  /** Overwrites the grade and appends `previous` to its history. */
  abstract replace(
    id: string,
    draft: GradeDraft,
    previous: GradeRevision,
  ): Promise<GradeRecord>;
}
