import {
  EvaluationRecord,
  NewEvaluation,
} from './interfaces/evaluation.interface';

/** Append-only store of evaluation attempts. */
export abstract class EvaluationRepository {
  abstract create(data: NewEvaluation): Promise<EvaluationRecord>;
  abstract markSuperseded(id: string): Promise<void>;
  /** All attempts for a submission, ordered by attempt number. */
  abstract listBySubmission(submissionId: string): Promise<EvaluationRecord[]>;
}
