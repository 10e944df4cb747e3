import { EvaluationRecord } from '../evaluation/interfaces/evaluation.interface';
import {
  GradeDraft,
  GradeRecord,
  GradeRevision,
  ManualOverride,
} from './interfaces/grade.interface';

export class NothingToReconcile extends Error {
  constructor(submissionId: string) {
    super(`Submission ${submissionId} has neither an evaluation nor an override`);
    this.name = 'NothingToReconcile';
  }
}

/**
 * Precedence between the AI score and an instructor's score:
 * - an override always wins, and is `ai-overridden` when there is an AI score
 *   underneath it, `manual` otherwise;
 * - an AI result landing on a grade an instructor already set keeps the
 *   instructor's score.
 */
export function reconcileGrade(
  submissionId: string,
  existing: GradeRecord | null,
  active: EvaluationRecord | null,
  override?: ManualOverride,
): GradeDraft {
  const aiScore = active?.outcome === 'success' ? active.score : null;
  const evaluationId = aiScore === null || !active ? null : active.id;

  if (override) {
    return {
      score: override.score,
      source: evaluationId ? 'ai-overridden' : 'manual',
      evaluationId,
      instructorRef: override.instructorRef,
      comment: override.comment ?? null,
    };
  }

  if (aiScore === null) throw new NothingToReconcile(submissionId);

  if (existing && existing.source !== 'ai') {
    return {
      score: existing.score,
      source: 'ai-overridden',
      evaluationId,
      instructorRef: existing.instructorRef,
      comment: existing.comment,
    };
  }

  return {
    score: aiScore,
    source: 'ai',
    evaluationId,
    instructorRef: null,
    comment: null,
  };
}

export function sameDraft(grade: GradeRecord, draft: GradeDraft): boolean {
  return (
    grade.score === draft.score &&
    grade.source === draft.source &&
    grade.evaluationId === draft.evaluationId &&
    grade.instructorRef === draft.instructorRef &&
    grade.comment === draft.comment
  );
}

export function revisionOf(grade: GradeRecord): GradeRevision {
  return {
    score: grade.score,
    source: grade.source,
    instructorRef: grade.instructorRef,
    evaluationId: grade.evaluationId,
    changedAt: grade.updatedAt,
  };
}
