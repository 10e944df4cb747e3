import { Injectable } from '@nestjs/common';
import { GradewiseLogger } from '../../lib/logger';
import { EvaluationRecord } from '../evaluation/interfaces/evaluation.interface';
import { SubmissionRecord } from '../submissions/interfaces/submission.interface';
import { GradeRepository } from './grade.repository';
import { GradeRecord, ManualOverride } from './interfaces/grade.interface';
import { reconcileGrade, revisionOf, sameDraft } from './reconcile';

@Injectable()
export class GradeReconciler {
  constructor(
    private readonly grades: GradeRepository,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(GradeReconciler.name);
  }

  /**
   * Writes the authoritative grade for a submission. Re-running with the same
   * inputs leaves the grade and its history untouched.
   */
  async reconcile(
    submission: Pick<SubmissionRecord, 'id'>,
    active: EvaluationRecord | null,
    override?: ManualOverride,
  ): Promise<GradeRecord> {
    const existing = await this.grades.findBySubmission(submission.id);
    const draft = reconcileGrade(submission.id, existing, active, override);

    if (!existing) {
      try {
        const created = await this.grades.create(submission.id, draft);
        this.logger.log(
          `Grade ${created.score} (${created.source}) recorded for submission ${submission.id}`,
        );
        return created;
      } catch (err) {
        // lost a race with another writer: fold this result into theirs
        const winner = await this.grades.findBySubmission(submission.id);
        if (!winner) throw err;
        return this.reconcile(submission, active, override);
      }
    }

    if (sameDraft(existing, draft)) return existing;

    const updated = await this.grades.replace(
      existing.id,
      draft,
      revisionOf(existing),
    );
    this.logger.log(
      `Grade for submission ${submission.id} changed ${existing.score} (${existing.source}) -> ${updated.score} (${updated.source})`,
    );
    return updated;
  }
}
