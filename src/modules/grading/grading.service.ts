import {
  ConflictException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { errorMessage } from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import { AppEvents, GRADE_READY_EVENT } from '../../lib/events';
import { GradewiseLogger } from '../../lib/logger';
import { EvaluationRepository } from '../evaluation/evaluation.repository';
import { activeEvaluation } from '../evaluation/interfaces/evaluation.interface';
import { applyTransition } from '../pipeline/apply-transition';
import {
  SubmissionRecord,
  SubmissionState,
} from '../submissions/interfaces/submission.interface';
import { SubmissionRepository } from '../submissions/submission.repository';
import { SyncJobRecord } from '../sync/interfaces/sync.interface';
import { SyncDispatcher } from '../sync/sync-dispatcher.service';
import { GradeReconciler } from './grade-reconciler.service';
import { GradeRecord, ManualOverride } from './interfaces/grade.interface';

export interface OverrideResult {
  submission: SubmissionRecord;
  grade: GradeRecord;
  syncJobs: SyncJobRecord[];
}

@Injectable()
export class GradingService {
  constructor(
    private readonly submissions: SubmissionRepository,
    private readonly evaluations: EvaluationRepository,
    private readonly reconciler: GradeReconciler,
    private readonly dispatcher: SyncDispatcher,
    private readonly events: AppEvents,
    @Inject(GRADING_SETTINGS) private readonly settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(GradingService.name);
  }

  /**
   * Instructor grade entry. Works from any state but `cancelled`, including
   * the terminal failure states, so no submission is left ungradeable. An
   * evaluation still running when this lands is kept for audit but never
   * replaces the instructor's score.
   */
  async applyManualOverride(
    submissionId: string,
    override: ManualOverride,
  ): Promise<OverrideResult> {
    const submission = await this.submissions.findById(submissionId);
    if (!submission) throw new NotFoundException('Submission not found');
    if (submission.state === SubmissionState.CANCELLED) {
      throw new ConflictException('Cancelled submissions cannot be graded');
    }

    // the lifecycle write goes first: a cancel that wins the race leaves no grade behind
    let current = await applyTransition(
      this.submissions,
      submissionId,
      { type: 'manual_graded' },
      this.settings.stageRetry,
    );
    const active = activeEvaluation(
      await this.evaluations.listBySubmission(submissionId),
    );
    const grade = await this.reconciler.reconcile(current, active, override);
    this.logger.log(
      `Instructor ${override.instructorRef} graded submission ${submissionId}: ${grade.score} (${grade.source})`,
    );

    this.events.emit(GRADE_READY_EVENT, {
      submissionId,
      studentRef: current.studentRef,
      studentEmail: current.studentEmail,
      score: grade.score,
      source: grade.source,
    });

    const syncJobs = await this.dispatcher.syncGrade(grade, current);
    if (
      current.state === SubmissionState.GRADED &&
      syncJobs.some((j) => j.state !== 'disabled')
    ) {
      current = await this.markSynced(current);
    }
    return { submission: current, grade, syncJobs };
  }

  private async markSynced(
    submission: SubmissionRecord,
  ): Promise<SubmissionRecord> {
    try {
      return await applyTransition(
        this.submissions,
        submission.id,
        { type: 'synced' },
        this.settings.stageRetry,
      );
    } catch (err) {
      // a pipeline worker finishing the same step is fine
      if (!(err instanceof ConflictException)) throw err;
      this.logger.debug(
        `Submission ${submission.id} not marked synced: ${errorMessage(err)}`,
      );
      return (await this.submissions.findById(submission.id)) ?? submission;
    }
  }
}
