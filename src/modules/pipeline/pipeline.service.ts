import { Inject, Injectable } from '@nestjs/common';
import { errorMessage } from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import {
  AppEvents,
  GRADE_READY_EVENT,
  SUBMISSION_FAILED_EVENT,
} from '../../lib/events';
import { GradewiseLogger } from '../../lib/logger';
import { PipelineQueueProducer } from '../../lib/queue/queue.producer';
import { TracingService } from '../../lib/tracing';
import { EvaluationClient } from '../evaluation/evaluation-client.service';
import { EvaluationRepository } from '../evaluation/evaluation.repository';
import { activeEvaluation } from '../evaluation/interfaces/evaluation.interface';
import { DEFAULT_RUBRIC } from '../evaluation/rubric';
import { ContentExtractor } from '../extraction/content-extractor.service';
import { GradeReconciler } from '../grading/grade-reconciler.service';
import { GradeRepository } from '../grading/grade.repository';
import {
  FAILED_STATES,
  SubmissionRecord,
  SubmissionState,
} from '../submissions/interfaces/submission.interface';
import { SubmissionRepository } from '../submissions/submission.repository';
import { SyncDispatcher } from '../sync/sync-dispatcher.service';
import { SyncJobRepository } from '../sync/sync-job.repository';
import { applyTransition } from './apply-transition';
import { PipelineEvent } from './interfaces/pipeline.interface';
import { transition } from './state-machine';

// upper bound on stages run by one worker invocation
const MAX_STEPS = 16;
const CAS_RETRIES = 3;
// delayed jobs can fire marginally before the stored retry time
const DUE_SKEW_MS = 1000;

interface Committed {
  record: SubmissionRecord;
  retryInMs: number | null;
}

type Guard = (fresh: SubmissionRecord) => boolean;

/**
 * Drives one submission through extraction, evaluation, grading and sync.
 *
 * Every state write is a compare-and-set on the submission's version, so
 * any number of workers may call `advance` for the same submission and at
 * most one of them moves it forward.
 */
@Injectable()
export class PipelineService {
  constructor(
    private readonly submissions: SubmissionRepository,
    private readonly evaluations: EvaluationRepository,
    private readonly grades: GradeRepository,
    private readonly syncJobs: SyncJobRepository,
    private readonly extractor: ContentExtractor,
    private readonly evaluator: EvaluationClient,
    private readonly reconciler: GradeReconciler,
    private readonly dispatcher: SyncDispatcher,
    private readonly producer: PipelineQueueProducer,
    private readonly events: AppEvents,
    private readonly tracing: TracingService,
    @Inject(GRADING_SETTINGS) private readonly settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(PipelineService.name);
  }

  /** Worker entry point. Returns the submission as this run left it. */
  async advance(submissionId: string): Promise<SubmissionRecord | null> {
    try {
      let current = await this.submissions.findById(submissionId);
      if (!current) {
        this.logger.warn(`Submission ${submissionId} not found, dropping job`);
        return null;
      }
      for (let step = 0; step < MAX_STEPS; step++) {
        this.tracing.tagSubmission(submissionId, current.state);
        const next = await this.step(current);
        if (!next) break;
        current = next;
      }
      return (await this.submissions.findById(submissionId)) ?? current;
    } catch (err) {
      this.logger.error(
        `Pipeline for submission ${submissionId} crashed: ${errorMessage(err)}`,
      );
      this.tracing.captureException(err);
      throw err;
    }
  }

  /** Instructor action: stop a submission that has not been graded yet. */
  async cancel(submissionId: string): Promise<SubmissionRecord> {
    const cancelled = await applyTransition(
      this.submissions,
      submissionId,
      { type: 'cancel' },
      this.settings.stageRetry,
    );
    this.logger.log(`Submission ${submissionId} cancelled`);
    return cancelled;
  }

  /** Instructor action: rerun the failed stage with a fresh retry budget. */
  async retry(submissionId: string): Promise<SubmissionRecord> {
    const restarted = await applyTransition(
      this.submissions,
      submissionId,
      { type: 'retry' },
      this.settings.stageRetry,
    );
    await this.producer.enqueueAdvance(submissionId);
    this.logger.log(
      `Submission ${submissionId} restarted in ${restarted.state}`,
    );
    return restarted;
  }

  private async step(s: SubmissionRecord): Promise<SubmissionRecord | null> {
    switch (s.state) {
      case SubmissionState.NEW:
        return this.proceed(await this.commit(s, { type: 'start' }));
      case SubmissionState.EXTRACTING:
        return this.runExtraction(s);
      case SubmissionState.EXTRACTED:
        return this.proceed(await this.commit(s, { type: 'evaluation_started' }));
      case SubmissionState.EVALUATING:
        return this.runEvaluation(s);
      case SubmissionState.EVALUATED:
        return this.runGrading(s);
      case SubmissionState.GRADED:
        return this.runSync(s);
      default:
        return null;
    }
  }

  private async runExtraction(
    s: SubmissionRecord,
  ): Promise<SubmissionRecord | null> {
    const claimed = await this.claim(s);
    if (!claimed) return null;

    const outcome = await this.extractor.extract(claimed.input);
    const event: PipelineEvent = outcome.ok
      ? { type: 'extraction_succeeded', text: outcome.text }
      : {
          type: 'extraction_failed',
          reason: outcome.reason,
          retryable: outcome.retryable,
          message: outcome.message,
        };
    if (!outcome.ok) {
      this.logger.warn(
        `Extraction for ${claimed.id} failed (${outcome.reason}): ${outcome.message}`,
      );
    }
    return this.proceed(await this.commit(claimed, event));
  }

  private async runEvaluation(
    s: SubmissionRecord,
  ): Promise<SubmissionRecord | null> {
    const claimed = await this.claim(s);
    if (!claimed) return null;
    if (claimed.extractedText === null) {
      throw new Error(`Submission ${claimed.id} is evaluating without text`);
    }

    const attempt = await this.submissions.reserveEvaluationAttempt(claimed.id);
    const result = await this.evaluator.evaluate(
      claimed.id,
      claimed.extractedText,
      DEFAULT_RUBRIC,
      attempt,
      { strict: claimed.retry.strictRubric },
    );
    const event: PipelineEvent =
      result.outcome === 'success'
        ? { type: 'evaluation_succeeded' }
        : {
            type: 'evaluation_failed',
            outcome: result.outcome,
            message: result.error ?? result.outcome,
          };

    const committed = await this.commit(
      claimed,
      event,
      (fresh) =>
        fresh.state === SubmissionState.EVALUATING &&
        fresh.evaluationAttempts === attempt,
    );
    if (!committed) {
      await this.evaluations.markSuperseded(result.id);
      this.logger.log(
        `Evaluation attempt ${attempt} for ${claimed.id} superseded, not applied`,
      );
      return null;
    }
    return this.proceed(committed);
  }

  private async runGrading(
    s: SubmissionRecord,
  ): Promise<SubmissionRecord | null> {
    const claimed = await this.claim(s);
    if (!claimed) return null;

    const active = activeEvaluation(
      await this.evaluations.listBySubmission(claimed.id),
    );
    if (!active) {
      throw new Error(`Submission ${claimed.id} is evaluated but has no active evaluation`);
    }
    const grade = await this.reconciler.reconcile(claimed, active);

    const committed = await this.commit(claimed, { type: 'graded' });
    if (!committed) return null;

    this.events.emit(GRADE_READY_EVENT, {
      submissionId: claimed.id,
      studentRef: claimed.studentRef,
      studentEmail: claimed.studentEmail,
      score: grade.score,
      source: grade.source,
    });
    return this.proceed(committed);
  }

  private async runSync(s: SubmissionRecord): Promise<SubmissionRecord | null> {
    const claimed = await this.claim(s);
    if (!claimed) return null;

    const grade = await this.grades.findBySubmission(claimed.id);
    if (!grade) throw new Error(`Submission ${claimed.id} is graded without a grade`);

    // an override may already have dispatched this grade
    const existing = await this.syncJobs.listByGrade(grade.id);
    const jobs = existing.length
      ? existing
      : await this.dispatcher.syncGrade(grade, claimed);

    if (!jobs.some((j) => j.state !== 'disabled')) {
      this.logger.debug(`No LMS delivery for submission ${claimed.id}`);
      return null;
    }
    return this.proceed(await this.commit(claimed, { type: 'synced' }));
  }

  /**
   * Takes the submission for this run by bumping its version. Returns null if
   * a retry is not yet due or another worker holds it.
   */
  private async claim(s: SubmissionRecord): Promise<SubmissionRecord | null> {
    const due = s.retry.nextAttemptAt;
    if (due && due.getTime() > Date.now() + DUE_SKEW_MS) {
      this.logger.debug(`Submission ${s.id} not due until ${due.toISOString()}`);
      return null;
    }
    const claimed = await this.submissions.update(s.id, s.version, {
      retry: { ...s.retry, nextAttemptAt: null },
    });
    if (!claimed) this.logger.debug(`Submission ${s.id} taken by another worker`);
    return claimed;
  }

  /**
   * Writes the outcome of `event`. On a version conflict the submission is
   * re-read and the event re-applied while `guard` still holds; otherwise the
   * outcome is dropped and null returned.
   */
  private async commit(
    s: SubmissionRecord,
    event: PipelineEvent,
    guard: Guard = (fresh) => fresh.state === s.state,
  ): Promise<Committed | null> {
    let current = s;
    for (let i = 0; i < CAS_RETRIES; i++) {
      const result = transition(
        current,
        event,
        this.settings.stageRetry,
        new Date(),
      );
      if (!result.ok) {
        this.logger.warn(`Submission ${s.id}: ${result.error}`);
        return null;
      }
      const record = await this.submissions.update(
        current.id,
        current.version,
        result.patch,
      );
      if (record) return { record, retryInMs: result.retryInMs };

      const fresh = await this.submissions.findById(s.id);
      if (!fresh || !guard(fresh)) {
        this.logger.debug(`Submission ${s.id} moved on, dropping ${event.type}`);
        return null;
      }
      current = fresh;
    }
    return null;
  }

  private async proceed(
    committed: Committed | null,
  ): Promise<SubmissionRecord | null> {
    if (!committed) return null;
    const { record, retryInMs } = committed;

    if (retryInMs !== null && retryInMs > 0) {
      await this.producer.enqueueAdvance(record.id, retryInMs);
      this.logger.log(
        `Submission ${record.id} retry ${record.retry.attempts} in ${record.state} scheduled in ${retryInMs}ms`,
      );
      return null;
    }

    if (FAILED_STATES.has(record.state) && record.failure) {
      this.logger.warn(
        `Submission ${record.id} is ${record.state}: ${record.failure.reason}`,
      );
      this.events.emit(SUBMISSION_FAILED_EVENT, {
        submissionId: record.id,
        state: record.state,
        reason: record.failure.reason,
        message: record.failure.message,
      });
    }
    return record;
  }
}
