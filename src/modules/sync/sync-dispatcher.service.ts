import {
  ConflictException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { SyncFailure, errorMessage } from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings, backoffDelay } from '../../config';
import { AppEvents, SYNC_FAILED_EVENT } from '../../lib/events';
import { GradewiseLogger } from '../../lib/logger';
import { PipelineQueueProducer } from '../../lib/queue/queue.producer';
import { STALE_AFTER_MS } from '../../utils/constants';
import { GradeRecord } from '../grading/interfaces/grade.interface';
import { GradeRepository } from '../grading/grade.repository';
import { SubmissionRecord } from '../submissions/interfaces/submission.interface';
import { SubmissionRepository } from '../submissions/submission.repository';
import { LmsConnector } from './connectors/lms-connector';
import { LmsConnectorRegistry } from './connectors/lms-connector.registry';
import {
  DispatchOptions,
  GradePush,
  LmsIntegrationConfig,
  SyncJobRecord,
} from './interfaces/sync.interface';
import { IntegrationRepository } from './integration.repository';
import { SyncJobRepository } from './sync-job.repository';

// delayed jobs can fire marginally before the stored retry time
const CLAIM_SKEW_MS = 1000;

export type SyncTarget = Pick<
  SubmissionRecord,
  'id' | 'studentRef' | 'studentEmail' | 'assignmentRef'
>;

interface PreparedJob {
  job: SyncJobRecord;
  /** false when another worker is already pushing this job */
  deliver: boolean;
}

/**
 * Pushes finalized grades to the LMS integrations of a course. Each
 * integration has its own SyncJob; nothing here touches the grade or the
 * submission.
 */
@Injectable()
export class SyncDispatcher {
  constructor(
    private readonly jobs: SyncJobRepository,
    private readonly integrations: IntegrationRepository,
    private readonly grades: GradeRepository,
    private readonly submissions: SubmissionRepository,
    private readonly connectors: LmsConnectorRegistry,
    @Inject(GRADING_SETTINGS) private readonly settings: GradingSettings,
    private readonly producer: PipelineQueueProducer,
    private readonly events: AppEvents,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(SyncDispatcher.name);
  }

  async dispatch(
    grade: GradeRecord,
    target: SyncTarget,
    integrations: readonly LmsIntegrationConfig[],
    options: DispatchOptions = { mode: 'initial' },
  ): Promise<SyncJobRecord[]> {
    const existing = await this.jobs.listByGrade(grade.id);
    const selected =
      options.mode === 'regrade'
        ? this.previouslyDelivered(existing, integrations)
        : integrations;

    const active = selected.filter((i) => i.active);
    if (!active.length) {
      this.logger.debug(`No active integrations for submission ${target.id}`);
      return [];
    }

    // integrations are independent: one failing never holds up another
    return Promise.all(
      active.map(async (integration) => {
        const { job, deliver } = await this.prepareJob(grade, integration, existing);
        if (job.state !== 'pending' || !deliver) return job;
        return this.deliver(job, integration, target);
      }),
    );
  }

  /**
   * Pushes the current grade to the submission's course integrations. A grade
   * that already reached an LMS is re-sent only where it previously landed.
   */
  async syncGrade(
    grade: GradeRecord,
    submission: SyncTarget & Pick<SubmissionRecord, 'courseRef'>,
  ): Promise<SyncJobRecord[]> {
    const [integrations, previous] = await Promise.all([
      this.integrations.findByCourse(submission.courseRef),
      this.jobs.listByGrade(grade.id),
    ]);
    const mode = previous.some((j) => j.state === 'sent') ? 'regrade' : 'initial';
    return this.dispatch(grade, submission, integrations, { mode });
  }

  /** Worker entry for a delayed retry of one job. */
  async deliverById(syncJobId: string): Promise<SyncJobRecord | null> {
    const now = new Date();
    const job = await this.jobs.claim(
      syncJobId,
      new Date(now.getTime() + CLAIM_SKEW_MS),
      new Date(now.getTime() - STALE_AFTER_MS),
    );
    if (!job) {
      this.logger.debug(`Sync job ${syncJobId} not due or already taken`);
      return null;
    }

    const integration = await this.integrations.findById(job.integrationId);
    if (!integration || !integration.active || !integration.syncEnabled) {
      this.logger.warn(
        `Integration ${job.integrationId} is no longer syncing; disabling job ${job.id}`,
      );
      return this.jobs.update(job.id, {
        state: 'disabled',
        nextAttemptAt: null,
      });
    }

    const submission = await this.submissions.findById(job.submissionId);
    if (!submission) {
      return this.fail(
        job,
        job.attempts,
        new SyncFailure('not_found', `Submission ${job.submissionId} not found`),
        now,
      );
    }
    return this.deliver(job, integration, submission);
  }

  /** Manual re-trigger of a failed job from the instructor dashboard. */
  async retryJob(syncJobId: string): Promise<SyncJobRecord> {
    const job = await this.jobs.findById(syncJobId);
    if (!job) throw new NotFoundException('Sync job not found');
    if (job.state !== 'failed') {
      throw new ConflictException(
        `Only failed sync jobs can be retried (job is ${job.state})`,
      );
    }
    const pending = await this.jobs.findPending(job.gradeId, job.integrationId);
    if (pending) return pending;

    // deliver the grade as it stands now, not as it was when the job failed
    const grade = await this.grades.findById(job.gradeId);
    const reset = await this.jobs.update(job.id, {
      state: 'pending',
      attempts: 0,
      score: grade?.score ?? job.score,
      nextAttemptAt: new Date(),
    });
    await this.producer.enqueueSyncDelivery(reset.id);
    this.logger.log(`Sync job ${job.id} re-queued by instructor`);
    return reset;
  }

  private previouslyDelivered(
    existing: readonly SyncJobRecord[],
    integrations: readonly LmsIntegrationConfig[],
  ): LmsIntegrationConfig[] {
    const delivered = new Set(
      existing
        .filter((j) => j.state === 'sent' || j.state === 'pending')
        .map((j) => j.integrationId),
    );
    return integrations.filter((i) => delivered.has(i.id));
  }

  private async prepareJob(
    grade: GradeRecord,
    integration: LmsIntegrationConfig,
    existing: readonly SyncJobRecord[],
  ): Promise<PreparedJob> {
    if (!integration.syncEnabled) {
      const disabled = existing.find(
        (j) => j.integrationId === integration.id && j.state === 'disabled',
      );
      const job = disabled
        ? await this.jobs.update(disabled.id, { score: grade.score })
        : await this.jobs.create({
            gradeId: grade.id,
            submissionId: grade.submissionId,
            integrationId: integration.id,
            state: 'disabled',
            score: grade.score,
          });
      return { job, deliver: false };
    }

    const pending = await this.jobs.findPending(grade.id, integration.id);
    if (pending) {
      // a retry waiting for its turn is taken over and sent now
      const taken = await this.jobs.takeOver(pending.id, grade.score);
      if (taken) return { job: taken, deliver: true };

      // mid-push elsewhere: that worker re-sends once it sees the new score
      const rescored = await this.jobs.rescore(pending.id, grade.score);
      if (rescored) {
        this.logger.debug(
          `Sync job ${pending.id} is being delivered; queued score ${grade.score} behind it`,
        );
        return { job: rescored, deliver: false };
      }
    }
    const job = await this.jobs.create({
      gradeId: grade.id,
      submissionId: grade.submissionId,
      integrationId: integration.id,
      state: 'pending',
      score: grade.score,
    });
    return { job, deliver: true };
  }

  private async resolveStudent(
    connector: LmsConnector,
    integration: LmsIntegrationConfig,
    target: SyncTarget,
  ): Promise<string> {
    const mapped = integration.studentMap[target.studentRef];
    if (mapped) return mapped;
    if (target.studentEmail) {
      const found = await connector.findStudentId(
        integration,
        target.studentEmail,
        this.settings.lms.timeoutMs,
      );
      if (found) {
        this.logger.debug(
          `Student ${target.studentRef} matched to ${integration.type} user ${found} by email`,
        );
        return found;
      }
    }
    throw new SyncFailure(
      'unmapped',
      `Student ${target.studentRef} is not linked in ${integration.type}`,
    );
  }

  private buildPush(
    integration: LmsIntegrationConfig,
    target: SyncTarget,
    externalStudentId: string,
    score: number,
  ): GradePush {
    const externalItemId = integration.assignmentMap[target.assignmentRef];
    if (!externalItemId) {
      throw new SyncFailure(
        'unmapped',
        `Assignment ${target.assignmentRef} is not linked in ${integration.type}`,
      );
    }
    return {
      externalCourseId: integration.externalCourseId,
      externalStudentId,
      externalItemId,
      score,
    };
  }

  private async deliver(
    job: SyncJobRecord,
    integration: LmsIntegrationConfig,
    target: SyncTarget,
  ): Promise<SyncJobRecord> {
    const now = new Date();
    const attempts = job.attempts + 1;
    try {
      const connector = this.connectors.get(integration.type);
      if (!connector) {
        throw new SyncFailure(
          'rejected',
          `No connector registered for ${integration.type}`,
        );
      }
      const studentId = await this.resolveStudent(connector, integration, target);
      const push = this.buildPush(integration, target, studentId, job.score);
      await connector.pushGrade(integration, push, this.settings.lms.timeoutMs);
    } catch (err) {
      const failure =
        err instanceof SyncFailure
          ? err
          : new SyncFailure('network', errorMessage(err), { cause: err });
      return this.fail(job, attempts, failure, now);
    }

    const sent = await this.jobs.completeDelivery(job.id, job.score, {
      state: 'sent',
      attempts,
      lastAttemptAt: now,
      nextAttemptAt: null,
      lastErrorClass: null,
      lastError: null,
    });
    if (sent) {
      this.logger.log(
        `Grade ${job.gradeId} delivered to ${integration.type} (${integration.id})`,
      );
      return sent;
    }

    // a regrade changed the score while this push was in flight
    const latest = await this.jobs.findById(job.id);
    if (!latest) throw new Error(`Sync job ${job.id} not found`);
    if (latest.state !== 'pending') return latest;
    this.logger.log(
      `Sync job ${job.id} score moved ${job.score} -> ${latest.score} during delivery; re-sending`,
    );
    return this.deliver({ ...latest, attempts }, integration, target);
  }

  private async fail(
    job: SyncJobRecord,
    attempts: number,
    failure: SyncFailure,
    now: Date,
  ): Promise<SyncJobRecord> {
    const policy = this.settings.syncRetry;
    if (failure.retryable && attempts < policy.maxAttempts) {
      const delay = backoffDelay(policy, attempts);
      this.logger.warn(
        `Sync job ${job.id} attempt ${attempts} failed (${failure.errorClass}); retrying in ${delay}ms`,
      );
      const updated = await this.jobs.update(job.id, {
        state: 'pending',
        attempts,
        lastAttemptAt: now,
        nextAttemptAt: new Date(now.getTime() + delay),
        lastErrorClass: failure.errorClass,
        lastError: failure.message,
      });
      await this.producer.enqueueSyncDelivery(job.id, delay);
      return updated;
    }

    this.logger.error(
      `Sync job ${job.id} failed after ${attempts} attempt(s): ${failure.message}`,
    );
    const failed = await this.jobs.update(job.id, {
      state: 'failed',
      attempts,
      lastAttemptAt: now,
      nextAttemptAt: null,
      lastErrorClass: failure.errorClass,
      lastError: failure.message,
    });
    this.events.emit(SYNC_FAILED_EVENT, {
      syncJobId: failed.id,
      submissionId: failed.submissionId,
      integrationId: failed.integrationId,
      errorClass: failed.lastErrorClass,
      message: failed.lastError,
    });
    return failed;
  }
}
