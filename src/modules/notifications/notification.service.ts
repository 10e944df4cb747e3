import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import {
  AppEvents,
  GRADE_READY_EVENT,
  GradeReadyPayload,
  SUBMISSION_FAILED_EVENT,
  SYNC_FAILED_EVENT,
  SubmissionFailedPayload,
  SyncFailedPayload,
} from '../../lib/events';
import { GradewiseLogger } from '../../lib/logger';
import { MailService } from './mail.service';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

@Injectable()
export class NotificationService implements OnModuleInit, OnModuleDestroy {
  constructor(
    private readonly events: AppEvents,
    private readonly mail: MailService,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(NotificationService.name);
  }

  private readonly onGradeReady = (payload: GradeReadyPayload) => {
    this.notifyGradeReady(payload).catch((err: unknown) =>
      this.logger.error(
        `Grade notification for submission ${payload.submissionId} failed`,
        err,
      ),
    );
  };

  private readonly onSubmissionFailed = (payload: SubmissionFailedPayload) => {
    this.logger.warn(
      `Submission ${payload.submissionId} needs manual grading: ${payload.state} (${payload.reason}) ${payload.message}`,
    );
  };

  private readonly onSyncFailed = (payload: SyncFailedPayload) => {
    this.logger.warn(
      `Grade sync ${payload.syncJobId} to integration ${payload.integrationId} failed (${payload.errorClass ?? 'unknown'}): ${payload.message ?? ''}`,
    );
  };

  onModuleInit() {
    this.events
      .on(GRADE_READY_EVENT, this.onGradeReady)
      .on(SUBMISSION_FAILED_EVENT, this.onSubmissionFailed)
      .on(SYNC_FAILED_EVENT, this.onSyncFailed);
  }

  onModuleDestroy() {
    this.events
      .off(GRADE_READY_EVENT, this.onGradeReady)
      .off(SUBMISSION_FAILED_EVENT, this.onSubmissionFailed)
      .off(SYNC_FAILED_EVENT, this.onSyncFailed);
  }

  async notifyGradeReady(payload: GradeReadyPayload): Promise<boolean> {
    if (!payload.studentEmail) {
      this.logger.debug(
        `No email on file for ${payload.studentRef}, skipping grade notification`,
      );
      return false;
    }
    await this.mail.send({
      to: payload.studentEmail,
      subject: 'Your grade is ready',
      text: `Your submission has been graded. Score: ${payload.score}/100.`,
      html: `<p>Your submission has been graded.</p><p><strong>Score:</strong> ${escapeHtml(String(payload.score))}/100</p>`,
    });
    this.logger.log(`Grade notification sent for submission ${payload.submissionId}`);
    return true;
  }
}
