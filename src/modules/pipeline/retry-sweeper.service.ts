import { Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { GradewiseLogger } from '../../lib/logger';
import { PipelineQueueProducer } from '../../lib/queue/queue.producer';
import { STALE_AFTER_MS } from '../../utils/constants';
import { SubmissionRepository } from '../submissions/submission.repository';
import { SyncJobRepository } from '../sync/sync-job.repository';

const BATCH_SIZE = 100;

/**
 * Requeues work whose retry time has passed or whose worker went away. Retry
 * timing lives on the records, so this is all a restart needs to resume.
 */
@Injectable()
export class RetrySweeperService {
  constructor(
    private readonly submissions: SubmissionRepository,
    private readonly syncJobs: SyncJobRepository,
    private readonly producer: PipelineQueueProducer,
    private readonly log: GradewiseLogger,
  ) {
    this.log.setContext(RetrySweeperService.name);
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async handleCron() {
    try {
      const { submissions, syncJobs } = await this.sweep(new Date());
      if (submissions || syncJobs) {
        this.log.log(
          `Requeued ${submissions} submission(s) and ${syncJobs} sync job(s)`,
        );
      }
    } catch (err) {
      this.log.error('retry sweep failed', err);
    }
  }

  async sweep(now: Date): Promise<{ submissions: number; syncJobs: number }> {
    const staleBefore = new Date(now.getTime() - STALE_AFTER_MS);
    const [stalled, due] = await Promise.all([
      this.submissions.findStalled(now, staleBefore, BATCH_SIZE),
      this.syncJobs.findDue(now, staleBefore, BATCH_SIZE),
    ]);

    for (const submission of stalled) {
      await this.producer.enqueueAdvance(submission.id);
    }
    for (const job of due) {
      await this.producer.enqueueSyncDelivery(job.id);
    }
    return { submissions: stalled.length, syncJobs: due.length };
  }
}
