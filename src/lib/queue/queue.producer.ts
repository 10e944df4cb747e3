import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { JobsOptions, Queue } from 'bullmq';
import {
  PIPELINE_QUEUE,
  PipelineJobs,
  AdvanceJobData,
  DeliverSyncJobData,
} from '../../utils/constants';
import { GradewiseLogger } from '../logger';

const BASE_OPTIONS: JobsOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 1000,
  },
  removeOnComplete: true,
  removeOnFail: 1000,
};

@Injectable()
export class PipelineQueueProducer {
  constructor(
    @InjectQueue(PIPELINE_QUEUE)
    private readonly queue: Queue<AdvanceJobData | DeliverSyncJobData>,
    private readonly log: GradewiseLogger,
  ) {
    this.log.setContext(PipelineQueueProducer.name);
  }

  async enqueueAdvance(submissionId: string, delayMs = 0): Promise<void> {
    try {
      this.log.verbose(
        `Queueing ${PipelineJobs.ADVANCE} for ${submissionId} (delay ${delayMs}ms)`,
      );
      await this.queue.add(
        PipelineJobs.ADVANCE,
        { submissionId },
        { ...BASE_OPTIONS, delay: delayMs },
      );
    } catch (err) {
      this.log.error('Failed to enqueue advance job', err);
      throw err;
    }
  }

  async enqueueSyncDelivery(syncJobId: string, delayMs = 0): Promise<void> {
    try {
      this.log.verbose(
        `Queueing ${PipelineJobs.DELIVER_SYNC} for ${syncJobId} (delay ${delayMs}ms)`,
      );
      await this.queue.add(
        PipelineJobs.DELIVER_SYNC,
        { syncJobId },
        { ...BASE_OPTIONS, delay: delayMs },
      );
    } catch (err) {
      this.log.error('Failed to enqueue sync delivery job', err);
      throw err;
    }
  }
}
