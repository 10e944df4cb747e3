import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Injectable } from '@nestjs/common';
import { Job } from 'bullmq';

import {
  PIPELINE_QUEUE,
  PipelineJobs,
  AdvanceJobData,
  DeliverSyncJobData,
} from '../../utils/constants';
import { PipelineService } from '../../modules/pipeline/pipeline.service';
import { SyncDispatcher } from '../../modules/sync/sync-dispatcher.service';
import { GradewiseLogger } from '../logger';

@Processor(PIPELINE_QUEUE)
@Injectable()
export class PipelineQueueConsumer extends WorkerHost {
  constructor(
    private readonly pipeline: PipelineService,
    private readonly dispatcher: SyncDispatcher,
    private readonly log: GradewiseLogger,
  ) {
    super();
    this.log.setContext(PipelineQueueConsumer.name);
  }

  async process(job: Job): Promise<unknown> {
    try {
      return await this.route(job);
    } catch (err) {
      this.log.error('Queue consumer process error', err);
      throw err;
    }
  }

  private async route(job: Job): Promise<unknown> {
    const name = job.name;
    if (name === PipelineJobs.ADVANCE && isAdvance(job.data)) {
      this.log.debug(`Advancing submission ${job.data.submissionId} (job ${job.id})`);
      const result = await this.pipeline.advance(job.data.submissionId);
      return result?.state ?? null;
    }
    if (name === PipelineJobs.DELIVER_SYNC && isDeliverSync(job.data)) {
      this.log.debug(`Delivering sync job ${job.data.syncJobId} (job ${job.id})`);
      const result = await this.dispatcher.deliverById(job.data.syncJobId);
      return result?.state ?? null;
    }
    throw new Error(`Unknown job name: ${job.name}`);
  }
}

function isAdvance(data: unknown): data is AdvanceJobData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'submissionId' in data &&
    typeof data.submissionId === 'string'
  );
}

function isDeliverSync(data: unknown): data is DeliverSyncJobData {
  return (
    typeof data === 'object' &&
    data !== null &&
    'syncJobId' in data &&
    typeof data.syncJobId === 'string'
  );
}
