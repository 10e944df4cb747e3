import { Job } from 'bullmq';
import { PipelineService } from '../../modules/pipeline/pipeline.service';
import { SubmissionState } from '../../modules/submissions/interfaces/submission.interface';
import { SyncDispatcher } from '../../modules/sync/sync-dispatcher.service';
import { mockLogger } from '../../testing';
import { PipelineJobs } from '../../utils/constants';
import { PipelineQueueConsumer } from './queue.consumer';

function job(name: string, data: unknown): Job {
  return { id: '1', name, data } as unknown as Job;
}

describe('PipelineQueueConsumer', () => {
  const advance = jest.fn();
  const deliverById = jest.fn();
  let consumer: PipelineQueueConsumer;

  beforeEach(() => {
    advance.mockReset();
    deliverById.mockReset();
    consumer = new PipelineQueueConsumer(
      { advance } as unknown as PipelineService,
      { deliverById } as unknown as SyncDispatcher,
      mockLogger(),
    );
  });

  it('advances the submission named in the job', async () => {
    advance.mockResolvedValue({ state: SubmissionState.GRADED });

    await expect(
      consumer.process(job(PipelineJobs.ADVANCE, { submissionId: 'sub-1' })),
    ).resolves.toBe(SubmissionState.GRADED);
    expect(advance).toHaveBeenCalledWith('sub-1');
  });

  it('delivers the sync job named in the job', async () => {
    deliverById.mockResolvedValue(null);

    await expect(
      consumer.process(job(PipelineJobs.DELIVER_SYNC, { syncJobId: 'job-1' })),
    ).resolves.toBeNull();
    expect(deliverById).toHaveBeenCalledWith('job-1');
  });

  it('rejects jobs it does not know', async () => {
    await expect(consumer.process(job('parse-pdf', {}))).rejects.toThrow(
      'Unknown job name: parse-pdf',
    );
  });

  it('rejects an advance job without a submission id', async () => {
    await expect(
      consumer.process(job(PipelineJobs.ADVANCE, { syncJobId: 'job-1' })),
    ).rejects.toThrow('Unknown job name: advance-submission');
    expect(advance).not.toHaveBeenCalled();
  });

  it('rethrows pipeline errors so the queue can retry the job', async () => {
    advance.mockRejectedValue(new Error('mongo down'));
    await expect(
      consumer.process(job(PipelineJobs.ADVANCE, { submissionId: 'sub-1' })),
    ).rejects.toThrow('mongo down');
  });
});
