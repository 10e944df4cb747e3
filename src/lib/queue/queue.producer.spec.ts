import { Queue } from 'bullmq';
import { mockLogger } from '../../testing';
import { AdvanceJobData, DeliverSyncJobData, PipelineJobs } from '../../utils/constants';
import { PipelineQueueProducer } from './queue.producer';

describe('PipelineQueueProducer', () => {
  const add = jest.fn();
  let producer: PipelineQueueProducer;

  beforeEach(() => {
    add.mockReset();
    add.mockResolvedValue({});
    producer = new PipelineQueueProducer(
      { add } as unknown as Queue<AdvanceJobData | DeliverSyncJobData>,
      mockLogger(),
    );
  });

  it('queues an advance with the requested delay', async () => {
    await producer.enqueueAdvance('sub-1', 2000);

    expect(add).toHaveBeenCalledWith(
      PipelineJobs.ADVANCE,
      { submissionId: 'sub-1' },
      expect.objectContaining({ delay: 2000, attempts: 3, removeOnComplete: true }),
    );
  });

  it('queues a sync delivery immediately by default', async () => {
    await producer.enqueueSyncDelivery('job-1');

    expect(add).toHaveBeenCalledWith(
      PipelineJobs.DELIVER_SYNC,
      { syncJobId: 'job-1' },
      expect.objectContaining({ delay: 0 }),
    );
  });

  it('surfaces queue errors', async () => {
    add.mockRejectedValue(new Error('ECONNREFUSED'));
    await expect(producer.enqueueAdvance('sub-1')).rejects.toThrow('ECONNREFUSED');
  });
});
