import { ConflictException, NotFoundException } from '@nestjs/common';
import { RetryPolicy } from '../../config';
import { SubmissionRecord } from '../submissions/interfaces/submission.interface';
import { SubmissionRepository } from '../submissions/submission.repository';
import { PipelineEvent } from './interfaces/pipeline.interface';
import { transition } from './state-machine';

const CAS_RETRIES = 3;

/**
 * Applies an instructor-triggered event under compare-and-set, re-reading and
 * re-validating when a pipeline worker wrote in between.
 */
export async function applyTransition(
  submissions: SubmissionRepository,
  submissionId: string,
  event: PipelineEvent,
  policy: RetryPolicy,
): Promise<SubmissionRecord> {
  for (let i = 0; i < CAS_RETRIES; i++) {
    const current = await submissions.findById(submissionId);
    if (!current) throw new NotFoundException('Submission not found');

    const result = transition(current, event, policy, new Date());
    if (!result.ok) throw new ConflictException(result.error);

    const updated = await submissions.update(
      current.id,
      current.version,
      result.patch,
    );
    if (updated) return updated;
  }
  throw new ConflictException(
    'Submission is being processed right now, please try again',
  );
}
