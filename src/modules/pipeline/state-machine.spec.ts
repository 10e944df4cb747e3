import { RetryPolicy } from '../../config';
import {
  FRESH_RETRY,
  RetryState,
  SubmissionState,
} from '../submissions/interfaces/submission.interface';
import { SubmissionSnapshot } from './interfaces/pipeline.interface';
import { transition } from './state-machine';

const S = SubmissionState;
const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60_000 };
const now = new Date('2026-03-02T10:00:00.000Z');

function snapshot(
  state: SubmissionState,
  retry: Partial<RetryState> = {},
  gradedAt: Date | null = null,
): SubmissionSnapshot {
  return { state, retry: { ...FRESH_RETRY, ...retry }, gradedAt };
}

describe('transition', () => {
  describe('happy path', () => {
    it.each([
      [S.NEW, { type: 'start' as const }, S.EXTRACTING],
      [S.EXTRACTED, { type: 'evaluation_started' as const }, S.EVALUATING],
      [S.EVALUATING, { type: 'evaluation_succeeded' as const }, S.EVALUATED],
    ])('moves %s forward', (from, event, to) => {
      expect(transition(snapshot(from, { attempts: 2 }), event, policy, now)).toEqual({
        ok: true,
        patch: { state: to, failure: null, retry: FRESH_RETRY },
        retryInMs: null,
      });
    });

    it('stores the extracted text', () => {
      const result = transition(
        snapshot(S.EXTRACTING),
        { type: 'extraction_succeeded', text: 'The cat sat on the mat.' },
        policy,
        now,
      );
      expect(result).toMatchObject({
        ok: true,
        patch: { state: S.EXTRACTED, extractedText: 'The cat sat on the mat.' },
      });
    });

    it('stamps gradedAt when grading', () => {
      expect(transition(snapshot(S.EVALUATED), { type: 'graded' }, policy, now)).toEqual({
        ok: true,
        patch: { state: S.GRADED, gradedAt: now, retry: FRESH_RETRY },
        retryInMs: null,
      });
    });

    it('marks a graded submission synced', () => {
      expect(transition(snapshot(S.GRADED), { type: 'synced' }, policy, now)).toEqual({
        ok: true,
        patch: { state: S.SYNCED },
        retryInMs: null,
      });
    });
  });

  describe('illegal transitions', () => {
    it.each([
      [S.EXTRACTING, { type: 'start' as const }],
      [S.NEW, { type: 'evaluation_started' as const }],
      [S.EXTRACTED, { type: 'graded' as const }],
      [S.EVALUATED, { type: 'synced' as const }],
      [S.SYNCED, { type: 'cancel' as const }],
      [S.GRADED, { type: 'retry' as const }],
      [S.CANCELLED, { type: 'manual_graded' as const }],
    ])('rejects %s + %p', (from, event) => {
      expect(transition(snapshot(from), event, policy, now)).toEqual({
        ok: false,
        error: `Cannot apply "${event.type}" to a submission in state "${from}"`,
      });
    });
  });

  describe('stage failures', () => {
    it('schedules a retry with backoff while attempts remain', () => {
      const result = transition(
        snapshot(S.EVALUATING, { attempts: 1 }),
        { type: 'evaluation_failed', outcome: 'transient_failure', message: 'timeout' },
        policy,
        now,
      );
      expect(result).toEqual({
        ok: true,
        patch: {
          failure: { reason: 'transient_failure', message: 'timeout' },
          retry: {
            attempts: 2,
            nextAttemptAt: new Date(now.getTime() + 2000),
            strictRubric: false,
          },
        },
        retryInMs: 2000,
      });
    });

    it('gives up once the attempt budget is spent', () => {
      const result = transition(
        snapshot(S.EVALUATING, { attempts: 2 }),
        { type: 'evaluation_failed', outcome: 'transient_failure', message: 'timeout' },
        policy,
        now,
      );
      expect(result).toEqual({
        ok: true,
        patch: {
          state: S.EVALUATION_FAILED,
          failure: { reason: 'transient_failure', message: 'timeout' },
          retry: { attempts: 3, nextAttemptAt: null, strictRubric: false },
        },
        retryInMs: null,
      });
    });

    it('fails extraction at once for a non-retryable reason', () => {
      const result = transition(
        snapshot(S.EXTRACTING),
        {
          type: 'extraction_failed',
          reason: 'illegible',
          retryable: false,
          message: 'Too little readable text in scan.png',
        },
        policy,
        now,
      );
      expect(result).toMatchObject({
        ok: true,
        patch: {
          state: S.EXTRACTION_FAILED,
          failure: { reason: 'illegible', message: 'Too little readable text in scan.png' },
        },
      });
    });

    it('retries a rejected evaluation straight away with the strict prompt', () => {
      const result = transition(
        snapshot(S.EVALUATING),
        { type: 'evaluation_failed', outcome: 'rejected', message: 'Response is not valid JSON' },
        policy,
        now,
      );
      expect(result).toEqual({
        ok: true,
        patch: {
          failure: { reason: 'rejected', message: 'Response is not valid JSON' },
          retry: { attempts: 1, nextAttemptAt: now, strictRubric: true },
        },
        retryInMs: 0,
      });
    });

    it('fails a second rejection', () => {
      const result = transition(
        snapshot(S.EVALUATING, { attempts: 1, strictRubric: true }),
        { type: 'evaluation_failed', outcome: 'rejected', message: 'Empty response' },
        policy,
        now,
      );
      expect(result).toMatchObject({
        ok: true,
        patch: {
          state: S.EVALUATION_FAILED,
          failure: { reason: 'rejected', message: 'Empty response' },
        },
        retryInMs: null,
      });
    });
  });

  describe('cancel', () => {
    it.each([S.NEW, S.EXTRACTING, S.EXTRACTED, S.EVALUATING, S.EVALUATED])(
      'cancels from %s',
      (from) => {
        const result = transition(snapshot(from), { type: 'cancel' }, policy, now);
        expect(result).toMatchObject({ ok: true, patch: { state: S.CANCELLED } });
      },
    );

    it.each([S.GRADED, S.EXTRACTION_FAILED, S.CANCELLED])('refuses from %s', (from) => {
      expect(transition(snapshot(from), { type: 'cancel' }, policy, now).ok).toBe(false);
    });

    it.each([S.NEW, S.EXTRACTING])('refuses from %s once an instructor has graded', (from) => {
      const graded = snapshot(from, {}, now);
      expect(transition(graded, { type: 'cancel' }, policy, now)).toEqual({
        ok: false,
        error: `Cannot apply "cancel" to a submission in state "${from}"`,
      });
    });
  });

  describe('retry', () => {
    it('restarts extraction from a fresh budget', () => {
      expect(
        transition(snapshot(S.EXTRACTION_FAILED, { attempts: 3 }), { type: 'retry' }, policy, now),
      ).toEqual({
        ok: true,
        patch: {
          state: S.EXTRACTING,
          failure: null,
          retry: { attempts: 0, nextAttemptAt: now, strictRubric: false },
        },
        retryInMs: 0,
      });
    });

    it('restarts evaluation', () => {
      expect(
        transition(snapshot(S.EVALUATION_FAILED), { type: 'retry' }, policy, now),
      ).toMatchObject({ ok: true, patch: { state: S.EVALUATING } });
    });

    it('refuses once an instructor has graded the submission', () => {
      expect(
        transition(snapshot(S.EXTRACTION_FAILED, {}, now), { type: 'retry' }, policy, now).ok,
      ).toBe(false);
    });
  });

  describe('manual_graded', () => {
    it.each([S.EXTRACTED, S.EVALUATING, S.EVALUATED])('takes over from %s', (from) => {
      expect(
        transition(snapshot(from, { attempts: 1 }), { type: 'manual_graded' }, policy, now),
      ).toEqual({
        ok: true,
        patch: { state: S.GRADED, gradedAt: now, failure: null, retry: FRESH_RETRY },
        retryInMs: null,
      });
    });

    it.each([S.NEW, S.EXTRACTING, S.EXTRACTION_FAILED, S.EVALUATION_FAILED, S.GRADED, S.SYNCED])(
      'only stamps gradedAt from %s',
      (from) => {
        expect(transition(snapshot(from), { type: 'manual_graded' }, policy, now)).toEqual({
          ok: true,
          patch: { gradedAt: now },
          retryInMs: null,
        });
      },
    );
  });
});
