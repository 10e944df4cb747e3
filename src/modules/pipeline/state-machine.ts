import { RetryPolicy, backoffDelay } from '../../config';
import {
  FAILED_STATES,
  FRESH_RETRY,
  FailureReason,
  IN_FLIGHT_STATES,
  SubmissionPatch,
  SubmissionState,
} from '../submissions/interfaces/submission.interface';
import {
  PipelineEvent,
  SubmissionSnapshot,
  TransitionResult,
} from './interfaces/pipeline.interface';

const S = SubmissionState;

// evaluation may be under way in these; an override supersedes it
const OVERRIDE_TAKES_OVER: ReadonlySet<SubmissionState> = new Set([
  S.EXTRACTED,
  S.EVALUATING,
  S.EVALUATED,
]);

function illegal(
  snapshot: SubmissionSnapshot,
  event: PipelineEvent,
): TransitionResult {
  return {
    ok: false,
    error: `Cannot apply "${event.type}" to a submission in state "${snapshot.state}"`,
  };
}

function advanceTo(
  state: SubmissionState,
  extra: SubmissionPatch = {},
): TransitionResult {
  return {
    ok: true,
    patch: { state, failure: null, retry: { ...FRESH_RETRY }, ...extra },
    retryInMs: null,
  };
}

/** Retry the current stage after backoff, or give up into `failedState`. */
function stageFailure(
  snapshot: SubmissionSnapshot,
  failedState: SubmissionState,
  reason: FailureReason,
  message: string,
  retryable: boolean,
  policy: RetryPolicy,
  now: Date,
): TransitionResult {
  const attempts = snapshot.retry.attempts + 1;
  const failure = { reason, message };
  if (retryable && attempts < policy.maxAttempts) {
    const delay = backoffDelay(policy, attempts);
    return {
      ok: true,
      patch: {
        failure,
        retry: {
          attempts,
          nextAttemptAt: new Date(now.getTime() + delay),
          strictRubric: snapshot.retry.strictRubric,
        },
      },
      retryInMs: delay,
    };
  }
  return {
    ok: true,
    patch: {
      state: failedState,
      failure,
      retry: { ...snapshot.retry, attempts, nextAttemptAt: null },
    },
    retryInMs: null,
  };
}

/**
 * Lifecycle rules for a submission. Pure: returns the patch to write (under
 * compare-and-set) and leaves persistence and scheduling to the caller.
 */
export function transition(
  snapshot: SubmissionSnapshot,
  event: PipelineEvent,
  policy: RetryPolicy,
  now: Date,
): TransitionResult {
  const { state } = snapshot;

  switch (event.type) {
    case 'start':
      return state === S.NEW ? advanceTo(S.EXTRACTING) : illegal(snapshot, event);

    case 'extraction_succeeded':
      return state === S.EXTRACTING
        ? advanceTo(S.EXTRACTED, { extractedText: event.text })
        : illegal(snapshot, event);

    case 'extraction_failed':
      if (state !== S.EXTRACTING) return illegal(snapshot, event);
      return stageFailure(
        snapshot,
        S.EXTRACTION_FAILED,
        event.reason,
        event.message,
        event.retryable,
        policy,
        now,
      );

    case 'evaluation_started':
      return state === S.EXTRACTED
        ? advanceTo(S.EVALUATING)
        : illegal(snapshot, event);

    case 'evaluation_succeeded':
      return state === S.EVALUATING
        ? advanceTo(S.EVALUATED)
        : illegal(snapshot, event);

    case 'evaluation_failed':
      if (state !== S.EVALUATING) return illegal(snapshot, event);
      if (event.outcome === 'rejected' && !snapshot.retry.strictRubric) {
        // one more go straight away with the stricter prompt
        return {
          ok: true,
          patch: {
            failure: { reason: 'rejected', message: event.message },
            retry: {
              attempts: snapshot.retry.attempts + 1,
              nextAttemptAt: now,
              strictRubric: true,
            },
          },
          retryInMs: 0,
        };
      }
      return stageFailure(
        snapshot,
        S.EVALUATION_FAILED,
        event.outcome,
        event.message,
        event.outcome === 'transient_failure',
        policy,
        now,
      );

    case 'graded':
      if (state !== S.EVALUATED) return illegal(snapshot, event);
      return {
        ok: true,
        patch: { state: S.GRADED, gradedAt: now, retry: { ...FRESH_RETRY } },
        retryInMs: null,
      };

    case 'synced':
      return state === S.GRADED
        ? { ok: true, patch: { state: S.SYNCED }, retryInMs: null }
        : illegal(snapshot, event);

    case 'cancel':
      // an instructor grade stands once given
      if (!IN_FLIGHT_STATES.has(state) || snapshot.gradedAt) {
        return illegal(snapshot, event);
      }
      return {
        ok: true,
        patch: {
          state: S.CANCELLED,
          retry: { ...snapshot.retry, nextAttemptAt: null },
        },
        retryInMs: null,
      };

    case 'retry':
      if (!FAILED_STATES.has(state) || snapshot.gradedAt) {
        return illegal(snapshot, event);
      }
      return {
        ok: true,
        patch: {
          state: state === S.EXTRACTION_FAILED ? S.EXTRACTING : S.EVALUATING,
          failure: null,
          retry: { ...FRESH_RETRY, nextAttemptAt: now },
        },
        retryInMs: 0,
      };

    case 'manual_graded':
      if (state === S.CANCELLED) return illegal(snapshot, event);
      if (OVERRIDE_TAKES_OVER.has(state)) {
        return {
          ok: true,
          patch: {
            state: S.GRADED,
            gradedAt: now,
            failure: null,
            retry: { ...FRESH_RETRY },
          },
          retryInMs: null,
        };
      }
      // lifecycle marker stays; extraction keeps running for NEW/EXTRACTING
      return { ok: true, patch: { gradedAt: now }, retryInMs: null };
  }
}
