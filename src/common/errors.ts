/**
 * Failure taxonomy shared by every pipeline stage.
 *
 * Stages classify what went wrong with one of these and the state machine
 * decides between a retry and a terminal state from `retryable` alone.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, rate limits and unavailable engines. */
export class TransientFailure extends PipelineError {
  readonly code = 'transient';
  readonly retryable = true;
}

/** The service answered but the content cannot be used. */
export class RejectedOutput extends PipelineError {
  readonly code = 'rejected';
  readonly retryable = false;
}

/** Bad or corrupt input; retrying cannot help. */
export class PermanentInputFailure extends PipelineError {
  readonly code = 'bad_input';
  readonly retryable = false;
}

export type SyncErrorClass =
  | 'timeout'
  | 'network'
  | 'rate_limited'
  | 'server_error'
  | 'auth'
  | 'not_found'
  | 'rejected'
  | 'unmapped';

const RETRYABLE_SYNC_ERRORS: ReadonlySet<SyncErrorClass> = new Set([
  'timeout',
  'network',
  'rate_limited',
  'server_error',
]);

/** Downstream delivery failure. Never affects the grade itself. */
export class SyncFailure extends PipelineError {
  readonly code = 'sync';
  readonly retryable: boolean;

  constructor(
    readonly errorClass: SyncErrorClass,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.retryable = RETRYABLE_SYNC_ERRORS.has(errorClass);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' ||
      err.name === 'TimeoutError' ||
      /aborted|timed? ?out/i.test(err.message))
  );
}
