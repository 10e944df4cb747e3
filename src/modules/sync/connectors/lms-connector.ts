import { SyncErrorClass, SyncFailure, isAbortError } from '../../../common/errors';
import {
  GradeAck,
  GradePush,
  LmsIntegrationConfig,
  LmsType,
} from '../interfaces/sync.interface';

export const LMS_CONNECTORS = Symbol('LMS_CONNECTORS');

export interface LmsConnector {
  readonly type: LmsType;
  pushGrade(
    integration: LmsIntegrationConfig,
    push: GradePush,
    timeoutMs: number,
  ): Promise<GradeAck>;
  /** LMS user id of the course member with this email, null when none matches. */
  findStudentId(
    integration: LmsIntegrationConfig,
    email: string,
    timeoutMs: number,
  ): Promise<string | null>;
}

/** Reads one property of an untyped LMS payload. */
export function field(value: unknown, key: string): unknown {
  if (!value || typeof value !== 'object' || !(key in value)) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

export function idOf(value: unknown): string | null {
  const id = field(value, 'id');
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

export async function readJson(res: Response): Promise<unknown> {
  return res.json().catch(() => null);
}

export function classifyHttpStatus(status: number): SyncErrorClass {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'server_error';
  return 'rejected';
}

/**
 * Runs one HTTP call against an LMS and turns every failure mode into a
 * SyncFailure the dispatcher can act on.
 */
export async function lmsRequest(
  label: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (isAbortError(err)) {
      throw new SyncFailure('timeout', `${label} timed out after ${timeoutMs}ms`, {
        cause: err,
      });
    }
    throw new SyncFailure('network', `${label} unreachable: ${String(err)}`, {
      cause: err,
    });
  }
  if (!res.ok) {
    const body = await res.text().catch(() => '');
    throw new SyncFailure(
      classifyHttpStatus(res.status),
      `${label} API error: ${res.status}${body ? ` - ${body.slice(0, 200)}` : ''}`,
    );
  }
  return res;
}
