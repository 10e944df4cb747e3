import {
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import { isAbortError } from '../../common/errors';

export type GeminiFailureKind = 'transient' | 'rejected';

const TRANSIENT_STATUSES = new Set([408, 429]);

/**
 * Splits Gemini client errors into the ones worth retrying (network, timeout,
 * rate limit, server side) and the ones where the model answered but refused
 * or could not use the request.
 */
export function classifyGeminiError(err: unknown): GeminiFailureKind {
  if (isAbortError(err)) return 'transient';
  if (err instanceof GoogleGenerativeAIFetchError) {
    const status = err.status;
    if (status === undefined) return 'transient';
    if (TRANSIENT_STATUSES.has(status) || status >= 500) return 'transient';
    return 'rejected';
  }
  if (
    err instanceof GoogleGenerativeAIResponseError ||
    err instanceof GoogleGenerativeAIRequestInputError
  ) {
    return 'rejected';
  }
  return 'transient';
}
