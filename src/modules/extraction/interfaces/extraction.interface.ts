export type ExtractionFailureReason =
  | 'illegible'
  | 'engine_unavailable'
  | 'bad_input';

export interface ExtractedText {
  ok: true;
  text: string;
}

export interface ExtractionFailure {
  ok: false;
  reason: ExtractionFailureReason;
  retryable: boolean;
  message: string;
}

export type ExtractionOutcome = ExtractedText | ExtractionFailure;

export function extractionFailure(
  reason: ExtractionFailureReason,
  message: string,
): ExtractionFailure {
  return {
    ok: false,
    reason,
    retryable: reason === 'engine_unavailable',
    message,
  };
}
