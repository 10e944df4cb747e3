import { FeedbackItem } from './interfaces/evaluation.interface';

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export type ParsedEvaluation =
  | {
      kind: 'success';
      score: number;
      rawScore: number;
      clamped: boolean;
      feedback: FeedbackItem[];
    }
  | { kind: 'malformed'; reason: string };

function malformed(reason: string): ParsedEvaluation {
  return { kind: 'malformed', reason };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function cleanAiJsonOutput(raw: string): string {
  return raw
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim()
    .split('\n')
    .filter((line) => line.trim() !== ',')
    .join('\n');
}

function toScore(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toFeedback(value: unknown): FeedbackItem[] | null {
  if (value === undefined) return [];
  if (!Array.isArray(value)) return null;
  const items: FeedbackItem[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) return null;
    const { category, comment } = entry;
    if (typeof category !== 'string' || typeof comment !== 'string') return null;
    if (!category.trim() || !comment.trim()) return null;
    items.push({ category: category.trim(), comment: comment.trim() });
  }
  return items;
}

/**
 * Converts whatever the model sent back into a typed result. Never throws:
 * anything that does not match the expected shape is `malformed`.
 */
export function parseEvaluationResponse(raw: string): ParsedEvaluation {
  const cleaned = cleanAiJsonOutput(raw);
  if (!cleaned) return malformed('Empty response');

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch {
    return malformed('Response is not valid JSON');
  }
  if (!isRecord(data)) return malformed('Expected a JSON object');

  const rawScore = toScore(data.score);
  if (rawScore === null) return malformed('Score is missing or not a number');

  const feedback = toFeedback(data.feedback);
  if (!feedback) {
    return malformed('Feedback must be a list of {category, comment} items');
  }

  const score = Math.min(MAX_SCORE, Math.max(MIN_SCORE, rawScore));
  return {
    kind: 'success',
    score,
    rawScore,
    clamped: score !== rawScore,
    feedback,
  };
}
