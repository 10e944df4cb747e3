export type EvaluationOutcome = 'success' | 'transient_failure' | 'rejected';

export interface FeedbackItem {
  category: string;
  comment: string;
}

export interface RubricCriterion {
  category: string;
  description: string;
}

/** Rubrics all score on the 0..100 grade scale. */
export interface Rubric {
  name: string;
  criteria: RubricCriterion[];
}

export interface EvaluationRecord {
  id: string;
  submissionId: string;
  attempt: number;
  outcome: EvaluationOutcome;
  /** Score after clamping; null unless the outcome is `success`. */
  score: number | null;
  /** Score exactly as the model reported it. */
  rawScore: number | null;
  scoreClamped: boolean;
  feedback: FeedbackItem[];
  model: string;
  strictPrompt: boolean;
  error: string | null;
  superseded: boolean;
  createdAt: Date;
}

export type NewEvaluation = Omit<EvaluationRecord, 'id' | 'createdAt'>;

export interface EvaluateOptions {
  strict: boolean;
}

/** The highest-numbered successful attempt that was not superseded. */
export function activeEvaluation(
  results: readonly EvaluationRecord[],
): EvaluationRecord | null {
  let active: EvaluationRecord | null = null;
  for (const result of results) {
    if (result.outcome !== 'success' || result.superseded) continue;
    if (!active || result.attempt > active.attempt) active = result;
  }
  return active;
}
