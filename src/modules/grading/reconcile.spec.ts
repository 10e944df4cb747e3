import { EvaluationRecord } from '../evaluation/interfaces/evaluation.interface';
import { GradeRecord } from './interfaces/grade.interface';
import { NothingToReconcile, reconcileGrade, revisionOf, sameDraft } from './reconcile';

function evaluation(overrides: Partial<EvaluationRecord> = {}): EvaluationRecord {
  return {
    id: 'eval-1',
    submissionId: 'sub-1',
    attempt: 1,
    outcome: 'success',
    score: 72,
    rawScore: 72,
    scoreClamped: false,
    feedback: [],
    model: 'fake-model',
    strictPrompt: false,
    error: null,
    superseded: false,
    createdAt: new Date('2026-03-02T10:00:00.000Z'),
    ...overrides,
  };
}

function grade(overrides: Partial<GradeRecord> = {}): GradeRecord {
  return {
    id: 'grade-1',
    submissionId: 'sub-1',
    score: 72,
    source: 'ai',
    evaluationId: 'eval-1',
    instructorRef: null,
    comment: null,
    history: [],
    createdAt: new Date('2026-03-02T10:00:00.000Z'),
    updatedAt: new Date('2026-03-02T10:05:00.000Z'),
    ...overrides,
  };
}

describe('reconcileGrade', () => {
  it('takes the AI score when there is no override', () => {
    expect(reconcileGrade('sub-1', null, evaluation(), undefined)).toEqual({
      score: 72,
      source: 'ai',
      evaluationId: 'eval-1',
      instructorRef: null,
      comment: null,
    });
  });

  it('marks an override on top of an AI score as ai-overridden', () => {
    expect(
      reconcileGrade('sub-1', grade(), evaluation(), {
        score: 85,
        instructorRef: 'instructor-1',
        comment: 'Stronger conclusion than the model noticed.',
      }),
    ).toEqual({
      score: 85,
      source: 'ai-overridden',
      evaluationId: 'eval-1',
      instructorRef: 'instructor-1',
      comment: 'Stronger conclusion than the model noticed.',
    });
  });

  it('marks an override without any AI score as manual', () => {
    expect(
      reconcileGrade('sub-1', null, null, { score: 60, instructorRef: 'instructor-1' }),
    ).toEqual({
      score: 60,
      source: 'manual',
      evaluationId: null,
      instructorRef: 'instructor-1',
      comment: null,
    });
  });

  it('keeps the instructor score when an AI result arrives later', () => {
    const existing = grade({
      score: 90,
      source: 'manual',
      evaluationId: null,
      instructorRef: 'instructor-1',
      comment: 'Graded by hand',
    });
    expect(reconcileGrade('sub-1', existing, evaluation({ id: 'eval-2', score: 40 }))).toEqual({
      score: 90,
      source: 'ai-overridden',
      evaluationId: 'eval-2',
      instructorRef: 'instructor-1',
      comment: 'Graded by hand',
    });
  });

  it('ignores an evaluation that did not succeed', () => {
    expect(
      reconcileGrade('sub-1', null, evaluation({ outcome: 'rejected', score: null }), {
        score: 50,
        instructorRef: 'instructor-1',
      }),
    ).toMatchObject({ source: 'manual', evaluationId: null });
  });

  it('throws when there is nothing to grade from', () => {
    expect(() => reconcileGrade('sub-1', null, null)).toThrow(NothingToReconcile);
  });
});

describe('sameDraft', () => {
  it('compares every graded field', () => {
    const current = grade();
    expect(
      sameDraft(current, {
        score: 72,
        source: 'ai',
        evaluationId: 'eval-1',
        instructorRef: null,
        comment: null,
      }),
    ).toBe(true);
    expect(
      sameDraft(current, {
        score: 72,
        source: 'ai',
        evaluationId: 'eval-1',
        instructorRef: null,
        comment: 'note',
      }),
    ).toBe(false);
  });
});

describe('revisionOf', () => {
  it('stamps the revision with the time the grade last changed', () => {
    expect(revisionOf(grade())).toEqual({
      score: 72,
      source: 'ai',
      instructorRef: null,
      evaluationId: 'eval-1',
      changedAt: new Date('2026-03-02T10:05:00.000Z'),
    });
  });
});
