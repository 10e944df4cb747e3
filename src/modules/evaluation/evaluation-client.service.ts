import { Injectable } from '@nestjs/common';
import { PipelineError, errorMessage } from '../../common/errors';
import { GradewiseLogger } from '../../lib/logger';
import { EvaluationModel } from './evaluation-model';
import { parseEvaluationResponse } from './evaluation-parser';
import { EvaluationRepository } from './evaluation.repository';
import {
  EvaluateOptions,
  EvaluationRecord,
  NewEvaluation,
  Rubric,
} from './interfaces/evaluation.interface';
import { buildEvaluationPrompt } from './rubric';

@Injectable()
export class EvaluationClient {
  constructor(
    private readonly model: EvaluationModel,
    private readonly evaluations: EvaluationRepository,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(EvaluationClient.name);
  }

  /**
   * Runs one evaluation attempt and records it whatever the outcome, so
   * failed attempts stay auditable next to successful ones.
   */
  async evaluate(
    submissionId: string,
    text: string,
    rubric: Rubric,
    attempt: number,
    options: EvaluateOptions = { strict: false },
  ): Promise<EvaluationRecord> {
    const base: NewEvaluation = {
      submissionId,
      attempt,
      outcome: 'rejected',
      score: null,
      rawScore: null,
      scoreClamped: false,
      feedback: [],
      model: this.model.modelId,
      strictPrompt: options.strict,
      error: null,
      superseded: false,
    };

    let raw: string;
    try {
      raw = await this.model.generate(
        buildEvaluationPrompt(text, rubric, options.strict),
      );
    } catch (err) {
      // errors outside the taxonomy are treated like network trouble
      const retryable = err instanceof PipelineError ? err.retryable : true;
      return this.record({
        ...base,
        outcome: retryable ? 'transient_failure' : 'rejected',
        error: errorMessage(err),
      });
    }

    const parsed = parseEvaluationResponse(raw);
    if (parsed.kind === 'malformed') {
      this.logger.warn(
        `Attempt ${attempt} for submission ${submissionId} returned unusable output: ${parsed.reason}`,
      );
      return this.record({ ...base, outcome: 'rejected', error: parsed.reason });
    }

    if (parsed.clamped) {
      this.logger.warn(
        `Attempt ${attempt} for submission ${submissionId}: score ${parsed.rawScore} clamped to ${parsed.score}`,
      );
    }
    return this.record({
      ...base,
      outcome: 'success',
      score: parsed.score,
      rawScore: parsed.rawScore,
      scoreClamped: parsed.clamped,
      feedback: parsed.feedback,
    });
  }

  private async record(data: NewEvaluation): Promise<EvaluationRecord> {
    const saved = await this.evaluations.create(data);
    this.logger.log(
      `Evaluation attempt ${saved.attempt} for submission ${saved.submissionId}: ${saved.outcome}`,
    );
    return saved;
  }
}
