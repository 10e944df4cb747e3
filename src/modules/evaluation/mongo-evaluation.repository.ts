import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  EvaluationResult,
  EvaluationResultDocument,
} from './models/evaluation-result.model';
import {
  EvaluationRecord,
  NewEvaluation,
} from './interfaces/evaluation.interface';
import { EvaluationRepository } from './evaluation.repository';

function toRecord(doc: EvaluationResultDocument): EvaluationRecord {
  return {
    id: doc._id.toString(),
    submissionId: doc.submissionId,
    attempt: doc.attempt,
    outcome: doc.outcome,
    score: doc.score ?? null,
    rawScore: doc.rawScore ?? null,
    scoreClamped: doc.scoreClamped,
    feedback: doc.feedback.map((f) => ({
      category: f.category,
      comment: f.comment,
    })),
    model: doc.model,
    strictPrompt: doc.strictPrompt,
    error: doc.error ?? null,
    superseded: doc.superseded,
    createdAt: doc.createdAt,
  };
}

@Injectable()
export class MongoEvaluationRepository extends EvaluationRepository {
  constructor(
    @InjectModel(EvaluationResult.name)
    private readonly model: Model<EvaluationResultDocument>,
  ) {
    super();
  }

  async create(data: NewEvaluation): Promise<EvaluationRecord> {
    const doc = await this.model.create(data);
    return toRecord(doc);
  }

  async markSuperseded(id: string): Promise<void> {
    await this.model.updateOne({ _id: id }, { superseded: true }).exec();
  }

  async listBySubmission(submissionId: string): Promise<EvaluationRecord[]> {
    const docs = await this.model
      .find({ submissionId })
      .sort({ attempt: 1 })
      .exec();
    return docs.map(toRecord);
  }
}
