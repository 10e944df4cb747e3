import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, isValidObjectId } from 'mongoose';
import { Grade, GradeDocument } from './models/grade.model';
import {
  GradeDraft,
  GradeRecord,
  GradeRevision,
} from './interfaces/grade.interface';
import { GradeRepository } from './grade.repository';

function toRecord(doc: GradeDocument): GradeRecord {
  return {
    id: doc._id.toString(),
    submissionId: doc.submissionId,
    score: doc.score,
    source: doc.source,
    evaluationId: doc.evaluationId ?? null,
    instructorRef: doc.instructorRef ?? null,
    comment: doc.comment ?? null,
    history: doc.history.map((h) => ({
      score: h.score,
      source: h.source,
      instructorRef: h.instructorRef ?? null,
      evaluationId: h.evaluationId ?? null,
      changedAt: h.changedAt,
    })),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

@Injectable()
export class MongoGradeRepository extends GradeRepository {
  constructor(
    @InjectModel(Grade.name) private readonly model: Model<GradeDocument>,
  ) {
    super();
  }

  async findBySubmission(submissionId: string): Promise<GradeRecord | null> {
    const doc = await this.model.findOne({ submissionId }).exec();
    return doc ? toRecord(doc) : null;
  }

  async findById(id: string): Promise<GradeRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findById(id).exec();
    return doc ? toRecord(doc) : null;
  }

  async create(submissionId: string, draft: GradeDraft): Promise<GradeRecord> {
    const doc = await this.model.create({ submissionId, ...draft, history: [] });
    return toRecord(doc);
  }

  async replace(
    id: string,
    draft: GradeDraft,
    previous: GradeRevision,
  ): Promise<GradeRecord> {
    const doc = await this.model
      .findByIdAndUpdate(
        id,
        { $set: draft, $push: { history: previous } },
        { new: true },
      )
      .exec();
    if (!doc) throw new Error(`Grade ${id} not found`);
    return toRecord(doc);
  }
}
