import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, isValidObjectId } from 'mongoose';
import { Submission, SubmissionDocument } from './models/submission.model';
import {
  FRESH_RETRY,
  IN_FLIGHT_STATES,
  NewSubmission,
  SubmissionPatch,
  SubmissionRecord,
  SubmissionState,
} from './interfaces/submission.interface';
import { SubmissionRepository } from './submission.repository';

const RUNNING_STAGES = [SubmissionState.EXTRACTING, SubmissionState.EVALUATING];
const IN_FLIGHT = [...IN_FLIGHT_STATES];

export function toSubmissionRecord(doc: SubmissionDocument): SubmissionRecord {
  return {
    id: doc._id.toString(),
    studentRef: doc.studentRef,
    studentEmail: doc.studentEmail ?? undefined,
    assignmentRef: doc.assignmentRef,
    courseRef: doc.courseRef,
    input: doc.input,
    state: doc.state,
    extractedText: doc.extractedText ?? null,
    failure: doc.failure
      ? { reason: doc.failure.reason, message: doc.failure.message }
      : null,
    retry: {
      attempts: doc.retry?.attempts ?? 0,
      nextAttemptAt: doc.retry?.nextAttemptAt ?? null,
      strictRubric: doc.retry?.strictRubric ?? false,
    },
    evaluationAttempts: doc.evaluationAttempts,
    gradedAt: doc.gradedAt ?? null,
    version: doc.version,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

@Injectable()
export class MongoSubmissionRepository extends SubmissionRepository {
  constructor(
    @InjectModel(Submission.name)
    private readonly model: Model<SubmissionDocument>,
  ) {
    super();
  }

  async create(data: NewSubmission): Promise<SubmissionRecord> {
    const doc = await this.model.create({
      ...data,
      state: SubmissionState.NEW,
      extractedText: null,
      failure: null,
      retry: { ...FRESH_RETRY },
      evaluationAttempts: 0,
      gradedAt: null,
      version: 0,
    });
    return toSubmissionRecord(doc);
  }

  async findById(id: string): Promise<SubmissionRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findById(id).exec();
    return doc ? toSubmissionRecord(doc) : null;
  }

  async update(
    id: string,
    expectedVersion: number,
    patch: SubmissionPatch,
  ): Promise<SubmissionRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model
      .findOneAndUpdate(
        { _id: id, version: expectedVersion },
        { $set: patch, $inc: { version: 1 } },
        { new: true },
      )
      .exec();
    return doc ? toSubmissionRecord(doc) : null;
  }

  async reserveEvaluationAttempt(id: string): Promise<number> {
    const doc = await this.model
      .findByIdAndUpdate(id, { $inc: { evaluationAttempts: 1 } }, { new: true })
      .exec();
    if (!doc) throw new Error(`Submission ${id} not found`);
    return doc.evaluationAttempts;
  }

  async list(filter: {
    state?: SubmissionState;
    courseRef?: string;
    limit: number;
  }): Promise<SubmissionRecord[]> {
    const query: FilterQuery<SubmissionDocument> = {};
    if (filter.state) query.state = filter.state;
    if (filter.courseRef) query.courseRef = filter.courseRef;
    const docs = await this.model
      .find(query)
      .sort({ createdAt: -1 })
      .limit(filter.limit)
      .exec();
    return docs.map(toSubmissionRecord);
  }

  async findStalled(
    now: Date,
    staleBefore: Date,
    limit: number,
  ): Promise<SubmissionRecord[]> {
    const docs = await this.model
      .find({
        $or: [
          {
            state: { $in: RUNNING_STAGES },
            'retry.nextAttemptAt': { $ne: null, $lte: now },
          },
          {
            state: { $in: IN_FLIGHT },
            'retry.nextAttemptAt': null,
            updatedAt: { $lt: staleBefore },
          },
        ],
      })
      .limit(limit)
      .exec();
    return docs.map(toSubmissionRecord);
  }
}
