import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, isValidObjectId } from 'mongoose';
import { SyncJob, SyncJobDocument } from './models/sync-job.model';
import {
  LmsIntegration,
  LmsIntegrationDocument,
} from './models/lms-integration.model';
import {
  LmsIntegrationConfig,
  NewSyncJob,
  SyncJobPatch,
  SyncJobRecord,
} from './interfaces/sync.interface';
import { SyncJobRepository } from './sync-job.repository';
import { IntegrationRepository } from './integration.repository';

function toJobRecord(doc: SyncJobDocument): SyncJobRecord {
  return {
    id: doc._id.toString(),
    gradeId: doc.gradeId,
    submissionId: doc.submissionId,
    integrationId: doc.integrationId,
    state: doc.state,
    attempts: doc.attempts,
    score: doc.score,
    lastErrorClass: doc.lastErrorClass ?? null,
    lastError: doc.lastError ?? null,
    lastAttemptAt: doc.lastAttemptAt ?? null,
    nextAttemptAt: doc.nextAttemptAt ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toIntegrationConfig(
  doc: LmsIntegrationDocument,
): LmsIntegrationConfig {
  return Object.freeze({
    id: doc._id.toString(),
    courseRef: doc.courseRef,
    type: doc.type,
    baseUrl: doc.baseUrl.replace(/\/+$/, ''),
    apiToken: doc.apiToken,
    externalCourseId: doc.externalCourseId,
    assignmentMap: Object.freeze(Object.fromEntries(doc.assignmentMap ?? [])),
    studentMap: Object.freeze(Object.fromEntries(doc.studentMap ?? [])),
    active: doc.active,
    syncEnabled: doc.syncEnabled,
  });
}

function dueFilter(now: Date, staleBefore: Date) {
  return {
    $or: [
      { nextAttemptAt: { $ne: null, $lte: now } },
      { nextAttemptAt: null, updatedAt: { $lt: staleBefore } },
    ],
  };
}

@Injectable()
export class MongoSyncJobRepository extends SyncJobRepository {
  constructor(
    @InjectModel(SyncJob.name) private readonly model: Model<SyncJobDocument>,
  ) {
    super();
  }

  async create(data: NewSyncJob): Promise<SyncJobRecord> {
    const doc = await this.model.create({ ...data, attempts: 0 });
    return toJobRecord(doc);
  }

  async findById(id: string): Promise<SyncJobRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findById(id).exec();
    return doc ? toJobRecord(doc) : null;
  }

  async update(id: string, patch: SyncJobPatch): Promise<SyncJobRecord> {
    const doc = await this.model
      .findByIdAndUpdate(id, { $set: patch }, { new: true })
      .exec();
    if (!doc) throw new Error(`Sync job ${id} not found`);
    return toJobRecord(doc);
  }

  async findPending(
    gradeId: string,
    integrationId: string,
  ): Promise<SyncJobRecord | null> {
    const doc = await this.model
      .findOne({ gradeId, integrationId, state: 'pending' })
      .exec();
    return doc ? toJobRecord(doc) : null;
  }

  async listByGrade(gradeId: string): Promise<SyncJobRecord[]> {
    const docs = await this.model.find({ gradeId }).sort({ createdAt: 1 }).exec();
    return docs.map(toJobRecord);
  }

  async listBySubmission(submissionId: string): Promise<SyncJobRecord[]> {
    const docs = await this.model
      .find({ submissionId })
      .sort({ createdAt: 1 })
      .exec();
    return docs.map(toJobRecord);
  }

  async findDue(
    now: Date,
    staleBefore: Date,
    limit: number,
  ): Promise<SyncJobRecord[]> {
    const docs = await this.model
      .find({ state: 'pending', ...dueFilter(now, staleBefore) })
      .limit(limit)
      .exec();
    return docs.map(toJobRecord);
  }

  async claim(
    id: string,
    now: Date,
    staleBefore: Date,
  ): Promise<SyncJobRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model
      .findOneAndUpdate(
        { _id: id, state: 'pending', ...dueFilter(now, staleBefore) },
        { $set: { nextAttemptAt: null } },
        { new: true },
      )
      .exec();
    return doc ? toJobRecord(doc) : null;
  }

  async takeOver(id: string, score: number): Promise<SyncJobRecord | null> {
    return this.updatePending(
      id,
      { nextAttemptAt: { $ne: null } },
      { score, nextAttemptAt: null },
    );
  }

  async rescore(id: string, score: number): Promise<SyncJobRecord | null> {
    return this.updatePending(id, {}, { score });
  }

  async completeDelivery(
    id: string,
    deliveredScore: number,
    patch: SyncJobPatch,
  ): Promise<SyncJobRecord | null> {
    return this.updatePending(id, { score: deliveredScore }, patch);
  }

  private async updatePending(
    id: string,
    filter: FilterQuery<SyncJobDocument>,
    patch: SyncJobPatch,
  ): Promise<SyncJobRecord | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model
      .findOneAndUpdate(
        { ...filter, _id: id, state: 'pending' },
        { $set: patch },
        { new: true },
      )
      .exec();
    return doc ? toJobRecord(doc) : null;
  }
}

@Injectable()
export class MongoIntegrationRepository extends IntegrationRepository {
  constructor(
    @InjectModel(LmsIntegration.name)
    private readonly model: Model<LmsIntegrationDocument>,
  ) {
    super();
  }

  async findByCourse(courseRef: string): Promise<LmsIntegrationConfig[]> {
    const docs = await this.model.find({ courseRef }).exec();
    return docs.map(toIntegrationConfig);
  }

  async findById(id: string): Promise<LmsIntegrationConfig | null> {
    if (!isValidObjectId(id)) return null;
    const doc = await this.model.findById(id).exec();
    return doc ? toIntegrationConfig(doc) : null;
  }
}
