import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { SyncErrorClass } from '../../../common/errors';
import { SyncJobState } from '../interfaces/sync.interface';

@Schema({ collection: 'sync_jobs', timestamps: true })
export class SyncJob {
  @Prop({ required: true, index: true })
  gradeId!: string;

  @Prop({ required: true, index: true })
  submissionId!: string;

  @Prop({ required: true })
  integrationId!: string;

  @Prop({
    type: String,
    enum: ['pending', 'sent', 'failed', 'disabled'],
    required: true,
  })
  state!: SyncJobState;

  @Prop({ type: Number, default: 0 })
  attempts!: number;

  @Prop({ required: true })
  score!: number;

  @Prop({ type: String, default: null })
  lastErrorClass!: SyncErrorClass | null;

  @Prop({ type: String, default: null })
  lastError!: string | null;

  @Prop({ type: Date, default: null })
  lastAttemptAt!: Date | null;

  @Prop({ type: Date, default: null })
  nextAttemptAt!: Date | null;

  createdAt!: Date;
  updatedAt!: Date;
}

export type SyncJobDocument = HydratedDocument<SyncJob>;
export const SyncJobSchema = SchemaFactory.createForClass(SyncJob);
// at most one pending job per (grade, integration)
SyncJobSchema.index(
  { gradeId: 1, integrationId: 1 },
  { unique: true, partialFilterExpression: { state: 'pending' } },
);
SyncJobSchema.index({ state: 1, nextAttemptAt: 1 });
