import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Schema as MongooseSchema } from 'mongoose';
import {
  FailureInfo,
  RetryState,
  SubmissionInput,
  SubmissionState,
} from '../interfaces/submission.interface';

@Schema({ _id: false })
class RetrySchema implements RetryState {
  @Prop({ type: Number, default: 0 })
  attempts!: number;

  @Prop({ type: Date, default: null })
  nextAttemptAt!: Date | null;

  @Prop({ type: Boolean, default: false })
  strictRubric!: boolean;
}

@Schema({ _id: false })
class FailureSchema implements FailureInfo {
  @Prop({ type: String, required: true })
  reason!: FailureInfo['reason'];

  @Prop({ type: String, required: true })
  message!: string;
}

@Schema({ collection: 'submissions', timestamps: true })
export class Submission {
  @Prop({ required: true, index: true })
  studentRef!: string;

  @Prop({ type: String })
  studentEmail?: string;

  @Prop({ required: true })
  assignmentRef!: string;

  @Prop({ required: true, index: true })
  courseRef!: string;

  @Prop({ type: MongooseSchema.Types.Mixed, required: true })
  input!: SubmissionInput;

  @Prop({
    type: String,
    enum: SubmissionState,
    required: true,
    index: true,
  })
  state!: SubmissionState;

  @Prop({ type: String, default: null })
  extractedText!: string | null;

  @Prop({ type: SchemaFactory.createForClass(FailureSchema), default: null })
  failure!: FailureInfo | null;

  @Prop({
    type: SchemaFactory.createForClass(RetrySchema),
    default: () => ({}),
  })
  retry!: RetryState;

  @Prop({ type: Number, default: 0 })
  evaluationAttempts!: number;

  @Prop({ type: Date, default: null })
  gradedAt!: Date | null;

  @Prop({ type: Number, default: 0 })
  version!: number;

  createdAt!: Date;
  updatedAt!: Date;
}

export type SubmissionDocument = HydratedDocument<Submission>;
export const SubmissionSchema = SchemaFactory.createForClass(Submission);
SubmissionSchema.index({ state: 1, 'retry.nextAttemptAt': 1 });
