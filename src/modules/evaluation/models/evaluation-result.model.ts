import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  EvaluationOutcome,
  FeedbackItem,
} from '../interfaces/evaluation.interface';

@Schema({ _id: false })
class FeedbackSchema implements FeedbackItem {
  @Prop({ required: true })
  category!: string;

  @Prop({ required: true })
  comment!: string;
}

@Schema({ collection: 'evaluation_results', timestamps: { updatedAt: false } })
export class EvaluationResult {
  @Prop({ required: true, index: true })
  submissionId!: string;

  @Prop({ required: true })
  attempt!: number;

  @Prop({
    type: String,
    enum: ['success', 'transient_failure', 'rejected'],
    required: true,
  })
  outcome!: EvaluationOutcome;

  @Prop({ type: Number, default: null })
  score!: number | null;

  @Prop({ type: Number, default: null })
  rawScore!: number | null;

  @Prop({ type: Boolean, default: false })
  scoreClamped!: boolean;

  @Prop({ type: [SchemaFactory.createForClass(FeedbackSchema)], default: [] })
  feedback!: FeedbackItem[];

  @Prop({ required: true })
  model!: string;

  @Prop({ type: Boolean, default: false })
  strictPrompt!: boolean;

  @Prop({ type: String, default: null })
  error!: string | null;

  @Prop({ type: Boolean, default: false })
  superseded!: boolean;

  createdAt!: Date;
}

export type EvaluationResultDocument = HydratedDocument<EvaluationResult>;
export const EvaluationResultSchema =
  SchemaFactory.createForClass(EvaluationResult);
// attempt numbers are never reused for a submission
EvaluationResultSchema.index({ submissionId: 1, attempt: 1 }, { unique: true });
