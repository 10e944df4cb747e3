import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { GradeRevision, GradeSource } from '../interfaces/grade.interface';

const GRADE_SOURCES: GradeSource[] = ['ai', 'manual', 'ai-overridden'];

@Schema({ _id: false })
class GradeRevisionSchema implements GradeRevision {
  @Prop({ required: true })
  score!: number;

  @Prop({ type: String, enum: GRADE_SOURCES, required: true })
  source!: GradeSource;

  @Prop({ type: String, default: null })
  instructorRef!: string | null;

  @Prop({ type: String, default: null })
  evaluationId!: string | null;

  @Prop({ type: Date, required: true })
  changedAt!: Date;
}

@Schema({ collection: 'grades', timestamps: true })
export class Grade {
  @Prop({ required: true, unique: true })
  submissionId!: string;

  @Prop({ required: true, min: 0, max: 100 })
  score!: number;

  @Prop({ type: String, enum: GRADE_SOURCES, required: true })
  source!: GradeSource;

  @Prop({ type: String, default: null })
  evaluationId!: string | null;

  @Prop({ type: String, default: null })
  instructorRef!: string | null;

  @Prop({ type: String, default: null })
  comment!: string | null;

  @Prop({
    type: [SchemaFactory.createForClass(GradeRevisionSchema)],
    default: [],
  })
  history!: GradeRevision[];

  createdAt!: Date;
  updatedAt!: Date;
}

export type GradeDocument = HydratedDocument<Grade>;
export const GradeSchema = SchemaFactory.createForClass(Grade);
