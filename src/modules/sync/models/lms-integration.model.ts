import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { LmsType } from '../interfaces/sync.interface';

@Schema({ collection: 'lms_integrations', timestamps: true })
export class LmsIntegration {
  @Prop({ required: true, index: true })
  courseRef!: string;

  @Prop({
    type: String,
    enum: ['canvas', 'moodle', 'blackboard'],
    required: true,
  })
  type!: LmsType;

  @Prop({ required: true })
  baseUrl!: string;

  @Prop({ required: true })
  apiToken!: string;

  @Prop({ required: true })
  externalCourseId!: string;

  @Prop({ type: Map, of: String, default: {} })
  assignmentMap!: Map<string, string>;

  @Prop({ type: Map, of: String, default: {} })
  studentMap!: Map<string, string>;

  @Prop({ type: Boolean, default: true })
  active!: boolean;

  @Prop({ type: Boolean, default: true })
  syncEnabled!: boolean;
}

export type LmsIntegrationDocument = HydratedDocument<LmsIntegration>;
export const LmsIntegrationSchema = SchemaFactory.createForClass(LmsIntegration);
