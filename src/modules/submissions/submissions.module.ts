import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { MAX_UPLOAD_BYTES } from '../../utils/constants';
import { GradingModule } from '../grading/grading.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { SubmissionsController } from './submissions.controller';
import { SubmissionsService } from './submissions.service';

@Module({
  imports: [
    // memory storage: the buffer goes straight to S3
    MulterModule.register({ limits: { fileSize: MAX_UPLOAD_BYTES } }),
    PipelineModule,
    GradingModule,
  ],
  controllers: [SubmissionsController],
  providers: [SubmissionsService],
})
export class SubmissionsModule {}
