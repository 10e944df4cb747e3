import { Module } from '@nestjs/common';
import { PipelineQueueConsumer } from '../../lib/queue/queue.consumer';
import { EvaluationModule } from '../evaluation/evaluation.module';
import { ExtractionModule } from '../extraction/extraction.module';
import { GradingModule } from '../grading/grading.module';
import { SyncModule } from '../sync/sync.module';
import { PipelineService } from './pipeline.service';
import { RetrySweeperService } from './retry-sweeper.service';

@Module({
  imports: [ExtractionModule, EvaluationModule, GradingModule, SyncModule],
  providers: [PipelineService, RetrySweeperService, PipelineQueueConsumer],
  exports: [PipelineService],
})
export class PipelineModule {}
