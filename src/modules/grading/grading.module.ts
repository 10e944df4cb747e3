import { Module } from '@nestjs/common';
import { SyncModule } from '../sync/sync.module';
import { GradeReconciler } from './grade-reconciler.service';
import { GradingService } from './grading.service';

@Module({
  imports: [SyncModule],
  providers: [GradeReconciler, GradingService],
  exports: [GradeReconciler, GradingService],
})
export class GradingModule {}
