import { Global, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { EvaluationRepository } from '../evaluation/evaluation.repository';
import {
  EvaluationResult,
  EvaluationResultSchema,
} from '../evaluation/models/evaluation-result.model';
import { MongoEvaluationRepository } from '../evaluation/mongo-evaluation.repository';
import { GradeRepository } from '../grading/grade.repository';
import { Grade, GradeSchema } from '../grading/models/grade.model';
import { MongoGradeRepository } from '../grading/mongo-grade.repository';
import {
  Submission,
  SubmissionSchema,
} from '../submissions/models/submission.model';
import { MongoSubmissionRepository } from '../submissions/mongo-submission.repository';
import { SubmissionRepository } from '../submissions/submission.repository';
import { IntegrationRepository } from '../sync/integration.repository';
import {
  LmsIntegration,
  LmsIntegrationSchema,
} from '../sync/models/lms-integration.model';
import { SyncJob, SyncJobSchema } from '../sync/models/sync-job.model';
import {
  MongoIntegrationRepository,
  MongoSyncJobRepository,
} from '../sync/mongo-sync.repository';
import { SyncJobRepository } from '../sync/sync-job.repository';

/** Binds the storage ports the pipeline depends on to MongoDB. */
@Global()
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Submission.name, schema: SubmissionSchema },
      { name: EvaluationResult.name, schema: EvaluationResultSchema },
      { name: Grade.name, schema: GradeSchema },
      { name: SyncJob.name, schema: SyncJobSchema },
      { name: LmsIntegration.name, schema: LmsIntegrationSchema },
    ]),
  ],
  providers: [
    { provide: SubmissionRepository, useClass: MongoSubmissionRepository },
    { provide: EvaluationRepository, useClass: MongoEvaluationRepository },
    { provide: GradeRepository, useClass: MongoGradeRepository },
    { provide: SyncJobRepository, useClass: MongoSyncJobRepository },
    { provide: IntegrationRepository, useClass: MongoIntegrationRepository },
  ],
  exports: [
    SubmissionRepository,
    EvaluationRepository,
    GradeRepository,
    SyncJobRepository,
    IntegrationRepository,
  ],
})
export class PersistenceModule {}
