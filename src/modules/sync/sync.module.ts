import { Module } from '@nestjs/common';
import {
  BlackboardConnector,
  CanvasConnector,
  LMS_CONNECTORS,
  LmsConnector,
  LmsConnectorRegistry,
  MoodleConnector,
} from './connectors';
import { SyncDispatcher } from './sync-dispatcher.service';
import { SyncJobsController } from './sync-jobs.controller';

@Module({
  controllers: [SyncJobsController],
  providers: [
    CanvasConnector,
    MoodleConnector,
    BlackboardConnector,
    {
      provide: LMS_CONNECTORS,
      useFactory: (...connectors: LmsConnector[]) => connectors,
      inject: [CanvasConnector, MoodleConnector, BlackboardConnector],
    },
    LmsConnectorRegistry,
    SyncDispatcher,
  ],
  exports: [SyncDispatcher],
})
export class SyncModule {}
