import {
  Module,
  MiddlewareConsumer,
  NestModule,
  RequestMethod,
} from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { RequestLoggerMiddleware } from './common';
import { GradingConfigModule } from './config';
import { AwsModule } from './lib/aws';
import { EventsModule } from './lib/events/events.module';
import { LoggerModule } from './lib/logger';
import { QueueModule } from './lib/queue/queue.module';
import { TracingModule } from './lib/tracing';
import { NotificationsModule } from './modules/notifications/notifications.module';
import { PersistenceModule } from './modules/persistence/persistence.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { SubmissionsModule } from './modules/submissions/submissions.module';
import { SyncModule } from './modules/sync/sync.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.getOrThrow<string>('MONGO_URI'),
      }),
    }),

    ScheduleModule.forRoot(),

    LoggerModule,
    EventsModule,
    TracingModule,
    GradingConfigModule,
    AwsModule,
    QueueModule,
    PersistenceModule,
    PipelineModule,
    SyncModule,
    SubmissionsModule,
    NotificationsModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
