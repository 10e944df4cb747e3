import { Global, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PIPELINE_QUEUE } from '../../utils/constants';
import { PipelineQueueProducer } from './queue.producer';

@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        connection: {
          url: cfg.get<string>('REDIS_URL'),
        },
      }),
    }),
    BullModule.registerQueue({ name: PIPELINE_QUEUE }),
  ],
  providers: [PipelineQueueProducer],
  exports: [BullModule, PipelineQueueProducer],
})
export class QueueModule {}
