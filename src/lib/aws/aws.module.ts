import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AwsService } from './aws.service';
import { FileStore } from './file-store';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [AwsService, { provide: FileStore, useExisting: AwsService }],
  exports: [FileStore],
})
export class AwsModule {}
