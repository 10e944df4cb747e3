import { Controller, Param, Post } from '@nestjs/common';
import { SyncDispatcher } from './sync-dispatcher.service';
import { SyncJobsControllerSwagger as docs } from './docs/swagger';

@docs.controller
@Controller('sync-jobs')
export class SyncJobsController {
  constructor(private readonly dispatcher: SyncDispatcher) {}

  @docs.retry
  @Post(':id/retry')
  async retry(@Param('id') id: string) {
    return this.dispatcher.retryJob(id);
  }
}
