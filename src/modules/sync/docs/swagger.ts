import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

export const SyncJobsControllerSwagger = {
  controller: applyDecorators(ApiTags('sync-jobs')),

  retry: applyDecorators(
    ApiOperation({
      summary: 'Re-trigger delivery of a failed grade sync job',
    }),
    ApiParam({ name: 'id', schema: { type: 'string' } }),
    ApiResponse({ status: 201, description: 'Sync job, back in pending' }),
    ApiResponse({ status: 404, description: 'Sync job not found' }),
    ApiResponse({ status: 409, description: 'Sync job has not failed' }),
  ),
};
