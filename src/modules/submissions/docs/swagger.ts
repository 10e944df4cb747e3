import { applyDecorators } from '@nestjs/common';
import {
  ApiBody,
  ApiConsumes,
  ApiExtraModels,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
  getSchemaPath,
} from '@nestjs/swagger';
import { SubmissionMetaDto } from '../dto/create-submission.dto';

const idParam = ApiParam({
  name: 'id',
  description: 'Submission id',
  schema: { type: 'string' },
});

export const SubmissionsControllerSwagger = {
  controller: applyDecorators(
    ApiTags('submissions'),
    ApiExtraModels(SubmissionMetaDto),
  ),

  create: applyDecorators(
    ApiOperation({ summary: 'Submit typed work for grading' }),
    ApiResponse({ status: 201, description: 'Submission, now extracting' }),
  ),

  upload: applyDecorators(
    ApiOperation({ summary: 'Submit a scanned image or PDF for grading' }),
    ApiConsumes('multipart/form-data'),
    ApiBody({
      schema: {
        allOf: [
          { $ref: getSchemaPath(SubmissionMetaDto) },
          {
            type: 'object',
            properties: {
              file: {
                type: 'string',
                format: 'binary',
                description: 'PNG, JPEG, GIF, WebP or PDF, up to 10 MB',
              },
            },
            required: ['file'],
          },
        ],
      },
    }),
    ApiResponse({ status: 201, description: 'Submission, now extracting' }),
    ApiResponse({ status: 400, description: 'Missing or unsupported file' }),
  ),

  list: applyDecorators(
    ApiOperation({ summary: 'List submissions for the instructor dashboard' }),
    ApiResponse({ status: 200, description: 'Newest submissions first' }),
  ),

  findOne: applyDecorators(
    ApiOperation({
      summary: 'Submission with its grade, evaluation attempts and sync jobs',
    }),
    idParam,
    ApiResponse({ status: 200, description: 'Submission detail' }),
    ApiResponse({ status: 404, description: 'Submission not found' }),
  ),

  cancel: applyDecorators(
    ApiOperation({ summary: 'Cancel a submission that is not graded yet' }),
    idParam,
    ApiResponse({ status: 201, description: 'Cancelled submission' }),
    ApiResponse({ status: 409, description: 'Submission can no longer be cancelled' }),
  ),

  retry: applyDecorators(
    ApiOperation({ summary: 'Rerun the failed stage of a submission' }),
    idParam,
    ApiResponse({ status: 201, description: 'Restarted submission' }),
    ApiResponse({ status: 409, description: 'Submission has not failed' }),
  ),

  grade: applyDecorators(
    ApiOperation({ summary: 'Enter or override the grade manually' }),
    idParam,
    ApiResponse({
      status: 200,
      description: 'Submission, grade and the sync jobs it triggered',
    }),
    ApiResponse({ status: 409, description: 'Submission was cancelled' }),
  ),
};
