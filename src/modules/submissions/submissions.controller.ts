import {
  Body,
  Controller,
  Get,
  Param,
  Post,
  Put,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Express } from 'express';
import { GradingService } from '../grading/grading.service';
import { PipelineService } from '../pipeline/pipeline.service';
import {
  CreateSubmissionDto,
  SubmissionMetaDto,
} from './dto/create-submission.dto';
import { ListSubmissionsQueryDto } from './dto/list-submissions.dto';
import { ManualGradeDto } from './dto/manual-grade.dto';
import { SubmissionsControllerSwagger as docs } from './docs/swagger';
import { SubmissionsService } from './submissions.service';

@docs.controller
@Controller('submissions')
export class SubmissionsController {
  constructor(
    private readonly service: SubmissionsService,
    private readonly pipeline: PipelineService,
    private readonly grading: GradingService,
  ) {}

  @docs.create
  @Post()
  async create(@Body() dto: CreateSubmissionDto) {
    return this.service.createText(dto);
  }

  @docs.upload
  @Post('upload')
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @Body() dto: SubmissionMetaDto,
    @UploadedFile() file?: Express.Multer.File,
  ) {
    return this.service.createUpload(dto, file);
  }

  @docs.list
  @Get()
  async list(@Query() query: ListSubmissionsQueryDto) {
    return this.service.list(query);
  }

  @docs.findOne
  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.service.findOne(id);
  }

  @docs.cancel
  @Post(':id/cancel')
  async cancel(@Param('id') id: string) {
    return this.pipeline.cancel(id);
  }

  @docs.retry
  @Post(':id/retry')
  async retry(@Param('id') id: string) {
    return this.pipeline.retry(id);
  }

  @docs.grade
  @Put(':id/grade')
  async grade(@Param('id') id: string, @Body() dto: ManualGradeDto) {
    return this.grading.applyManualOverride(id, {
      score: dto.score,
      instructorRef: dto.instructorRef,
      comment: dto.comment,
    });
  }
}
