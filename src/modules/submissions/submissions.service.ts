import {
  BadRequestException,
  Inject,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { Express } from 'express';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import { FileStore } from '../../lib/aws';
import { GradewiseLogger } from '../../lib/logger';
import { PipelineQueueProducer } from '../../lib/queue/queue.producer';
import { MAX_UPLOAD_BYTES } from '../../utils/constants';
import { EvaluationRepository } from '../evaluation/evaluation.repository';
import { EvaluationRecord } from '../evaluation/interfaces/evaluation.interface';
import { SUPPORTED_MIME_TYPES } from '../extraction/file-signature';
import { GradeRepository } from '../grading/grade.repository';
import { GradeRecord } from '../grading/interfaces/grade.interface';
import { applyTransition } from '../pipeline/apply-transition';
import { SyncJobRecord } from '../sync/interfaces/sync.interface';
import { SyncJobRepository } from '../sync/sync-job.repository';
import {
  CreateSubmissionDto,
  SubmissionMetaDto,
} from './dto/create-submission.dto';
import { ListSubmissionsQueryDto } from './dto/list-submissions.dto';
import {
  NewSubmission,
  SubmissionRecord,
} from './interfaces/submission.interface';
import { SubmissionRepository } from './submission.repository';

export interface SubmissionDetail {
  submission: SubmissionRecord;
  grade: GradeRecord | null;
  evaluations: EvaluationRecord[];
  syncJobs: SyncJobRecord[];
}

const DEFAULT_PAGE_SIZE = 50;

function isSupportedMimeType(value: string): boolean {
  return SUPPORTED_MIME_TYPES.some((t) => t === value);
}

@Injectable()
export class SubmissionsService {
  constructor(
    private readonly submissions: SubmissionRepository,
    private readonly evaluations: EvaluationRepository,
    private readonly grades: GradeRepository,
    private readonly syncJobs: SyncJobRepository,
    private readonly files: FileStore,
    private readonly producer: PipelineQueueProducer,
    @Inject(GRADING_SETTINGS) private readonly settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(SubmissionsService.name);
  }

  async createText(dto: CreateSubmissionDto): Promise<SubmissionRecord> {
    const { text, ...meta } = dto;
    return this.intake({ ...this.meta(meta), input: { kind: 'text', text } });
  }

  async createUpload(
    dto: SubmissionMetaDto,
    file?: Express.Multer.File,
  ): Promise<SubmissionRecord> {
    this.validateFile(file);
    const { key } = await this.files.upload(
      file.originalname,
      file.buffer,
      file.mimetype,
    );
    return this.intake({
      ...this.meta(dto),
      input: {
        kind: 'file',
        fileKey: key,
        mimeType: file.mimetype,
        filename: file.originalname,
      },
    });
  }

  async findOne(id: string): Promise<SubmissionDetail> {
    const submission = await this.submissions.findById(id);
    if (!submission) throw new NotFoundException('Submission not found');
    const [grade, evaluations, syncJobs] = await Promise.all([
      this.grades.findBySubmission(id),
      this.evaluations.listBySubmission(id),
      this.syncJobs.listBySubmission(id),
    ]);
    return { submission, grade, evaluations, syncJobs };
  }

  async list(query: ListSubmissionsQueryDto): Promise<SubmissionRecord[]> {
    return this.submissions.list({
      state: query.state,
      courseRef: query.courseRef,
      limit: query.limit ?? DEFAULT_PAGE_SIZE,
    });
  }

  private meta(dto: SubmissionMetaDto): Omit<NewSubmission, 'input'> {
    return {
      studentRef: dto.studentRef,
      studentEmail: dto.studentEmail,
      assignmentRef: dto.assignmentRef,
      courseRef: dto.courseRef,
    };
  }

  private async intake(data: NewSubmission): Promise<SubmissionRecord> {
    const created = await this.submissions.create(data);
    const started = await applyTransition(
      this.submissions,
      created.id,
      { type: 'start' },
      this.settings.stageRetry,
    );
    await this.producer.enqueueAdvance(started.id);
    this.logger.log(
      `Submission ${started.id} received from ${started.studentRef} (${data.input.kind})`,
    );
    return started;
  }

  private validateFile(
    file?: Express.Multer.File,
  ): asserts file is Express.Multer.File {
    if (!file) throw new BadRequestException('No file provided');
    if (!isSupportedMimeType(file.mimetype)) {
      throw new BadRequestException(
        'Invalid file type – PNG, JPEG, GIF, WebP or PDF only',
      );
    }
    if (file.size > MAX_UPLOAD_BYTES) {
      throw new BadRequestException('File is larger than 10 MB');
    }
  }
}
