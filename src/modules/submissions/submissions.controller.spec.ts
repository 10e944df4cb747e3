import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import {
  FakeEvaluationModel,
  PipelineHarness,
  evaluationJson,
  mockLogger,
} from '../../testing';
import { GradingService } from '../grading/grading.service';
import { PipelineService } from '../pipeline/pipeline.service';
import { SyncDispatcher } from '../sync/sync-dispatcher.service';
import { SyncJobsController } from '../sync/sync-jobs.controller';
import { SubmissionState } from './interfaces/submission.interface';
import { SubmissionsController } from './submissions.controller';
import { SubmissionsService } from './submissions.service';

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01]);

describe('Submissions HTTP API', () => {
  let app: INestApplication;
  let h: PipelineHarness;

  beforeEach(async () => {
    h = new PipelineHarness({ model: new FakeEvaluationModel([evaluationJson(72)]) });
    const service = new SubmissionsService(
      h.submissions,
      h.evaluations,
      h.grades,
      h.syncJobs,
      h.files,
      h.queue.producer,
      h.settings,
      mockLogger(),
    );

    const moduleRef = await Test.createTestingModule({
      controllers: [SubmissionsController, SyncJobsController],
      providers: [
        { provide: SubmissionsService, useValue: service },
        { provide: PipelineService, useValue: h.pipeline },
        { provide: GradingService, useValue: h.grading },
        { provide: SyncDispatcher, useValue: h.dispatcher },
      ],
    }).compile();

    app = moduleRef.createNestApplication();
    app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const meta = {
    studentRef: 'stu-1',
    assignmentRef: 'essay-1',
    courseRef: 'eng-101',
  };

  it('accepts typed work and queues it', async () => {
    const res = await request(app.getHttpServer())
      .post('/submissions')
      .send({ ...meta, text: 'The cat sat on the mat.' })
      .expect(201);

    expect(res.body).toMatchObject({
      id: 'sub-1',
      state: SubmissionState.EXTRACTING,
      input: { kind: 'text', text: 'The cat sat on the mat.' },
    });
    expect(h.queue.advances).toEqual([{ submissionId: 'sub-1', delayMs: 0 }]);
  });

  it('validates the request body', async () => {
    const res = await request(app.getHttpServer())
      .post('/submissions')
      .send({ ...meta, studentEmail: 'not-an-email' })
      .expect(400);

    expect(res.body.message).toEqual(
      expect.arrayContaining(['studentEmail must be an email', 'text should not be empty']),
    );
  });

  it('stores an uploaded scan and records where it went', async () => {
    const res = await request(app.getHttpServer())
      .post('/submissions/upload')
      .field('studentRef', 'stu-1')
      .field('assignmentRef', 'essay-1')
      .field('courseRef', 'eng-101')
      .attach('file', PNG, { filename: 'scan.png', contentType: 'image/png' })
      .expect(201);

    expect(res.body.input).toEqual({
      kind: 'file',
      fileKey: 'submissions/1-scan.png',
      mimeType: 'image/png',
      filename: 'scan.png',
    });
    expect(h.files.files.get('submissions/1-scan.png')).toEqual(PNG);
  });

  it('refuses an upload that is not an image or PDF', async () => {
    const res = await request(app.getHttpServer())
      .post('/submissions/upload')
      .field('studentRef', 'stu-1')
      .field('assignmentRef', 'essay-1')
      .field('courseRef', 'eng-101')
      .attach('file', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' })
      .expect(400);

    expect(res.body.message).toBe('Invalid file type – PNG, JPEG, GIF, WebP or PDF only');
  });

  it('refuses an upload without a file', async () => {
    const res = await request(app.getHttpServer())
      .post('/submissions/upload')
      .field('studentRef', 'stu-1')
      .field('assignmentRef', 'essay-1')
      .field('courseRef', 'eng-101')
      .expect(400);

    expect(res.body.message).toBe('No file provided');
  });

  it('shows a submission with its grade and evaluations', async () => {
    const submission = await h.submitText('The cat sat on the mat.');
    await h.pipeline.advance(submission.id);

    const res = await request(app.getHttpServer())
      .get(`/submissions/${submission.id}`)
      .expect(200);

    expect(res.body.submission.state).toBe(SubmissionState.GRADED);
    expect(res.body.grade).toMatchObject({ score: 72, source: 'ai' });
    expect(res.body.evaluations).toHaveLength(1);
    expect(res.body.syncJobs).toEqual([]);
  });

  it('returns 404 for an unknown submission', async () => {
    await request(app.getHttpServer()).get('/submissions/sub-404').expect(404);
  });

  it('filters the list by state', async () => {
    await h.submitText('first');
    const second = await h.submitText('second');
    await h.pipeline.cancel(second.id);

    const res = await request(app.getHttpServer())
      .get('/submissions')
      .query({ state: 'cancelled', limit: '10' })
      .expect(200);

    expect(res.body.map((s: { id: string }) => s.id)).toEqual([second.id]);
  });

  it('rejects an out-of-range page size', async () => {
    await request(app.getHttpServer()).get('/submissions').query({ limit: '500' }).expect(400);
  });

  it('takes an instructor grade', async () => {
    const submission = await h.submitText('The cat sat on the mat.');

    const res = await request(app.getHttpServer())
      .put(`/submissions/${submission.id}/grade`)
      .send({ score: 80, instructorRef: 'instructor-1', comment: 'Nice work.' })
      .expect(200);

    expect(res.body.grade).toMatchObject({
      score: 80,
      source: 'manual',
      instructorRef: 'instructor-1',
      comment: 'Nice work.',
    });
  });

  it('rejects a score above 100', async () => {
    const submission = await h.submitText('The cat sat on the mat.');
    await request(app.getHttpServer())
      .put(`/submissions/${submission.id}/grade`)
      .send({ score: 120, instructorRef: 'instructor-1' })
      .expect(400);
  });

  it('maps an illegal lifecycle action to 409', async () => {
    const submission = await h.submitText('The cat sat on the mat.');
    const res = await request(app.getHttpServer())
      .post(`/submissions/${submission.id}/retry`)
      .expect(409);

    expect(res.body.message).toBe('Cannot apply "retry" to a submission in state "new"');
  });

  it('cancels a submission', async () => {
    const submission = await h.submitText('The cat sat on the mat.');
    const res = await request(app.getHttpServer())
      .post(`/submissions/${submission.id}/cancel`)
      .expect(201);

    expect(res.body.state).toBe(SubmissionState.CANCELLED);
  });

  it('refuses to retry a sync job that has not failed', async () => {
    const job = await h.syncJobs.create({
      gradeId: 'grade-1',
      submissionId: 'sub-1',
      integrationId: 'int-canvas',
      state: 'pending',
      score: 72,
    });

    await request(app.getHttpServer()).post(`/sync-jobs/${job.id}/retry`).expect(409);
  });
});
