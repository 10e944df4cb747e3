import { SyncFailure } from '../../../common/errors';
import { integration } from '../../../testing';
import { GradePush } from '../interfaces/sync.interface';
import { BlackboardConnector } from './blackboard.connector';
import { CanvasConnector } from './canvas.connector';
import { classifyHttpStatus } from './lms-connector';
import { MoodleConnector } from './moodle.connector';

const push: GradePush = {
  externalCourseId: '77',
  externalStudentId: '9001',
  externalItemId: '501',
  score: 72,
};

describe('LMS connectors', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  async function failureOf(promise: Promise<unknown>): Promise<SyncFailure> {
    try {
      await promise;
    } catch (err) {
      if (err instanceof SyncFailure) return err;
      throw err;
    }
    throw new Error('expected a SyncFailure');
  }

  describe('CanvasConnector', () => {
    it('puts the posted grade on the student submission', async () => {
      fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));

      const ack = await new CanvasConnector().pushGrade(integration(), push, 1000);

      expect(ack).toEqual({ status: 200 });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(
        'https://lms.example.test/api/v1/courses/77/assignments/501/submissions/9001',
      );
      expect(init).toMatchObject({
        method: 'PUT',
        headers: {
          Authorization: 'Bearer test-token',
          'Content-Type': 'application/json',
        },
        body: '{"submission":{"posted_grade":72}}',
      });
    });

    it('classifies an expired token as an auth failure', async () => {
      fetchMock.mockResolvedValue(
        new Response('{"errors":[{"message":"Invalid access token."}]}', { status: 401 }),
      );

      const failure = await failureOf(
        new CanvasConnector().pushGrade(integration(), push, 1000),
      );

      expect(failure.errorClass).toBe('auth');
      expect(failure.retryable).toBe(false);
      expect(failure.message).toBe(
        'Canvas API error: 401 - {"errors":[{"message":"Invalid access token."}]}',
      );
    });

    it('classifies a timeout as retryable', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      fetchMock.mockRejectedValue(timeout);

      const failure = await failureOf(
        new CanvasConnector().pushGrade(integration(), push, 1000),
      );

      expect(failure.errorClass).toBe('timeout');
      expect(failure.retryable).toBe(true);
      expect(failure.message).toBe('Canvas timed out after 1000ms');
    });

    it('classifies a refused connection as a network failure', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      const failure = await failureOf(
        new CanvasConnector().pushGrade(integration(), push, 1000),
      );

      expect(failure.errorClass).toBe('network');
      expect(failure.message).toBe('Canvas unreachable: TypeError: fetch failed');
    });
  });

  describe('CanvasConnector.findStudentId', () => {
    it('searches the course roster and matches the exact email', async () => {
      fetchMock.mockResolvedValue(
        new Response(
          JSON.stringify([
            { id: 9002, email: 'student.two@example.com' },
            { id: 9001, email: 'student@example.com' },
          ]),
          { status: 200 },
        ),
      );

      const id = await new CanvasConnector().findStudentId(
        integration(),
        'student@example.com',
        1000,
      );

      expect(id).toBe('9001');
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(
        'https://lms.example.test/api/v1/courses/77/users?search_term=student%40example.com&include%5B%5D=email',
      );
      expect(init).toMatchObject({
        method: 'GET',
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('returns null when nobody on the roster has the email', async () => {
      fetchMock.mockResolvedValue(new Response('[]', { status: 200 }));

      await expect(
        new CanvasConnector().findStudentId(integration(), 'student@example.com', 1000),
      ).resolves.toBeNull();
    });
  });

  describe('MoodleConnector', () => {
    const moodle = integration({ id: 'int-moodle', type: 'moodle' });

    it('calls core_grades_update_grades with form parameters', async () => {
      fetchMock.mockResolvedValue(new Response('0', { status: 200 }));

      await expect(new MoodleConnector().pushGrade(moodle, push, 1000)).resolves.toEqual({
        status: 200,
      });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://lms.example.test/webservice/rest/server.php');
      const form = new URLSearchParams(String(init.body));
      expect(form.get('wstoken')).toBe('test-token');
      expect(form.get('wsfunction')).toBe('core_grades_update_grades');
      expect(form.get('courseid')).toBe('77');
      expect(form.get('activityid')).toBe('501');
      expect(form.get('grades[0][studentid]')).toBe('9001');
      expect(form.get('grades[0][grade]')).toBe('72');
    });

    it('treats an exception in a 200 response as rejected', async () => {
      fetchMock.mockResolvedValue(
        new Response('{"exception":"moodle_exception","message":"Invalid token"}', {
          status: 200,
        }),
      );

      const failure = await failureOf(new MoodleConnector().pushGrade(moodle, push, 1000));

      expect(failure.errorClass).toBe('rejected');
      expect(failure.message).toBe('Moodle API warning: Invalid token');
    });

    it('looks a user up by email', async () => {
      fetchMock.mockResolvedValue(
        new Response('[{"id":315,"email":"student@example.com"}]', { status: 200 }),
      );

      const id = await new MoodleConnector().findStudentId(
        moodle,
        'student@example.com',
        1000,
      );

      expect(id).toBe('315');
      const form = new URLSearchParams(String(fetchMock.mock.calls[0][1].body));
      expect(form.get('wsfunction')).toBe('core_user_get_users_by_field');
      expect(form.get('field')).toBe('email');
      expect(form.get('values[0]')).toBe('student@example.com');
    });

    it('treats a non-zero status as rejected', async () => {
      fetchMock.mockResolvedValue(new Response('1', { status: 200 }));

      const failure = await failureOf(new MoodleConnector().pushGrade(moodle, push, 1000));

      expect(failure.message).toBe('Moodle API warning: grade update status 1');
    });
  });

  describe('BlackboardConnector', () => {
    it('patches the gradebook column for the user', async () => {
      fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));

      await new BlackboardConnector().pushGrade(
        integration({ type: 'blackboard' }),
        push,
        1000,
      );

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(
        'https://lms.example.test/learn/api/public/v1/courses/77/gradebook/columns/501/users/9001',
      );
      expect(init).toMatchObject({ method: 'PATCH', body: '{"score":72}' });
    });

    it('finds a user by user name or contact email', async () => {
      fetchMock.mockResolvedValue(
        new Response(
          JSON.stringify({
            results: [
              { id: '_12_1', userName: 'other' },
              { id: '_34_1', userName: 'jdoe', contact: { email: 'student@example.com' } },
            ],
          }),
          { status: 200 },
        ),
      );

      const id = await new BlackboardConnector().findStudentId(
        integration({ type: 'blackboard' }),
        'student@example.com',
        1000,
      );

      expect(id).toBe('_34_1');
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://lms.example.test/learn/api/public/v1/users?userName=student%40example.com',
      );
    });

    it('retries server errors', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 503 }));

      const failure = await failureOf(
        new BlackboardConnector().pushGrade(integration({ type: 'blackboard' }), push, 1000),
      );

      expect(failure.errorClass).toBe('server_error');
      expect(failure.retryable).toBe(true);
      expect(failure.message).toBe('Blackboard API error: 503');
    });
  });
});

describe('classifyHttpStatus', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [404, 'not_found'],
    [408, 'timeout'],
    [429, 'rate_limited'],
    [500, 'server_error'],
    [502, 'server_error'],
    [400, 'rejected'],
    [422, 'rejected'],
  ])('maps %p to %s', (status, expected) => {
    expect(classifyHttpStatus(status)).toBe(expected);
  });
});
