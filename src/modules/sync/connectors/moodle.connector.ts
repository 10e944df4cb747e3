import { Injectable } from '@nestjs/common';
import { SyncFailure } from '../../../common/errors';
import { LmsConnector, idOf, lmsRequest, readJson } from './lms-connector';
import {
  GradeAck,
  GradePush,
  LmsIntegrationConfig,
} from '../interfaces/sync.interface';

interface MoodleWarning {
  message?: string;
}

function readWarnings(body: unknown): MoodleWarning[] {
  // the web service returns a numeric grade_update status, 0 meaning ok
  if (typeof body === 'number') {
    return body === 0 ? [] : [{ message: `grade update status ${body}` }];
  }
  if (!body || typeof body !== 'object') return [];
  if ('exception' in body) {
    const message = 'message' in body ? String(body.message) : 'exception';
    return [{ message }];
  }
  if ('warnings' in body && Array.isArray(body.warnings)) {
    return body.warnings.map((w: unknown) => ({
      message:
        w && typeof w === 'object' && 'message' in w
          ? String(w.message)
          : String(w),
    }));
  }
  return [];
}

/** Moodle web services: `core_grades_update_grades`. */
@Injectable()
export class MoodleConnector implements LmsConnector {
  readonly type = 'moodle';

  async pushGrade(
    integration: LmsIntegrationConfig,
    push: GradePush,
    timeoutMs: number,
  ): Promise<GradeAck> {
    const params = new URLSearchParams({
      wstoken: integration.apiToken,
      wsfunction: 'core_grades_update_grades',
      moodlewsrestformat: 'json',
      source: 'gradewise',
      courseid: push.externalCourseId,
      component: 'mod_assign',
      activityid: push.externalItemId,
      itemnumber: '0',
      'grades[0][studentid]': push.externalStudentId,
      'grades[0][grade]': String(push.score),
    });

    const res = await lmsRequest(
      'Moodle',
      `${integration.baseUrl}/webservice/rest/server.php`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: params.toString(),
      },
      timeoutMs,
    );

    // Moodle answers 200 even when it refuses the update
    const body = await readJson(res);
    const warnings = readWarnings(body);
    if (warnings.length) {
      throw new SyncFailure(
        'rejected',
        `Moodle API warning: ${warnings.map((w) => w.message).join('; ')}`,
      );
    }
    return { status: res.status };
  }

  async findStudentId(
    integration: LmsIntegrationConfig,
    email: string,
    timeoutMs: number,
  ): Promise<string | null> {
    const params = new URLSearchParams({
      wstoken: integration.apiToken,
      wsfunction: 'core_user_get_users_by_field',
      moodlewsrestformat: 'json',
      field: 'email',
      'values[0]': email,
    });
    const res = await lmsRequest(
      'Moodle',
      `${integration.baseUrl}/webservice/rest/server.php`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: params.toString(),
      },
      timeoutMs,
    );
    const users = await readJson(res);
    return Array.isArray(users) && users.length ? idOf(users[0]) : null;
  }
}
