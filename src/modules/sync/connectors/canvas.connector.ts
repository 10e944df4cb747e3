import { Injectable } from '@nestjs/common';
import {
  LmsConnector,
  field,
  idOf,
  lmsRequest,
  readJson,
} from './lms-connector';
import {
  GradeAck,
  GradePush,
  LmsIntegrationConfig,
} from '../interfaces/sync.interface';

@Injectable()
export class CanvasConnector implements LmsConnector {
  readonly type = 'canvas';

  async pushGrade(
    integration: LmsIntegrationConfig,
    push: GradePush,
    timeoutMs: number,
  ): Promise<GradeAck> {
    const url =
      `${integration.baseUrl}/api/v1/courses/${encodeURIComponent(push.externalCourseId)}` +
      `/assignments/${encodeURIComponent(push.externalItemId)}` +
      `/submissions/${encodeURIComponent(push.externalStudentId)}`;

    const res = await lmsRequest(
      'Canvas',
      url,
      {
        method: 'PUT',
        headers: {
          Authorization: `Bearer ${integration.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ submission: { posted_grade: push.score } }),
      },
      timeoutMs,
    );
    return { status: res.status };
  }

  async findStudentId(
    integration: LmsIntegrationConfig,
    email: string,
    timeoutMs: number,
  ): Promise<string | null> {
    const query = new URLSearchParams({ search_term: email, 'include[]': 'email' });
    const res = await lmsRequest(
      'Canvas',
      `${integration.baseUrl}/api/v1/courses/${encodeURIComponent(integration.externalCourseId)}/users?${query}`,
      {
        method: 'GET',
        headers: { Authorization: `Bearer ${integration.apiToken}` },
      },
      timeoutMs,
    );
    const users = await readJson(res);
    if (!Array.isArray(users)) return null;
    const match = users.find((u: unknown) => field(u, 'email') === email);
    return match ? idOf(match) : null;
  }
}
