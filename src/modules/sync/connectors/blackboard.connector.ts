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
export class BlackboardConnector implements LmsConnector {
  readonly type = 'blackboard';

  async pushGrade(
    integration: LmsIntegrationConfig,
    push: GradePush,
    timeoutMs: number,
  ): Promise<GradeAck> {
    const url =
      `${integration.baseUrl}/learn/api/public/v1/courses/${encodeURIComponent(push.externalCourseId)}` +
      `/gradebook/columns/${encodeURIComponent(push.externalItemId)}` +
      `/users/${encodeURIComponent(push.externalStudentId)}`;

    const res = await lmsRequest(
      'Blackboard',
      url,
      {
        method: 'PATCH',
        headers: {
          Authorization: `Bearer ${integration.apiToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ score: push.score }),
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
    const query = new URLSearchParams({ userName: email });
    const res = await lmsRequest(
      'Blackboard',
      `${integration.baseUrl}/learn/api/public/v1/users?${query}`,
      {
        method: 'GET',
        headers: { Authorization: `Bearer ${integration.apiToken}` },
      },
      timeoutMs,
    );
    const results = field(await readJson(res), 'results');
    if (!Array.isArray(results)) return null;
    const match = results.find(
      (u: unknown) =>
        field(u, 'userName') === email ||
        field(field(u, 'contact'), 'email') === email,
    );
    return match ? idOf(match) : null;
  }
}
