import { Inject, Injectable } from '@nestjs/common';
import { LMS_CONNECTORS, LmsConnector } from './lms-connector';
import { LmsType } from '../interfaces/sync.interface';

@Injectable()
export class LmsConnectorRegistry {
  private readonly byType = new Map<LmsType, LmsConnector>();

  constructor(@Inject(LMS_CONNECTORS) connectors: LmsConnector[]) {
    for (const connector of connectors) {
      this.byType.set(connector.type, connector);
    }
  }

  get(type: LmsType): LmsConnector | undefined {
    return this.byType.get(type);
  }
}
