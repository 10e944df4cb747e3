import { Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';

export interface HealthStatus {
  status: 'ok' | 'degraded';
  version: string;
  database: string;
}

@Injectable()
export class AppService {
  constructor(@InjectConnection() private readonly connection: Connection) {}

  checkHealth(): HealthStatus {
    const state = this.connection.readyState;
    return {
      status: state === ConnectionStates.connected ? 'ok' : 'degraded',
      version: '1.0.0',
      database: ConnectionStates[state],
    };
  }
}
