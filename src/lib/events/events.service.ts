import { Injectable } from '@nestjs/common';
import { EventEmitter } from 'node:events';
import { AppEventMap } from './events.constants';

@Injectable()
export class AppEvents {
  private readonly emitter = new EventEmitter();

  emit<K extends keyof AppEventMap>(event: K, payload: AppEventMap[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  on<K extends keyof AppEventMap>(
    event: K,
    listener: (payload: AppEventMap[K]) => void,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof AppEventMap>(
    event: K,
    listener: (payload: AppEventMap[K]) => void,
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
