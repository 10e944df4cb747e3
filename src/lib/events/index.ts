export * from './events.constants';
export * from './events.service';
export * from './events.module';
