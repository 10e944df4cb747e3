export * from './tracing.module';
export * from './tracing.service';
