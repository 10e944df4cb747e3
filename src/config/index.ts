export * from './grading.settings';
export * from './config.module';
