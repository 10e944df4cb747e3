export * from './file-store';
export * from './aws.module';
