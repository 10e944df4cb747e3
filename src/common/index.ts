export * from './errors';
export * from './request-logger.middleware';
