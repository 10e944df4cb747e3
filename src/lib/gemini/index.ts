export * from './gemini-errors';
