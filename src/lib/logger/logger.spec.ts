import { resolveLogLevels } from './logger';

describe('resolveLogLevels', () => {
  it('keeps production logs quiet by default', () => {
    expect(resolveLogLevels(undefined, 'production')).toEqual(['log', 'warn', 'error']);
  });

  it('logs everything in development', () => {
    expect(resolveLogLevels(undefined, 'development')).toEqual([
      'log',
      'error',
      'warn',
      'debug',
      'verbose',
    ]);
  });

  it('honours an explicit list and drops unknown levels', () => {
    expect(resolveLogLevels(' Warn,error,loud ', 'production')).toEqual(['warn', 'error']);
  });

  it('falls back when nothing in the list is a level', () => {
    expect(resolveLogLevels('loud', 'production')).toEqual(['log', 'warn', 'error']);
  });
});
