import { ConsoleLogger, Injectable, LogLevel, Scope } from '@nestjs/common';

const ALL_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose'];
const KNOWN = new Set<string>([...ALL_LEVELS, 'fatal']);

function isLogLevel(value: string): value is LogLevel {
  return KNOWN.has(value);
}

export function resolveLogLevels(
  raw = process.env.LOG_LEVELS,
  env = process.env.NODE_ENV,
): LogLevel[] {
  if (raw) {
    const levels = raw
      .split(',')
      .map((l) => l.trim().toLowerCase())
      .filter(isLogLevel);
    if (levels.length) return levels;
  }
  return env === 'production' ? ['log', 'warn', 'error'] : ALL_LEVELS;
}

@Injectable({ scope: Scope.TRANSIENT })
export class GradewiseLogger extends ConsoleLogger {
  constructor() {
    super('Gradewise', { logLevels: resolveLogLevels() });
  }
}
