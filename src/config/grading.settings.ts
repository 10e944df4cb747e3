import { ConfigService } from '@nestjs/config';

export const GRADING_SETTINGS = Symbol('GRADING_SETTINGS');

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface GradingSettings {
  readonly gemini: {
    readonly apiKey: string;
    readonly model: string;
    readonly timeoutMs: number;
  };
  readonly ocr: {
    readonly timeoutMs: number;
    readonly minChars: number;
  };
  readonly lms: {
    readonly timeoutMs: number;
  };
  readonly stageRetry: RetryPolicy;
  readonly syncRetry: RetryPolicy;
}

function positiveInt(config: ConfigService, key: string, fallback: number) {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Snapshot of everything the pipeline reads from the environment. Built once,
 * frozen, and handed to the services that need it.
 */
export function loadGradingSettings(config: ConfigService): GradingSettings {
  const baseDelayMs = positiveInt(config, 'RETRY_BASE_DELAY_MS', 1000);
  const maxDelayMs = positiveInt(config, 'RETRY_MAX_DELAY_MS', 60_000);

  const settings: GradingSettings = {
    gemini: {
      apiKey: config.getOrThrow<string>('GEMINI_KEY'),
      model: config.get<string>('GEMINI_MODEL') ?? 'gemini-2.0-flash',
      timeoutMs: positiveInt(config, 'AI_TIMEOUT_MS', 30_000),
    },
    ocr: {
      timeoutMs: positiveInt(config, 'OCR_TIMEOUT_MS', 30_000),
      minChars: positiveInt(config, 'MIN_EXTRACTED_CHARS', 10),
    },
    lms: {
      timeoutMs: positiveInt(config, 'LMS_TIMEOUT_MS', 10_000),
    },
    stageRetry: {
      maxAttempts: Math.max(1, positiveInt(config, 'STAGE_MAX_ATTEMPTS', 3)),
      baseDelayMs,
      maxDelayMs,
    },
    syncRetry: {
      maxAttempts: Math.max(1, positiveInt(config, 'SYNC_MAX_ATTEMPTS', 5)),
      baseDelayMs,
      maxDelayMs,
    },
  };

  return deepFreeze(settings);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}

/** Delay before attempt `failures + 1`, given `failures` consecutive failures. */
export function backoffDelay(policy: RetryPolicy, failures: number): number {
  const exp = Math.max(0, failures - 1);
  return Math.min(policy.baseDelayMs * 2 ** exp, policy.maxDelayMs);
}
