import { z } from 'zod';

const isTest = (process.env.NODE_ENV || '').toLowerCase() === 'test';

// Inject test defaults BEFORE schema parsing so Zod doesn't throw for test runs.
if (isTest) {
  if (!process.env.API_KEY) process.env.API_KEY = 'test-api-key';
  if (!process.env.JWT_SECRET) process.env.JWT_SECRET = 'test-jwt-secret';
}

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/** Unset or blank falls back to the default; anything else must be a whole number within range. */
function wholeNumber(name: string, fallback: number, min: number, max?: number) {
  return z.string().optional().transform((value, ctx) => {
    const trimmed = value?.trim() ?? '';
    if (trimmed === '') {
      return fallback;
    }
    if (!/^\d+$/.test(trimmed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a whole number` });
      return z.NEVER;
    }
    const parsed = Number(trimmed);
    if (parsed < min || (max !== undefined && parsed > max)) {
      const range = max === undefined ? `at least ${min}` : `between ${min} and ${max}`;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be ${range}` });
      return z.NEVER;
    }
    return parsed;
  });
}

function flag(name: string, fallback: boolean) {
  return z.string().optional().transform((value, ctx) => {
    const normalized = value?.trim().toLowerCase() ?? '';
    if (normalized === '') return fallback;
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}` });
    return z.NEVER;
  });
}

export const envSchema = z.object({
  PORT: wholeNumber('PORT', 3000, 1, 65535),
  NODE_ENV: z.string().optional(),

  API_KEY: z.string().min(3, 'API_KEY required'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET too short'),

  RATE_LIMIT_WINDOW_MS: wholeNumber('RATE_LIMIT_WINDOW_MS', 60 * 1000, 1000),
  RATE_LIMIT_MAX_REQUESTS: wholeNumber('RATE_LIMIT_MAX_REQUESTS', 120, 1),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  LOG_FILE_ENABLED: flag('LOG_FILE_ENABLED', false),
  LOG_FILE_RETENTION_HOURS: wholeNumber('LOG_FILE_RETENTION_HOURS', 24, 1),

  // Oracle
  ORACLE_STALE_TIMEOUT_SEC: wholeNumber('ORACLE_STALE_TIMEOUT_SEC', 3 * 60 * 60, 1),
  RPC_URL: z.string().url().optional(),
  FEED_REFRESH_INTERVAL_MS: wholeNumber('FEED_REFRESH_INTERVAL_MS', 30_000, 1000),

  // Engine bootstrap
  ENGINE_CONFIG_PATH: z.string().optional(),
  ENGINE_ACCOUNT: z.string().optional(),

  ADDRESS_NORMALIZE_LOWERCASE: flag('ADDRESS_NORMALIZE_LOWERCASE', true)
});

export function buildEnv(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(source);

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV || 'development',
    apiKey: parsed.API_KEY,
    jwtSecret: parsed.JWT_SECRET,

    rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: parsed.RATE_LIMIT_MAX_REQUESTS,

    logLevel: parsed.LOG_LEVEL || (isTest ? 'warn' : 'info'),
    logFileEnabled: parsed.LOG_FILE_ENABLED,
    logFileRetentionHours: parsed.LOG_FILE_RETENTION_HOURS,

    oracleStaleTimeoutSec: parsed.ORACLE_STALE_TIMEOUT_SEC,
    rpcUrl: parsed.RPC_URL,
    feedRefreshIntervalMs: parsed.FEED_REFRESH_INTERVAL_MS,

    engineConfigPath: parsed.ENGINE_CONFIG_PATH || 'config/engine.example.json',
    engineAccount: parsed.ENGINE_ACCOUNT || 'engine',

    addressNormalizeLowercase: parsed.ADDRESS_NORMALIZE_LOWERCASE
  };
}

export type Env = ReturnType<typeof buildEnv>;

export const env: Env = buildEnv(process.env);
