import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  PUBLIC_BASE_URL: z.string().min(1),
  SPEECH_CHANNEL_TOKEN: z.string().min(1),
  REDIS_URL: z.string().min(1),
  GLOBAL_CONCURRENCY_CAP: z.coerce.number().int().positive(),
  CALLS_PER_MIN_CAP: z.coerce.number().int().positive(),
  CAPACITY_TTL_SECONDS: z.coerce.number().int().positive(),
  CAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('cap')),
  SESSION_IDLE_TTL_MINUTES: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30),
  ),
  CALL_DRAIN_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(15000),
  ),
  BACKEND_WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  WEBHOOK_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  WEBHOOK_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000),
  ),
  CALENDAR_SERVICE_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CALENDAR_EMAIL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  CALENDAR_TIMEZONE: z.preprocess(emptyToUndefined, z.string().min(1).default('Europe/Brussels')),
  CALENDAR_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(8000),
  ),
  CALENDAR_POOL_CONNECTIONS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(10),
  ),
  USER_AWAY_TIMEOUT_S: z.preprocess(emptyToUndefined, z.coerce.number().positive().default(4)),
  OPEN_QUESTIONS_AWAY_TIMEOUT_S: z.preprocess(
    emptyToUndefined,
    z.coerce.number().positive().default(6),
  ),
  AGENT_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Anna')),
  COMPANY_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Jobline')),
  USAGE_LOG_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
  USAGE_LOG_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('usage_logs')),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
