import { z } from 'zod';
import { isValidTimeZone } from './shared/calendar';

export const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  apiSecretKey: z.string().min(16),
  corsOrigins: z.string().transform((s) => s.split(',')).default('*'),

  // Database
  databaseUrl: z.string().url(),

  // Redis
  redisUrl: z.string().default('redis://localhost:6379'),

  // Worker
  workerConcurrency: z.coerce.number().int().positive().default(4),
  jobTimeoutMs: z.coerce.number().default(30000),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Calendar used for day buckets and dayparts when a request names none
  defaultTimeZone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),

  // Staff alerts (Chatwoot). All four or none.
  chatwoot: z
    .object({
      url: z.string().url(),
      apiKey: z.string().min(1),
      accountId: z.coerce.number().int().positive(),
      staffConversationId: z.coerce.number().int().positive(),
    })
    .optional(),

  // Escalation thresholds
  escalation: z.object({
    highPainThreshold: z.coerce.number().int().min(0).max(10).default(8),
    moodEscalationThreshold: z.enum(['sad', 'neutral', 'good']).default('sad'),
    rapidPainLookbackDays: z.coerce.number().int().positive().default(3),
    rapidPainIncrease: z.coerce.number().int().positive().default(3),
    rapidPainFloor: z.coerce.number().int().min(0).max(10).default(6),
    rapidMoodLookbackDays: z.coerce.number().int().positive().default(5),
    minTrendSamples: z.coerce.number().int().min(2).default(3),
    notificationCooldownHours: z.coerce.number().nonnegative().default(12),
    consecutiveSadMoodCount: z.coerce.number().int().min(1).default(2),
    maxHistorySamples: z.coerce.number().int().positive().default(15),
  }),
});

function chatwootFromEnv(): Record<string, string | undefined> | undefined {
  const values = {
    url: process.env.CHATWOOT_URL,
    apiKey: process.env.CHATWOOT_API_KEY,
    accountId: process.env.CHATWOOT_ACCOUNT_ID,
    staffConversationId: process.env.CHATWOOT_STAFF_CONVERSATION_ID,
  };
  // Unset (or all blank) means alerts go to the log only
  return Object.values(values).some((v) => v) ? values : undefined;
}

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    corsOrigins: process.env.CORS_ORIGINS,
    databaseUrl: process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    workerConcurrency: process.env.WORKER_CONCURRENCY,
    jobTimeoutMs: process.env.JOB_TIMEOUT_MS,
    logLevel: process.env.LOG_LEVEL,
    defaultTimeZone: process.env.DEFAULT_TIME_ZONE,
    chatwoot: chatwootFromEnv(),
    escalation: {
      highPainThreshold: process.env.ESCALATION_HIGH_PAIN_THRESHOLD,
      moodEscalationThreshold: process.env.ESCALATION_MOOD_THRESHOLD,
      rapidPainLookbackDays: process.env.ESCALATION_RAPID_PAIN_LOOKBACK_DAYS,
      rapidPainIncrease: process.env.ESCALATION_RAPID_PAIN_INCREASE,
      rapidPainFloor: process.env.ESCALATION_RAPID_PAIN_FLOOR,
      rapidMoodLookbackDays: process.env.ESCALATION_RAPID_MOOD_LOOKBACK_DAYS,
      minTrendSamples: process.env.ESCALATION_MIN_TREND_SAMPLES,
      notificationCooldownHours: process.env.ESCALATION_COOLDOWN_HOURS,
      consecutiveSadMoodCount: process.env.ESCALATION_CONSECUTIVE_SAD_COUNT,
      maxHistorySamples: process.env.ESCALATION_MAX_HISTORY_SAMPLES,
    },
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
