import { z, ZodError } from 'zod';

const queueList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  )
  .pipe(z.array(z.string()).min(1, { message: 'WORKER_QUEUES must name at least one queue' }));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema with strict validation
 * Retry, staleness and visibility values are configuration with defaults, not constants.
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().default(3000),

    // Auth
    JWT_SECRET: z.string().min(1),

    // Toolkit model provider
    OPENAI_API_KEY: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string().regex(/^sk-/).optional()
    ),
    OPENAI_MODEL: z.string().default('gpt-4o'),

    // OAuth client used for credential refresh
    GOOGLE_CLIENT_ID: z.string().optional(),
    GOOGLE_CLIENT_SECRET: z.string().optional(),
    GOOGLE_TOKEN_URI: z.string().url().default('https://oauth2.googleapis.com/token'),

    // Data storage
    SQLITE_DB_PATH: z.string().default('./data/agent-runs.db'),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_FILE: z.string().optional(),

    // Queue
    QUEUE_DRIVER: z.enum(['sqlite', 'memory']).default('sqlite'),
    JOB_QUEUE_NAME: z.string().min(1).default('agent_runs'),
    QUEUE_VISIBILITY_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(35 * 60),

    // Workers
    WORKER_QUEUES: queueList.default('agent_runs,default'),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(2),
    WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
    EMBEDDED_WORKERS: booleanFlag.default('false'),

    // Retry policy
    JOB_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    JOB_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    JOB_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
    JOB_RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.1),

    // Recovery and retention
    JOB_STALE_AFTER_MINUTES: z.coerce
      .number()
      .int()
      .min(1, { message: 'JOB_STALE_AFTER_MINUTES must be at least 1' })
      .default(30),
    JOB_ORPHAN_AFTER_MINUTES: z.coerce.number().int().min(1).default(5),
    JOB_RECONCILE_INTERVAL_MINUTES: z.coerce
      .number()
      .int()
      .min(1, { message: 'JOB_RECONCILE_INTERVAL_MINUTES must be at least 1' })
      .max(59)
      .default(5),
    JOB_RETENTION_DAYS: z.coerce.number().int().min(1).default(7),

    CREDENTIAL_REFRESH_SKEW_SECONDS: z.coerce.number().int().min(0).default(60),
  })
  .refine((env) => env.QUEUE_DRIVER !== 'memory' || env.EMBEDDED_WORKERS, {
    message: 'QUEUE_DRIVER=memory requires EMBEDDED_WORKERS=true',
    path: ['QUEUE_DRIVER'],
  })
  .refine(
    (env) => env.QUEUE_VISIBILITY_TIMEOUT_SECONDS > env.JOB_STALE_AFTER_MINUTES * 60,
    {
      message: 'QUEUE_VISIBILITY_TIMEOUT_SECONDS must exceed JOB_STALE_AFTER_MINUTES',
      path: ['QUEUE_VISIBILITY_TIMEOUT_SECONDS'],
    }
  )
  .refine((env) => env.WORKER_QUEUES.includes(env.JOB_QUEUE_NAME), {
    message: 'WORKER_QUEUES must include JOB_QUEUE_NAME',
    path: ['WORKER_QUEUES'],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
