import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  )
  .pipe(z.array(z.string().min(1)).min(1));

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // AWS
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(), // For LocalStack

    // SQS
    SQS_EXPORT_JOBS_URL: z.string().url(),
    SQS_WAIT_TIME_SECONDS: z.coerce.number().int().min(0).max(20).default(20),
    SQS_VISIBILITY_TIMEOUT: z.coerce.number().int().min(0).max(43200).default(900),

    // DynamoDB
    DYNAMODB_TABLE_NAME: z.string().default('export-jobs'),

    // Storage
    STORAGE_DRIVER: z.enum(['s3', 'filesystem']).default('s3'),
    S3_BUCKET_NAME: z.string().optional(),
    S3_PREFIX: z.string().default('exports/'),
    STORAGE_DIR: z.string().default('/var/lib/document-export'),

    // Worker Pool
    WORKER_ENABLED: booleanFlag.default('true'),
    WORKER_POOL_SIZE: z.coerce.number().int().min(1).max(64).default(4),
    TEMP_DIR: z.string().default('/tmp/exports'),
    MAX_PROCESSING_DURATION_MS: z.coerce.number().int().positive().default(300000),
    MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    RETRY_DELAY_SECONDS: z.coerce.number().int().min(0).max(900).default(5),

    // Retention
    ARTIFACT_TTL_HOURS: z.coerce.number().positive().default(24),
    SWEEPER_ENABLED: booleanFlag.default('true'),
    SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(900000),
    SWEEP_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
    STALE_CLAIM_GRACE_MS: z.coerce.number().int().min(0).default(60000),

    // Limits & rendering
    MAX_TABLE_ROWS: z.coerce.number().int().positive().default(100000),
    ALLOWED_TEMPLATES: commaList.default('summary,full-report'),
    LIBREOFFICE_PATH: z.string().default('libreoffice'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 's3' && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'Required when STORAGE_DRIVER is s3',
      });
    }
    if (env.SQS_VISIBILITY_TIMEOUT * 1000 <= env.MAX_PROCESSING_DURATION_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SQS_VISIBILITY_TIMEOUT'],
        message: 'Must exceed MAX_PROCESSING_DURATION_MS so a message is not redelivered mid-job',
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
