/**
 * Application Configuration
 *
 * Loads and validates environment variables once and shapes them into the
 * typed `AppConfig` tree consumed through `ConfigService<AppConfig>`.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by the Zod schema in `validation.schema.ts`
 * 3. Transformed into the typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const poolSize = this.configService.get('workerPool', { infer: true })?.poolSize;
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type StorageDriver = 's3' | 'filesystem';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    exportJobsUrl: string;
    waitTimeSeconds: number;
    visibilityTimeout: number;
  };
  dynamodb: {
    tableName: string;
  };
  storage: {
    driver: StorageDriver;
    bucketName: string;
    prefix: string;
    directory: string;
  };
  /**
   * Worker pool configuration.
   *
   * ### poolSize (WORKER_POOL_SIZE)
   * Number of concurrent poll loops in this process. Each loop holds at most
   * one job at a time, so this is also the per-process job concurrency.
   * Rendering spreadsheets and converting PDFs is memory hungry; size it to
   * the container, typically 2-4 per vCPU.
   *
   * ### maxProcessingDurationMs (MAX_PROCESSING_DURATION_MS)
   * Hard deadline for one attempt. On expiry the job is failed with TIMEOUT
   * and any converter child process is killed. `SQS_VISIBILITY_TIMEOUT`
   * must exceed it.
   *
   * ### maxRetries / retryDelaySeconds
   * Transient render failures reset the job to pending and requeue it with
   * the delay, at most `maxRetries` times.
   */
  workerPool: {
    enabled: boolean;
    poolSize: number;
    tempDir: string;
    maxProcessingDurationMs: number;
    maxRetries: number;
    retryDelaySeconds: number;
  };
  retention: {
    artifactTtlHours: number;
    sweeperEnabled: boolean;
    sweepIntervalMs: number;
    sweepBatchSize: number;
    staleClaimGraceMs: number;
  };
  limits: {
    maxTableRows: number;
  };
  rendering: {
    allowedTemplates: string[];
    libreOfficePath: string;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    sqs: {
      exportJobsUrl: env.SQS_EXPORT_JOBS_URL,
      waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeout: env.SQS_VISIBILITY_TIMEOUT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
    },
    storage: {
      driver: env.STORAGE_DRIVER,
      bucketName: env.S3_BUCKET_NAME ?? '',
      prefix: env.S3_PREFIX,
      directory: env.STORAGE_DIR,
    },
    workerPool: {
      enabled: env.WORKER_ENABLED,
      poolSize: env.WORKER_POOL_SIZE,
      tempDir: env.TEMP_DIR,
      maxProcessingDurationMs: env.MAX_PROCESSING_DURATION_MS,
      maxRetries: env.MAX_RETRIES,
      retryDelaySeconds: env.RETRY_DELAY_SECONDS,
    },
    retention: {
      artifactTtlHours: env.ARTIFACT_TTL_HOURS,
      sweeperEnabled: env.SWEEPER_ENABLED,
      sweepIntervalMs: env.SWEEP_INTERVAL_MS,
      sweepBatchSize: env.SWEEP_BATCH_SIZE,
      staleClaimGraceMs: env.STALE_CLAIM_GRACE_MS,
    },
    limits: {
      maxTableRows: env.MAX_TABLE_ROWS,
    },
    rendering: {
      allowedTemplates: env.ALLOWED_TEMPLATES,
      libreOfficePath: env.LIBREOFFICE_PATH,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
