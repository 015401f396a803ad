import { ConfigService } from '@nestjs/config';
import { AppConfig } from './configuration';

export const EXPORT_SETTINGS = 'ExportSettings';

/**
 * Bounds checked on every export request at admission.
 */
export interface RequestLimits {
  readonly maxTitleLength: number;
  readonly maxSummaryLength: number;
  readonly maxIdentityLength: number;
  readonly maxSections: number;
  readonly maxHeadingLength: number;
  readonly maxBodyLength: number;
  readonly maxTables: number;
  readonly maxTableNameLength: number;
  readonly maxColumns: number;
  readonly maxColumnNameLength: number;
  readonly maxTableRows: number;
  readonly maxCellLength: number;
}

/**
 * Settings shared by the pipeline components. Built once at startup from
 * `AppConfig` and passed to each use case; never looked up ambiently.
 */
export interface ExportSettings {
  readonly artifactTtlMs: number;
  readonly maxProcessingDurationMs: number;
  readonly maxRetries: number;
  readonly retryDelaySeconds: number;
  readonly tempDir: string;
  readonly staleClaimGraceMs: number;
  readonly sweepBatchSize: number;
  readonly allowedTemplates: readonly string[];
  readonly limits: RequestLimits;
}

export const DEFAULT_REQUEST_LIMITS: RequestLimits = {
  maxTitleLength: 256,
  maxSummaryLength: 10000,
  maxIdentityLength: 128,
  maxSections: 200,
  maxHeadingLength: 256,
  maxBodyLength: 5000,
  maxTables: 20,
  maxTableNameLength: 128,
  maxColumns: 100,
  maxColumnNameLength: 128,
  maxTableRows: 100000,
  maxCellLength: 5000,
};

export function createExportSettings(
  config: Pick<AppConfig, 'workerPool' | 'retention' | 'limits' | 'rendering'>,
): ExportSettings {
  return Object.freeze({
    artifactTtlMs: Math.round(config.retention.artifactTtlHours * 60 * 60 * 1000),
    maxProcessingDurationMs: config.workerPool.maxProcessingDurationMs,
    maxRetries: config.workerPool.maxRetries,
    retryDelaySeconds: config.workerPool.retryDelaySeconds,
    tempDir: config.workerPool.tempDir,
    staleClaimGraceMs: config.retention.staleClaimGraceMs,
    sweepBatchSize: config.retention.sweepBatchSize,
    allowedTemplates: Object.freeze([...config.rendering.allowedTemplates]),
    limits: Object.freeze({
      ...DEFAULT_REQUEST_LIMITS,
      maxTableRows: config.limits.maxTableRows,
    }),
  });
}

export const exportSettingsProvider = {
  provide: EXPORT_SETTINGS,
  inject: [ConfigService],
  useFactory: (configService: ConfigService<AppConfig>): ExportSettings =>
    createExportSettings({
      workerPool: configService.getOrThrow('workerPool', { infer: true }),
      retention: configService.getOrThrow('retention', { infer: true }),
      limits: configService.getOrThrow('limits', { infer: true }),
      rendering: configService.getOrThrow('rendering', { infer: true }),
    }),
};
