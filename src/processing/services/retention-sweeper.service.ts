import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { SweepExpiredJobsUseCase } from '../../application/use-cases/sweep-expired-jobs.use-case';
import { FailStaleJobsUseCase } from '../../application/use-cases/fail-stale-jobs.use-case';
import { SweepExpiredJobsResult } from '../../application/ports/input/sweep-expired-jobs.port';
import { FailStaleJobsResult } from '../../application/ports/input/fail-stale-jobs.port';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

export interface SweepPassResult {
  expired: SweepExpiredJobsResult | null;
  stale: FailStaleJobsResult | null;
}

/**
 * Retention Sweeper Service
 * Every SWEEP_INTERVAL_MS: expire jobs past their TTL (artifact first, then
 * the record), purge orphaned artifact bytes, and fail running jobs whose
 * worker is gone. A failing pass is logged and retried on the next tick.
 */
@Injectable()
export class RetentionSweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly intervalMs: number;
  private readonly enabled: boolean;
  private sweepTimer: NodeJS.Timeout | null = null;
  private currentSweep: Promise<SweepPassResult> | null = null;
  private isRunning = false;

  constructor(
    private readonly sweepExpiredJobs: SweepExpiredJobsUseCase,
    private readonly failStaleJobs: FailStaleJobsUseCase,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const retentionConfig = configService.getOrThrow('retention', { infer: true });
    this.intervalMs = retentionConfig.sweepIntervalMs;
    this.enabled = retentionConfig.sweeperEnabled;
    this.logger = logger.forContext(RetentionSweeperService.name);
  }

  onModuleInit(): void {
    if (this.enabled) {
      this.start();
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.logger.info({ intervalMs: this.intervalMs }, 'Starting retention sweeper');
    this.scheduleNextSweep();
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.currentSweep) {
      await this.currentSweep;
    }
    this.logger.info('Retention sweeper stopped');
  }

  /**
   * One full pass. Never throws; a failed step is reported as null.
   */
  async runOnce(now = new Date()): Promise<SweepPassResult> {
    const result: SweepPassResult = { expired: null, stale: null };

    try {
      result.expired = await this.sweepExpiredJobs.execute({ now });
    } catch (error) {
      this.logger.error({ err: error }, 'Expired job sweep failed');
    }

    try {
      result.stale = await this.failStaleJobs.execute({ now });
    } catch (error) {
      this.logger.error({ err: error }, 'Stale claim sweep failed');
    }

    return result;
  }

  private scheduleNextSweep(): void {
    if (!this.isRunning) return;

    this.sweepTimer = setTimeout(() => {
      this.currentSweep = this.runOnce().finally(() => {
        this.currentSweep = null;
        this.scheduleNextSweep();
      });
    }, this.intervalMs);
  }
}
