import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { MessageQueuePort, QueueMessage } from '../../application/ports/output/message-queue.port';
import { MESSAGE_QUEUE_PORT } from '../../application/ports/tokens';
import { exportJobMessageSchema } from '../../application/dto/export-job-message.schema';
import { ProcessExportJobUseCase } from '../../application/use-cases/process-export-job.use-case';
import { ProcessExportJobResult } from '../../application/ports/input/process-export-job.port';
import { TempWorkspaceService } from '../../application/services/temp-workspace.service';
import { StorageError } from '../../domain/errors/export.errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { PoolStats, WorkerLoopStats } from '../interfaces/pool-stats.interface';

export const ERROR_BACKOFF_MS = 5000;
export const IDLE_DELAY_MS = 250;

/**
 * Export Worker Pool Service
 *
 * Runs WORKER_POOL_SIZE independent poll loops against the job queue. Each
 * loop holds at most one message at a time:
 *
 * 1. receive one message and validate its body; a malformed body is
 *    acknowledged and dropped
 * 2. run the job through ProcessExportJobUseCase
 * 3. acknowledge once the use case returns, whatever the job outcome
 * 4. if the use case throws, leave the message for redelivery and back off
 *
 * Loops never coordinate with each other: duplicate deliveries of the same
 * job are resolved by the status compare-and-set inside the use case.
 */
@Injectable()
export class ExportWorkerPoolService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly poolSize: number;
  private readonly enabled: boolean;
  private readonly maxProcessingDurationMs: number;
  private readonly loops: WorkerLoopStats[] = [];
  private loopPromises: Promise<void>[] = [];
  private shutdown = new AbortController();
  private isRunning = false;

  private completedJobs = 0;
  private failedJobs = 0;
  private retriedJobs = 0;
  private skippedJobs = 0;
  private erroredDeliveries = 0;
  private totalProcessingTimeMs = 0;
  private processedCount = 0;

  constructor(
    @Inject(MESSAGE_QUEUE_PORT)
    private readonly messageQueue: MessageQueuePort,
    private readonly processExportJob: ProcessExportJobUseCase,
    private readonly workspace: TempWorkspaceService,
    configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const workerPoolConfig = configService.getOrThrow('workerPool', { infer: true });
    this.poolSize = workerPoolConfig.poolSize;
    this.enabled = workerPoolConfig.enabled;
    this.maxProcessingDurationMs = workerPoolConfig.maxProcessingDurationMs;
    this.logger = logger.forContext(ExportWorkerPoolService.name);
  }

  async onModuleInit(): Promise<void> {
    if (!this.enabled) {
      this.logger.info('Worker pool disabled');
      return;
    }
    // Workspaces older than one deadline belong to a process that died mid-job
    await this.workspace.purgeStale(this.maxProcessingDurationMs);
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.shutdown = new AbortController();
    this.loops.length = 0;

    for (let loopId = 0; loopId < this.poolSize; loopId++) {
      const state: WorkerLoopStats = {
        loopId,
        isActive: false,
        jobsProcessed: 0,
        lastActivityAt: new Date(),
      };
      this.loops.push(state);
      this.loopPromises.push(this.runLoop(state));
    }

    this.logger.info({ poolSize: this.poolSize }, 'Worker pool started');
  }

  /**
   * Stop receiving and wait for every in-flight job to finish.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.logger.info({ activeWorkers: this.activeCount() }, 'Stopping worker pool');
    this.isRunning = false;
    this.shutdown.abort();

    await Promise.all(this.loopPromises);
    this.loopPromises = [];
    this.logger.info('Worker pool stopped');
  }

  getPoolStats(): PoolStats {
    const activeWorkers = this.activeCount();
    return {
      poolSize: this.poolSize,
      activeWorkers,
      idleWorkers: this.loops.length - activeWorkers,
      completedJobs: this.completedJobs,
      failedJobs: this.failedJobs,
      retriedJobs: this.retriedJobs,
      skippedJobs: this.skippedJobs,
      erroredDeliveries: this.erroredDeliveries,
      averageProcessingTimeMs:
        this.processedCount > 0 ? Math.round(this.totalProcessingTimeMs / this.processedCount) : 0,
      isRunning: this.isRunning,
    };
  }

  getWorkerStats(): WorkerLoopStats[] {
    return this.loops.map((loop) => ({ ...loop }));
  }

  private async runLoop(state: WorkerLoopStats): Promise<void> {
    while (this.isRunning) {
      try {
        const messages = await this.messageQueue.receive(1);
        if (messages.length === 0) {
          await this.delay(IDLE_DELAY_MS);
          continue;
        }
        for (const message of messages) {
          await this.handleMessage(state, message);
        }
      } catch (error) {
        this.erroredDeliveries++;
        if (error instanceof StorageError) {
          this.logger.warn(
            { loopId: state.loopId, err: error },
            'Storage unavailable, leaving message for redelivery',
          );
        } else {
          this.logger.error({ loopId: state.loopId, err: error }, 'Error in worker loop');
        }
        await this.delay(ERROR_BACKOFF_MS);
      }
    }
  }

  private async handleMessage(state: WorkerLoopStats, message: QueueMessage): Promise<void> {
    const parsed = exportJobMessageSchema.safeParse(message.body);
    if (!parsed.success) {
      this.logger.warn(
        { messageId: message.messageId, issues: parsed.error.issues.map((issue) => issue.message) },
        'Dropping malformed job message',
      );
      await this.messageQueue.acknowledge(message.receiptHandle);
      return;
    }

    const { jobId } = parsed.data;
    state.isActive = true;
    state.currentJobId = jobId;
    state.lastActivityAt = new Date();

    const jobLogger = this.logger.withJobId(jobId);
    try {
      const result = await this.processExportJob.execute({ jobId });
      await this.messageQueue.acknowledge(message.receiptHandle);
      this.record(state, result, jobLogger);
    } finally {
      state.isActive = false;
      state.currentJobId = undefined;
      state.lastActivityAt = new Date();
    }
  }

  private record(
    state: WorkerLoopStats,
    result: ProcessExportJobResult,
    jobLogger: PinoLoggerService,
  ): void {
    state.jobsProcessed++;
    this.processedCount++;
    this.totalProcessingTimeMs += result.durationMs;

    switch (result.outcome) {
      case 'completed':
        this.completedJobs++;
        break;
      case 'failed':
        this.failedJobs++;
        break;
      case 'retry-scheduled':
        this.retriedJobs++;
        break;
      case 'skipped':
      case 'abandoned':
        this.skippedJobs++;
        break;
    }

    jobLogger.debug(
      { loopId: state.loopId, outcome: result.outcome, durationMs: result.durationMs },
      'Job message handled',
    );
  }

  private activeCount(): number {
    return this.loops.filter((loop) => loop.isActive).length;
  }

  /**
   * Resolves early when the pool is stopping.
   */
  private delay(ms: number): Promise<void> {
    const signal = this.shutdown.signal;
    if (signal.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
