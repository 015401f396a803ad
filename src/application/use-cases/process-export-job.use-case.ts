import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  ProcessExportJobCommand,
  ProcessExportJobPort,
  ProcessExportJobResult,
} from '../ports/input/process-export-job.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JobPayloadStorePort } from '../ports/output/job-payload-store.port';
import { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import { ArtifactRendererPort } from '../ports/output/artifact-renderer.port';
import { BundleBuilderPort, BundleEntry } from '../ports/output/bundle-builder.port';
import { MessageQueuePort } from '../ports/output/message-queue.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  ARTIFACT_RENDERER_PORT,
  ARTIFACT_STORAGE_PORT,
  BUNDLE_BUILDER_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_PAYLOAD_STORE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  MESSAGE_QUEUE_PORT,
} from '../ports/tokens';
import { TempWorkspaceService } from '../services/temp-workspace.service';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import {
  ArtifactChecksum,
  BundleManifestVO,
  MANIFEST_FILENAME,
} from '../../domain/value-objects/bundle-manifest.vo';
import {
  BUNDLE_CONTENT_TYPE,
  BUNDLE_FILENAME,
  ExportFormat,
  FORMAT_DESCRIPTORS,
} from '../../domain/value-objects/export-format.vo';
import { ExportRequestPayload } from '../../domain/value-objects/export-payload.vo';
import { JobErrorDetail } from '../../domain/value-objects/job-error.vo';
import { JobProgress, renderProgress } from '../../domain/value-objects/job-progress.vo';
import {
  ExportError,
  RenderError,
  StorageError,
  TimeoutError,
  classifyFailure,
} from '../../domain/errors/export.errors';
import { JobCompletedEvent } from '../../domain/events/job-completed.event';
import { JobFailedEvent, JobFailedEventPayload } from '../../domain/events/job-failed.event';
import { JobRetryScheduledEvent } from '../../domain/events/job-retry-scheduled.event';

interface RenderedArtifact {
  format: ExportFormat;
  entry: BundleEntry;
  checksum: ArtifactChecksum;
}

/** Highest progress this worker reported for the job it holds. */
interface ProgressTracker {
  readonly jobId: string;
  reached: number;
}

/**
 * Thrown inside the pipeline when the job disappeared or left `running`
 * while this worker held it.
 */
class JobAbandonedSignal extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} is no longer held by this worker`);
  }
}

/**
 * Process Export Job Use Case
 * One delivery of a job message: claim, render, bundle, store, complete.
 *
 * Coordination with other workers, the sweeper and deletions happens only
 * through compare-and-set on the job status.
 */
@Injectable()
export class ProcessExportJobUseCase implements ProcessExportJobPort {
  private readonly logger = new Logger(ProcessExportJobUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_PAYLOAD_STORE_PORT)
    private readonly payloadStore: JobPayloadStorePort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
    @Inject(ARTIFACT_RENDERER_PORT)
    private readonly renderer: ArtifactRendererPort,
    @Inject(BUNDLE_BUILDER_PORT)
    private readonly bundleBuilder: BundleBuilderPort,
    @Inject(MESSAGE_QUEUE_PORT)
    private readonly messageQueue: MessageQueuePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    private readonly workspace: TempWorkspaceService,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(command: ProcessExportJobCommand): Promise<ProcessExportJobResult> {
    const startTime = Date.now();
    const { jobId } = command;

    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      this.logger.warn(`Job ${jobId} not found, dropping message`);
      return this.result(jobId, 'skipped', startTime);
    }
    if (!job.status.isPending()) {
      this.logger.debug(`Job ${jobId} is ${job.status.toString()}, nothing to do`);
      return this.result(jobId, 'skipped', startTime);
    }

    const claimed = await this.jobRepository.compareAndSetStatus(
      jobId,
      JobStatus.PENDING,
      JobStatus.RUNNING,
      job.claim().transitionFields(),
    );
    if (!claimed) {
      this.logger.debug(`Job ${jobId} was claimed by another worker`);
      return this.result(jobId, 'skipped', startTime);
    }

    this.logger.log(
      `Claimed job ${jobId} (attempt ${claimed.retryCount + 1}, formats: ${claimed.formats.join(', ')})`,
    );

    const controller = new AbortController();
    const limitMs = this.settings.maxProcessingDurationMs;
    const deadline = setTimeout(() => controller.abort(new TimeoutError(jobId, limitMs)), limitMs);
    const progress: ProgressTracker = { jobId, reached: claimed.progress };
    let workDir: string | undefined;

    try {
      workDir = await this.workspace.create(jobId);
      const work = this.runPipeline(claimed, workDir, controller.signal, startTime, progress);
      return await this.raceDeadline(work, controller.signal, jobId);
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      return await this.handleFailure(claimed.recordProgress(progress.reached), reason, startTime);
    } finally {
      clearTimeout(deadline);
      if (workDir) {
        await this.workspace.remove(workDir);
      }
    }
  }

  private async runPipeline(
    job: ExportJobEntity,
    workDir: string,
    signal: AbortSignal,
    startTime: number,
    progress: ProgressTracker,
  ): Promise<ProcessExportJobResult> {
    const payload = await this.payloadStore.get(job.jobId);
    if (!payload) {
      await this.ensureStillRunning(job.jobId);
      throw RenderError.permanent('bundle', `Payload for job ${job.jobId} is missing`);
    }

    const artifacts = await this.renderAll(job, payload, workDir, signal, progress);
    signal.throwIfAborted();

    await this.ensureStillRunning(job.jobId);

    const manifest = BundleManifestVO.create({
      jobId: job.jobId,
      requester: job.requester,
      createdAt: job.createdAt,
      checksums: artifacts.map((artifact) => artifact.checksum),
    });

    const bundle = await this.bundleBuilder.build(
      artifacts.map((artifact) => artifact.entry),
      manifest,
      join(workDir, BUNDLE_FILENAME),
      { entryDate: job.createdAt },
    );
    signal.throwIfAborted();
    await this.recordProgress(progress, JobProgress.BUNDLED);

    const descriptor = await this.artifactStorage.put(createReadStream(bundle.path), {
      contentType: BUNDLE_CONTENT_TYPE,
      jobId: job.jobId,
    });
    await this.recordProgress(progress, JobProgress.STORED);

    const completed = await this.jobRepository.compareAndSetStatus(
      job.jobId,
      JobStatus.RUNNING,
      JobStatus.COMPLETE,
      job.complete(descriptor.ref).transitionFields(),
    );
    if (!completed) {
      this.logger.warn(`Job ${job.jobId} changed while rendering, discarding artifact ${descriptor.ref}`);
      await this.artifactStorage.delete(descriptor.ref);
      return this.result(job.jobId, 'abandoned', startTime);
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Completed job ${job.jobId} in ${durationMs}ms: ${manifest.formats.join(', ')} (${bundle.size} bytes, ${MANIFEST_FILENAME} included)`,
    );

    this.eventPublisher.publishAsync(
      new JobCompletedEvent({
        jobId: job.jobId,
        resultRef: descriptor.ref,
        formats: manifest.formats,
        bundleSize: bundle.size,
        retryCount: completed.retryCount,
        durationMs,
      }),
    );

    return { jobId: job.jobId, outcome: 'completed', resultRef: descriptor.ref, durationMs };
  }

  /**
   * Render every format concurrently, each in its own scratch directory.
   * A permanent failure wins over a transient one.
   */
  private async renderAll(
    job: ExportJobEntity,
    payload: ExportRequestPayload,
    workDir: string,
    signal: AbortSignal,
    progress: ProgressTracker,
  ): Promise<RenderedArtifact[]> {
    const artifactDir = join(workDir, 'artifacts');
    await mkdir(artifactDir, { recursive: true });
    let rendered = 0;

    const settled = await Promise.allSettled(
      job.formats.map(async (format): Promise<RenderedArtifact> => {
        const scratch = join(workDir, `render-${format}`);
        await mkdir(scratch, { recursive: true });

        const bytes = await this.renderer.render(format, payload, {
          jobId: job.jobId,
          workDir: scratch,
          signal,
        });

        const { filename } = FORMAT_DESCRIPTORS[format];
        const path = join(artifactDir, filename);
        await writeFile(path, bytes);

        const digest = createHash('sha256').update(bytes).digest('hex');
        rendered += 1;
        await this.recordProgress(progress, renderProgress(rendered, job.formats.length));
        return {
          format,
          entry: { name: filename, path },
          checksum: BundleManifestVO.checksumFor(format, digest, bytes.length),
        };
      }),
    );

    const artifacts: RenderedArtifact[] = [];
    const failures: unknown[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        artifacts.push(outcome.value);
      } else {
        failures.push(outcome.reason);
      }
    }

    if (failures.length > 0) {
      const permanent = failures.find((failure) => !classifyFailure(failure).retryable);
      throw permanent ?? failures[0];
    }

    return artifacts;
  }

  /**
   * Progress is advisory: a lost or failed write never fails the job.
   */
  private async recordProgress(tracker: ProgressTracker, progress: number): Promise<void> {
    const { jobId } = tracker;
    tracker.reached = Math.max(tracker.reached, progress);
    try {
      const recorded = await this.jobRepository.updateProgress(jobId, progress, new Date());
      if (!recorded) {
        this.logger.debug(`Progress ${progress}% not recorded for job ${jobId}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to record progress ${progress}% for job ${jobId}: ${message}`);
    }
  }

  private async ensureStillRunning(jobId: string): Promise<void> {
    const current = await this.jobRepository.findById(jobId);
    if (!current || !current.status.isRunning()) {
      throw new JobAbandonedSignal(jobId);
    }
  }

  /**
   * Settle with `work`, or reject with the abort reason as soon as the
   * deadline passes.
   */
  private raceDeadline<T>(work: Promise<T>, signal: AbortSignal, jobId: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        work.catch((error: unknown) =>
          this.logger.debug(`Job ${jobId} work ended after deadline: ${String(error)}`),
        );
        reject(signal.reason);
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private async handleFailure(
    job: ExportJobEntity,
    error: unknown,
    startTime: number,
  ): Promise<ProcessExportJobResult> {
    if (error instanceof JobAbandonedSignal) {
      this.logger.warn(`Job ${job.jobId} was deleted or moved on, abandoning`);
      return this.result(job.jobId, 'abandoned', startTime);
    }

    const detail = classifyFailure(error);
    this.logger.error(`Job ${job.jobId} attempt failed: [${detail.code}] ${detail.message}`);

    if (detail.retryable && job.retryCount < this.settings.maxRetries) {
      return this.scheduleRetry(job, detail, startTime);
    }

    const failureReason: JobFailedEventPayload['failureReason'] =
      error instanceof TimeoutError
        ? 'timeout'
        : detail.retryable
          ? 'retries_exhausted'
          : 'render_failed';

    const failed = await this.jobRepository.compareAndSetStatus(
      job.jobId,
      JobStatus.RUNNING,
      JobStatus.FAILED,
      job.fail(detail).transitionFields(),
    );
    if (!failed) {
      return this.result(job.jobId, 'abandoned', startTime);
    }

    this.eventPublisher.publishAsync(
      new JobFailedEvent({
        jobId: job.jobId,
        error: detail,
        retryCount: failed.retryCount,
        failureReason,
      }),
    );

    return this.result(job.jobId, 'failed', startTime);
  }

  private async scheduleRetry(
    job: ExportJobEntity,
    detail: JobErrorDetail,
    startTime: number,
  ): Promise<ProcessExportJobResult> {
    const reset = await this.jobRepository.compareAndSetStatus(
      job.jobId,
      JobStatus.RUNNING,
      JobStatus.PENDING,
      job.resetForRetry().transitionFields(),
    );
    if (!reset) {
      return this.result(job.jobId, 'abandoned', startTime);
    }

    const delaySeconds = this.settings.retryDelaySeconds;
    try {
      await this.messageQueue.enqueue(
        { jobId: job.jobId },
        { delaySeconds, deduplicationSuffix: `retry-${reset.retryCount}` },
      );
    } catch (error) {
      // The job is pending again; redelivering the current message picks it up.
      throw error instanceof ExportError
        ? error
        : new StorageError(`Failed to requeue job ${job.jobId}`, error);
    }

    this.logger.log(
      `Job ${job.jobId} scheduled for retry ${reset.retryCount}/${this.settings.maxRetries} in ${delaySeconds}s`,
    );

    this.eventPublisher.publishAsync(
      new JobRetryScheduledEvent({
        jobId: job.jobId,
        retryCount: reset.retryCount,
        delaySeconds,
        cause: detail,
      }),
    );

    return this.result(job.jobId, 'retry-scheduled', startTime);
  }

  private result(
    jobId: string,
    outcome: ProcessExportJobResult['outcome'],
    startTime: number,
  ): ProcessExportJobResult {
    return { jobId, outcome, durationMs: Date.now() - startTime };
  }
}
