import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  FailStaleJobsCommand,
  FailStaleJobsPort,
  FailStaleJobsResult,
} from '../ports/input/fail-stale-jobs.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT, JOB_STATE_REPOSITORY_PORT } from '../ports/tokens';
import { TempWorkspaceService } from '../services/temp-workspace.service';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { TimeoutError } from '../../domain/errors/export.errors';
import { JobFailedEvent } from '../../domain/events/job-failed.event';

/**
 * Fail Stale Jobs Use Case
 * A running job whose claim is older than the processing deadline plus a
 * grace period belongs to a worker that died. It is failed with TIMEOUT.
 */
@Injectable()
export class FailStaleJobsUseCase implements FailStaleJobsPort {
  private readonly logger = new Logger(FailStaleJobsUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    private readonly workspace: TempWorkspaceService,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(command: FailStaleJobsCommand = {}): Promise<FailStaleJobsResult> {
    const now = command.now ?? new Date();
    const limitMs = this.settings.maxProcessingDurationMs;
    const claimedBefore = new Date(now.getTime() - limitMs - this.settings.staleClaimGraceMs);

    const stale = await this.jobRepository.findStaleClaims(
      claimedBefore,
      this.settings.sweepBatchSize,
    );

    let jobsFailed = 0;
    for (const job of stale) {
      const detail = new TimeoutError(job.jobId, limitMs).toDetail();
      const failed = await this.jobRepository.compareAndSetStatus(
        job.jobId,
        JobStatus.RUNNING,
        JobStatus.FAILED,
        job.fail(detail, now).transitionFields(),
      );
      if (!failed) {
        continue;
      }

      jobsFailed++;
      await this.workspace.removeForJob(job.jobId);
      this.logger.warn(`Failed stale job ${job.jobId} claimed at ${job.claimedAt?.toISOString()}`);

      this.eventPublisher.publishAsync(
        new JobFailedEvent({
          jobId: job.jobId,
          error: detail,
          retryCount: failed.retryCount,
          failureReason: 'stale_claim',
        }),
      );
    }

    return { jobsFailed };
  }
}
