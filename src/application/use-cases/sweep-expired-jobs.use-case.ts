import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  SweepExpiredJobsCommand,
  SweepExpiredJobsPort,
  SweepExpiredJobsResult,
} from '../ports/input/sweep-expired-jobs.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JobPayloadStorePort } from '../ports/output/job-payload-store.port';
import { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  ARTIFACT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_PAYLOAD_STORE_PORT,
  JOB_STATE_REPOSITORY_PORT,
} from '../ports/tokens';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { JobExpiredEvent } from '../../domain/events/job-expired.event';

/**
 * Sweep Expired Jobs Use Case
 * Removes jobs whose TTL has elapsed. For each job the artifact goes first,
 * then the payload, then the record, so a reader never finds a job whose
 * artifact was silently kept. A failure on one job leaves it for the next pass.
 */
@Injectable()
export class SweepExpiredJobsUseCase implements SweepExpiredJobsPort {
  private readonly logger = new Logger(SweepExpiredJobsUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_PAYLOAD_STORE_PORT)
    private readonly payloadStore: JobPayloadStorePort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(command: SweepExpiredJobsCommand = {}): Promise<SweepExpiredJobsResult> {
    const now = command.now ?? new Date();
    const createdBefore = new Date(now.getTime() - this.settings.artifactTtlMs);

    const result: SweepExpiredJobsResult = {
      jobsDeleted: 0,
      artifactsDeleted: 0,
      orphanArtifactsPurged: 0,
      errors: 0,
    };

    const expired = await this.jobRepository.findExpired(createdBefore, this.settings.sweepBatchSize);

    for (const job of expired) {
      try {
        const artifactDeleted = await this.expire(job, now);
        result.jobsDeleted++;
        if (artifactDeleted) {
          result.artifactsDeleted++;
        }
      } catch (error) {
        result.errors++;
        this.logger.error(`Failed to expire job ${job.jobId}`, error);
      }
    }

    try {
      result.orphanArtifactsPurged = await this.artifactStorage.purgeExpired(now);
    } catch (error) {
      result.errors++;
      this.logger.error('Failed to purge expired artifacts', error);
    }

    if (result.jobsDeleted > 0 || result.orphanArtifactsPurged > 0 || result.errors > 0) {
      this.logger.log(
        `Sweep finished: ${result.jobsDeleted} job(s), ${result.artifactsDeleted} artifact(s), ${result.orphanArtifactsPurged} orphan(s), ${result.errors} error(s)`,
      );
    }

    return result;
  }

  private async expire(job: ExportJobEntity, now: Date): Promise<boolean> {
    if (job.resultRef) {
      await this.artifactStorage.delete(job.resultRef);
    }
    await this.payloadStore.delete(job.jobId);
    await this.jobRepository.delete(job.jobId);

    this.eventPublisher.publishAsync(
      new JobExpiredEvent({
        jobId: job.jobId,
        status: job.status.toString(),
        resultRef: job.resultRef,
        expiredAt: now.toISOString(),
      }),
    );

    return job.resultRef !== undefined;
  }
}
