import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ArtifactStreamResult,
  GetArtifactStreamPort,
  GetArtifactStreamQuery,
} from '../ports/input/get-artifact-stream.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import { ARTIFACT_STORAGE_PORT, JOB_STATE_REPOSITORY_PORT } from '../ports/tokens';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { JobNotFoundError, JobNotReadyError } from '../../domain/errors/export.errors';
import { BUNDLE_FILENAME } from '../../domain/value-objects/export-format.vo';

/**
 * Get Artifact Stream Use Case
 * Opens the bundle of a complete, unexpired job for streaming.
 */
@Injectable()
export class GetArtifactStreamUseCase implements GetArtifactStreamPort {
  private readonly logger = new Logger(GetArtifactStreamUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(query: GetArtifactStreamQuery): Promise<ArtifactStreamResult> {
    const job = await this.jobRepository.findById(query.jobId);
    if (!job) {
      throw new JobNotFoundError(query.jobId);
    }

    if (job.status.isPending() || job.status.isRunning()) {
      throw new JobNotReadyError(job.jobId, job.status.toString());
    }

    // A failed job never has an artifact
    if (!job.resultRef) {
      throw new JobNotFoundError(job.jobId);
    }

    if (job.isExpired(new Date(), this.settings.artifactTtlMs)) {
      this.logger.debug(`Job ${job.jobId} expired, awaiting sweep`);
      throw new JobNotFoundError(job.jobId);
    }

    const handle = await this.artifactStorage.get(job.resultRef);

    return {
      stream: handle.stream,
      filename: `${job.jobId}-${BUNDLE_FILENAME}`,
      contentType: handle.contentType,
      size: handle.size,
      expiresAt: handle.expiresAt,
    };
  }
}
