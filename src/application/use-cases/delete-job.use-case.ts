import { Inject, Injectable, Logger } from '@nestjs/common';
import { DeleteJobCommand, DeleteJobPort } from '../ports/input/delete-job.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JobPayloadStorePort } from '../ports/output/job-payload-store.port';
import { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import {
  ARTIFACT_STORAGE_PORT,
  JOB_PAYLOAD_STORE_PORT,
  JOB_STATE_REPOSITORY_PORT,
} from '../ports/tokens';
import { JobNotFoundError } from '../../domain/errors/export.errors';

/**
 * Delete Job Use Case
 * Artifact bytes go first so a partial failure leaves a job pointing at
 * nothing rather than bytes without a job.
 */
@Injectable()
export class DeleteJobUseCase implements DeleteJobPort {
  private readonly logger = new Logger(DeleteJobUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_PAYLOAD_STORE_PORT)
    private readonly payloadStore: JobPayloadStorePort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
  ) {}

  async execute(command: DeleteJobCommand): Promise<void> {
    const job = await this.jobRepository.findById(command.jobId);
    if (!job) {
      throw new JobNotFoundError(command.jobId);
    }

    if (job.resultRef) {
      await this.artifactStorage.delete(job.resultRef);
    }
    await this.payloadStore.delete(job.jobId);

    const deleted = await this.jobRepository.delete(job.jobId);
    if (!deleted) {
      throw new JobNotFoundError(command.jobId);
    }

    this.logger.log(`Deleted job ${job.jobId} (was ${job.status.toString()})`);
  }
}
