import { Inject, Injectable } from '@nestjs/common';
import {
  GetJobStatusPort,
  GetJobStatusQuery,
  JobStatusView,
} from '../ports/input/get-job-status.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JOB_STATE_REPOSITORY_PORT } from '../ports/tokens';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { JobNotFoundError } from '../../domain/errors/export.errors';

/**
 * Get Job Status Use Case
 */
@Injectable()
export class GetJobStatusUseCase implements GetJobStatusPort {
  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(query: GetJobStatusQuery): Promise<JobStatusView> {
    const job = await this.jobRepository.findById(query.jobId);
    if (!job) {
      throw new JobNotFoundError(query.jobId);
    }

    return {
      jobId: job.jobId,
      status: job.status.value,
      formats: [...job.formats],
      retryCount: job.retryCount,
      progress: job.progress,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      expiresAt: job.expiresAt(this.settings.artifactTtlMs).toISOString(),
      ...(job.resultRef !== undefined && { resultRef: job.resultRef }),
      ...(job.error !== undefined && {
        error: { code: job.error.code, message: job.error.message },
      }),
    };
  }
}
