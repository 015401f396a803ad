import { ExportFormat } from '../../../domain/value-objects/export-format.vo';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface GetJobStatusQuery {
  jobId: string;
}

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  formats: ExportFormat[];
  retryCount: number;
  /** Percent complete, 0 to 100. */
  progress: number;
  createdAt: string;
  updatedAt: string;
  expiresAt: string;
  resultRef?: string;
  error?: { code: string; message: string };
}

/**
 * Get Job Status Port (Driving Port)
 * Read-only; never mutates the job.
 */
export interface GetJobStatusPort {
  /**
   * @throws JobNotFoundError
   */
  execute(query: GetJobStatusQuery): Promise<JobStatusView>;
}
