import {
  ExportJobEntity,
  JobTransitionFields,
} from '../../../domain/entities/export-job.entity';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';

/**
 * Job State Repository Port (Driven Port)
 * System of record for job status. Every status change goes through
 * `compareAndSetStatus`; it is the only coordination primitive between workers.
 *
 * Implementations raise `StorageError` when the store is unavailable.
 */
export interface JobStateRepositoryPort {
  /**
   * Persist a new job. Fails if the job id already exists.
   */
  create(job: ExportJobEntity): Promise<void>;

  findById(jobId: string): Promise<ExportJobEntity | null>;

  /**
   * Atomically move a job from `expected` to `next`, writing `fields` in the
   * same operation. Returns the updated job, or null when the job is missing
   * or its status is no longer `expected`.
   */
  compareAndSetStatus(
    jobId: string,
    expected: JobStatus,
    next: JobStatus,
    fields: JobTransitionFields,
  ): Promise<ExportJobEntity | null>;

  /**
   * Raise a running job's progress. Returns false when the job is missing,
   * no longer running, or already at or past `progress`.
   */
  updateProgress(jobId: string, progress: number, updatedAt: Date): Promise<boolean>;

  /**
   * Jobs created at or before `createdBefore`, in any status.
   */
  findExpired(createdBefore: Date, limit: number): Promise<ExportJobEntity[]>;

  /**
   * Running jobs claimed at or before `claimedBefore`.
   */
  findStaleClaims(claimedBefore: Date, limit: number): Promise<ExportJobEntity[]>;

  /**
   * Returns false when there was nothing to delete.
   */
  delete(jobId: string): Promise<boolean>;
}
