/**
 * Use Cases Barrel Export
 */
export { SubmitExportUseCase } from './submit-export.use-case';
export { GetJobStatusUseCase } from './get-job-status.use-case';
export { GetArtifactStreamUseCase } from './get-artifact-stream.use-case';
export { DeleteJobUseCase } from './delete-job.use-case';
export { ProcessExportJobUseCase } from './process-export-job.use-case';
export { SweepExpiredJobsUseCase } from './sweep-expired-jobs.use-case';
export { FailStaleJobsUseCase } from './fail-stale-jobs.use-case';
