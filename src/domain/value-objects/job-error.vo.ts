export enum ExportErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  RENDER_TRANSIENT = 'RENDER_TRANSIENT',
  RENDER_PERMANENT = 'RENDER_PERMANENT',
  TIMEOUT = 'TIMEOUT',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_NOT_READY = 'JOB_NOT_READY',
  ARTIFACT_NOT_FOUND = 'ARTIFACT_NOT_FOUND',
}

/**
 * Structured error detail recorded on a failed job.
 */
export interface JobErrorDetail {
  readonly code: ExportErrorCode;
  readonly message: string;
  readonly retryable: boolean;
}
