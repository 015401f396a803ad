import { ExportFormat } from '../value-objects/export-format.vo';
import { ExportErrorCode, JobErrorDetail } from '../value-objects/job-error.vo';

/**
 * Base class for every error the export pipeline raises on purpose.
 * `retryable` tells the caller whether repeating the same call can succeed.
 */
export abstract class ExportError extends Error {
  abstract readonly code: ExportErrorCode;
  abstract readonly retryable: boolean;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toDetail(): JobErrorDetail {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export interface ConstraintViolation {
  readonly path: string;
  readonly message: string;
}

export class ValidationError extends ExportError {
  readonly code = ExportErrorCode.VALIDATION_FAILED;
  readonly retryable = false;

  constructor(readonly violations: readonly ConstraintViolation[]) {
    super(
      `Export request is invalid: ${violations
        .map((violation) => `${violation.path || '(root)'}: ${violation.message}`)
        .join('; ')}`,
    );
  }
}

export type RenderErrorKind = 'transient' | 'permanent';

export class RenderError extends ExportError {
  readonly code: ExportErrorCode;
  readonly retryable: boolean;

  private constructor(
    readonly kind: RenderErrorKind,
    readonly format: ExportFormat | 'bundle',
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.retryable = kind === 'transient';
    this.code =
      kind === 'transient' ? ExportErrorCode.RENDER_TRANSIENT : ExportErrorCode.RENDER_PERMANENT;
  }

  static transient(format: ExportFormat | 'bundle', message: string, cause?: unknown): RenderError {
    return new RenderError('transient', format, message, cause);
  }

  static permanent(format: ExportFormat | 'bundle', message: string, cause?: unknown): RenderError {
    return new RenderError('permanent', format, message, cause);
  }
}

export class TimeoutError extends ExportError {
  readonly code = ExportErrorCode.TIMEOUT;
  readonly retryable = false;

  constructor(
    readonly jobId: string,
    readonly limitMs: number,
  ) {
    super(`Job ${jobId} exceeded the maximum processing duration of ${limitMs}ms`);
  }
}

export class StorageError extends ExportError {
  readonly code = ExportErrorCode.STORAGE_UNAVAILABLE;
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class JobNotFoundError extends ExportError {
  readonly code = ExportErrorCode.JOB_NOT_FOUND;
  readonly retryable = false;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class JobNotReadyError extends ExportError {
  readonly code = ExportErrorCode.JOB_NOT_READY;
  readonly retryable = true;

  constructor(
    readonly jobId: string,
    readonly status: string,
  ) {
    super(`Job ${jobId} is ${status}, artifact not ready`);
  }
}

export class ArtifactNotFoundError extends ExportError {
  readonly code = ExportErrorCode.ARTIFACT_NOT_FOUND;
  readonly retryable = false;

  constructor(readonly artifactRef: string) {
    super(`Artifact ${artifactRef} not found or expired`);
  }
}

/**
 * Map any thrown value onto the error taxonomy for recording on a job.
 * Storage failures keep their code and stay retryable; anything
 * unrecognised is permanent.
 */
export function classifyFailure(error: unknown): JobErrorDetail {
  if (error instanceof ExportError) {
    return error.toDetail();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: ExportErrorCode.RENDER_PERMANENT, message, retryable: false };
}
