import { produce } from 'immer';
import { JobStatus, JobStatusVO } from '../value-objects/job-status.vo';
import { ExportFormat, normalizeFormats } from '../value-objects/export-format.vo';
import { Requester } from '../value-objects/export-payload.vo';
import { JobErrorDetail } from '../value-objects/job-error.vo';
import { JobProgress, isValidProgress } from '../value-objects/job-progress.vo';

/**
 * Export Job Entity - Aggregate Root
 * Lifecycle record of one export request, from admission to a terminal state.
 *
 * Data lives in a plain readonly structure; behaviour lives in the
 * `ExportJobEntity` namespace as pure functions returning new instances
 * produced with Immer.
 *
 * Invariants:
 * - `resultRef` is set iff status is complete
 * - `error` is set iff status is failed
 * - `claimedAt` is set iff status is running
 * - `progress` is 100 when complete
 */
export interface ExportJobEntityData {
  readonly jobId: string;
  readonly status: JobStatusVO;
  readonly requester: Requester;
  readonly formats: ReadonlyArray<ExportFormat>;
  readonly template: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly claimedAt?: Date;
  readonly resultRef?: string;
  readonly error?: JobErrorDetail;
  readonly retryCount: number;
  /** Percent complete, 0 to 100. */
  readonly progress: number;
}

/**
 * Mutable fields written together with a status change.
 * `null` clears a field.
 */
export interface JobTransitionFields {
  readonly updatedAt: Date;
  readonly claimedAt: Date | null;
  readonly resultRef: string | null;
  readonly error: JobErrorDetail | null;
  readonly retryCount: number;
  readonly progress: number;
}

export interface ExportJobEntity extends ExportJobEntityData {
  isTerminal(): boolean;
  expiresAt(ttlMs: number): Date;
  isExpired(now: Date, ttlMs: number): boolean;

  claim(now?: Date): ExportJobEntity;
  complete(resultRef: string, now?: Date): ExportJobEntity;
  fail(error: JobErrorDetail, now?: Date): ExportJobEntity;
  resetForRetry(now?: Date): ExportJobEntity;
  recordProgress(progress: number, now?: Date): ExportJobEntity;

  transitionFields(): JobTransitionFields;
  toJSON(): ReturnType<typeof ExportJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace ExportJobEntity {
  export interface CreateProps {
    jobId: string;
    requester: Requester;
    formats: ReadonlyArray<ExportFormat>;
    template: string;
    createdAt?: Date;
  }

  export interface ReconstituteProps extends CreateProps {
    status: JobStatusVO;
    createdAt: Date;
    updatedAt: Date;
    claimedAt?: Date;
    resultRef?: string;
    error?: JobErrorDetail;
    retryCount: number;
    /** Defaults to 100 for complete jobs and 0 otherwise. */
    progress?: number;
  }

  /**
   * Create a new job in `pending` with zero retries.
   */
  export function create(props: CreateProps): ExportJobEntity {
    const createdAt = props.createdAt ?? new Date();
    return reconstitute({
      ...props,
      status: JobStatusVO.pending(),
      createdAt,
      updatedAt: createdAt,
      retryCount: 0,
      progress: JobProgress.PENDING,
    });
  }

  /**
   * Rebuild a job from persisted state, enforcing every invariant.
   */
  export function reconstitute(props: ReconstituteProps): ExportJobEntity {
    const progress =
      props.progress ??
      (props.status.value === JobStatus.COMPLETE ? JobProgress.COMPLETE : JobProgress.PENDING);
    validate(props, progress);

    const data: ExportJobEntityData = {
      jobId: props.jobId,
      status: props.status,
      requester: { ...props.requester },
      formats: normalizeFormats(props.formats),
      template: props.template,
      createdAt: props.createdAt,
      updatedAt: props.updatedAt,
      claimedAt: props.claimedAt,
      resultRef: props.resultRef,
      error: props.error,
      retryCount: props.retryCount,
      progress,
    };

    return attachMethods(data);
  }

  function attachMethods(data: ExportJobEntityData): ExportJobEntity {
    return {
      ...data,

      isTerminal: () => data.status.isTerminal(),
      expiresAt: (ttlMs: number) => expiresAt(data, ttlMs),
      isExpired: (now: Date, ttlMs: number) => isExpired(data, now, ttlMs),

      claim: (now?: Date) => claim(data, now),
      complete: (resultRef: string, now?: Date) => complete(data, resultRef, now),
      fail: (error: JobErrorDetail, now?: Date) => fail(data, error, now),
      resetForRetry: (now?: Date) => resetForRetry(data, now),
      recordProgress: (progress: number, now?: Date) => recordProgress(data, progress, now),

      transitionFields: () => transitionFields(data),
      toJSON: () => toJSON(data),
    };
  }

  function validate(props: ReconstituteProps, progress: number): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.requester.sessionId || props.requester.sessionId.trim().length === 0) {
      throw new Error('Requester session ID is required');
    }
    if (props.formats.length === 0) {
      throw new Error('At least one export format is required');
    }
    if (!Number.isInteger(props.retryCount) || props.retryCount < 0) {
      throw new Error('Retry count must be a non-negative integer');
    }
    if (!isValidProgress(progress)) {
      throw new Error('Progress must be an integer from 0 to 100');
    }

    const status = props.status.value;
    if ((status === JobStatus.COMPLETE) !== (props.resultRef !== undefined)) {
      throw new Error(`Result reference must be set exactly when job is complete (${status})`);
    }
    if ((status === JobStatus.FAILED) !== (props.error !== undefined)) {
      throw new Error(`Error detail must be set exactly when job is failed (${status})`);
    }
    if ((status === JobStatus.RUNNING) !== (props.claimedAt !== undefined)) {
      throw new Error(`Claim timestamp must be set exactly when job is running (${status})`);
    }
    if (status === JobStatus.COMPLETE && progress !== JobProgress.COMPLETE) {
      throw new Error(`Complete job must report full progress (${progress})`);
    }
  }

  function assertTransition(job: ExportJobEntityData, next: JobStatusVO): void {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(
        `Invalid status transition for job ${job.jobId}: ${job.status.toString()} -> ${next.toString()}`,
      );
    }
  }

  // ===== Queries =====

  export function expiresAt(job: ExportJobEntityData, ttlMs: number): Date {
    return new Date(job.createdAt.getTime() + ttlMs);
  }

  export function isExpired(job: ExportJobEntityData, now: Date, ttlMs: number): boolean {
    return expiresAt(job, ttlMs).getTime() <= now.getTime();
  }

  // ===== State Mutations (Return new instances via Immer) =====

  export function claim(job: ExportJobEntityData, now = new Date()): ExportJobEntity {
    const next = JobStatusVO.running();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.claimedAt = now;
      draft.progress = JobProgress.CLAIMED;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function complete(
    job: ExportJobEntityData,
    resultRef: string,
    now = new Date(),
  ): ExportJobEntity {
    const next = JobStatusVO.complete();
    assertTransition(job, next);
    if (resultRef.length === 0) {
      throw new Error('Result reference is required to complete a job');
    }

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.resultRef = resultRef;
      draft.claimedAt = undefined;
      draft.progress = JobProgress.COMPLETE;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function fail(
    job: ExportJobEntityData,
    error: JobErrorDetail,
    now = new Date(),
  ): ExportJobEntity {
    const next = JobStatusVO.failed();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.error = { ...error };
      draft.claimedAt = undefined;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  export function resetForRetry(job: ExportJobEntityData, now = new Date()): ExportJobEntity {
    const next = JobStatusVO.pending();
    assertTransition(job, next);

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.claimedAt = undefined;
      draft.retryCount = job.retryCount + 1;
      draft.progress = JobProgress.PENDING;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  /**
   * Progress only moves forward, and only while running. Anything else
   * returns the job unchanged.
   */
  export function recordProgress(
    job: ExportJobEntityData,
    progress: number,
    now = new Date(),
  ): ExportJobEntity {
    if (!isValidProgress(progress)) {
      throw new Error('Progress must be an integer from 0 to 100');
    }
    if (job.status.value !== JobStatus.RUNNING || progress <= job.progress) {
      return attachMethods(job);
    }

    const updated = produce(job, (draft) => {
      draft.progress = progress;
      draft.updatedAt = now;
    });
    return attachMethods(updated);
  }

  // ===== Serialization =====

  export function transitionFields(job: ExportJobEntityData): JobTransitionFields {
    return {
      updatedAt: job.updatedAt,
      claimedAt: job.claimedAt ?? null,
      resultRef: job.resultRef ?? null,
      error: job.error ?? null,
      retryCount: job.retryCount,
      progress: job.progress,
    };
  }

  export function toJSON(job: ExportJobEntityData) {
    return {
      jobId: job.jobId,
      status: job.status.toString(),
      requester: job.requester,
      formats: [...job.formats],
      template: job.template,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      claimedAt: job.claimedAt?.toISOString(),
      resultRef: job.resultRef,
      error: job.error,
      retryCount: job.retryCount,
      progress: job.progress,
    };
  }
}
