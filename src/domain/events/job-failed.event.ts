import { DomainEvent } from './base.event';
import { JobErrorDetail } from '../value-objects/job-error.vo';

/**
 * Job Failed Event
 * Emitted when a job reaches the failed state
 */
export interface JobFailedEventPayload {
  jobId: string;
  error: JobErrorDetail;
  retryCount: number;
  failureReason: 'render_failed' | 'timeout' | 'retries_exhausted' | 'stale_claim';
}

export class JobFailedEvent extends DomainEvent {
  constructor(public readonly payload: JobFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.failed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get failureReason(): string {
    return this.payload.failureReason;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
