import { DomainEvent } from './base.event';
import { JobErrorDetail } from '../value-objects/job-error.vo';

/**
 * Job Retry Scheduled Event
 * Emitted when a transient failure resets a running job back to pending
 */
export interface JobRetryScheduledEventPayload {
  jobId: string;
  retryCount: number;
  delaySeconds: number;
  cause: JobErrorDetail;
}

export class JobRetryScheduledEvent extends DomainEvent {
  constructor(public readonly payload: JobRetryScheduledEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.retry_scheduled';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
