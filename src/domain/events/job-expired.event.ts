import { DomainEvent } from './base.event';

/**
 * Job Expired Event
 * Emitted by the retention sweep after a job and its artifact are removed
 */
export interface JobExpiredEventPayload {
  jobId: string;
  status: string;
  resultRef?: string;
  expiredAt: string;
}

export class JobExpiredEvent extends DomainEvent {
  constructor(public readonly payload: JobExpiredEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.expired';
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
