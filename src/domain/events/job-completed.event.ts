import { DomainEvent } from './base.event';
import { ExportFormat } from '../value-objects/export-format.vo';

/**
 * Job Completed Event
 * Emitted when the bundle is stored and the job is marked complete
 */
export interface JobCompletedEventPayload {
  jobId: string;
  resultRef: string;
  formats: ExportFormat[];
  bundleSize: number;
  retryCount: number;
  durationMs: number;
}

export class JobCompletedEvent extends DomainEvent {
  constructor(public readonly payload: JobCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.completed';
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
