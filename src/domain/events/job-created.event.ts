import { DomainEvent } from './base.event';
import { ExportFormat } from '../value-objects/export-format.vo';
import { Requester } from '../value-objects/export-payload.vo';

/**
 * Job Created Event
 * Emitted when an export request is admitted and queued
 */
export interface JobCreatedEventPayload {
  jobId: string;
  requester: Requester;
  formats: ExportFormat[];
  template: string;
}

export class JobCreatedEvent extends DomainEvent {
  constructor(public readonly payload: JobCreatedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.created';
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
