/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { JobCreatedEvent, type JobCreatedEventPayload } from './job-created.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export { JobFailedEvent, type JobFailedEventPayload } from './job-failed.event';
export {
  JobRetryScheduledEvent,
  type JobRetryScheduledEventPayload,
} from './job-retry-scheduled.event';
export { JobExpiredEvent, type JobExpiredEventPayload } from './job-expired.event';
