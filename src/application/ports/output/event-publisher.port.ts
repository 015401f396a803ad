import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Interface for publishing domain events
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;

  /**
   * Fire and forget; failures are logged, never thrown.
   */
  publishAsync(event: DomainEvent): void;
}
