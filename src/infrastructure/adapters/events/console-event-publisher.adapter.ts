import { Injectable } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Console Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log
 * line, one per event, keyed by `event` and `jobId`.
 */
@Injectable()
export class ConsoleEventPublisherAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(ConsoleEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info(
      { event: event.eventName, jobId: event.jobId, ...event.toJSON() },
      `[EVENT] ${event.eventName}`,
    );
  }

  publishAsync(event: DomainEvent): void {
    this.publish(event).catch((error: unknown) => {
      this.logger.error(`Failed to publish event ${event.eventName}`, error);
    });
  }
}
