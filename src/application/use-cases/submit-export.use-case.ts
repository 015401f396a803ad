import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { SubmitExportPort, SubmitExportResult } from '../ports/input/submit-export.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JobPayloadStorePort } from '../ports/output/job-payload-store.port';
import { MessageQueuePort } from '../ports/output/message-queue.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  JOB_PAYLOAD_STORE_PORT,
  JOB_STATE_REPOSITORY_PORT,
  MESSAGE_QUEUE_PORT,
} from '../ports/tokens';
import { parseExportRequest } from '../dto/export-request.schema';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';
import { ExportJobEntity } from '../../domain/entities/export-job.entity';
import { JobCreatedEvent } from '../../domain/events/job-created.event';
import { StorageError } from '../../domain/errors/export.errors';

/**
 * Submit Export Use Case (Admission Controller)
 * Validates the request, stores payload and pending job, then enqueues `{jobId}`.
 * Never renders and never writes anything for an invalid request.
 */
@Injectable()
export class SubmitExportUseCase implements SubmitExportPort {
  private readonly logger = new Logger(SubmitExportUseCase.name);

  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
    @Inject(JOB_PAYLOAD_STORE_PORT)
    private readonly payloadStore: JobPayloadStorePort,
    @Inject(MESSAGE_QUEUE_PORT)
    private readonly messageQueue: MessageQueuePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  async execute(request: unknown): Promise<SubmitExportResult> {
    const payload = parseExportRequest(
      request,
      this.settings.limits,
      this.settings.allowedTemplates,
    );

    const job = ExportJobEntity.create({
      jobId: uuidv4(),
      requester: payload.requester,
      formats: payload.formats,
      template: payload.options.template,
    });

    await this.payloadStore.put(job.jobId, payload);
    try {
      await this.jobRepository.create(job);
    } catch (error) {
      await this.discardPayload(job.jobId);
      throw error;
    }

    try {
      await this.messageQueue.enqueue({ jobId: job.jobId });
    } catch (error) {
      this.logger.error(`Failed to enqueue job ${job.jobId}, rolling back admission`, error);
      await this.rollback(job.jobId);
      throw new StorageError(`Job queue unavailable, job ${job.jobId} was not admitted`, error);
    }

    this.logger.log(
      `Admitted job ${job.jobId} (${job.formats.join(', ')}) for session ${job.requester.sessionId}`,
    );

    this.eventPublisher.publishAsync(
      new JobCreatedEvent({
        jobId: job.jobId,
        requester: job.requester,
        formats: [...job.formats],
        template: job.template,
      }),
    );

    return { jobId: job.jobId };
  }

  private async rollback(jobId: string): Promise<void> {
    try {
      await this.jobRepository.delete(jobId);
    } catch (error) {
      // The record stays pending without a message; the retention sweep removes it.
      this.logger.error(`Failed to roll back job record ${jobId}`, error);
    }
    await this.discardPayload(jobId);
  }

  private async discardPayload(jobId: string): Promise<void> {
    try {
      await this.payloadStore.delete(jobId);
    } catch (error) {
      this.logger.error(`Failed to discard payload for job ${jobId}`, error);
    }
  }
}
