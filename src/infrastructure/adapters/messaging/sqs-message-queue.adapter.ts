import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../../config/configuration';
import {
  EnqueueOptions,
  ExportJobMessage,
  MessageQueuePort,
  QueueMessage,
} from '../../../application/ports/output/message-queue.port';
import { StorageError } from '../../../domain/errors/export.errors';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';

/**
 * SQS Message Queue Adapter
 * Implements MessageQueuePort on the export jobs queue. Standard and FIFO
 * queues are both supported; the queue type is taken from the URL suffix.
 */
@Injectable()
export class SqsMessageQueueAdapter implements MessageQueuePort {
  private readonly logger = new Logger(SqsMessageQueueAdapter.name);
  private readonly queueUrl: string;
  private readonly isFifo: boolean;

  constructor(
    private readonly sqsService: SqsService,
    configService: ConfigService<AppConfig>,
  ) {
    this.queueUrl = configService.getOrThrow('sqs', { infer: true }).exportJobsUrl;
    this.isFifo = this.queueUrl.endsWith('.fifo');
  }

  async enqueue(message: ExportJobMessage, options: EnqueueOptions = {}): Promise<string> {
    try {
      const result = await this.sqsService.sendMessage(this.queueUrl, message, {
        // FIFO queues reject per-message delays
        delaySeconds: this.isFifo ? undefined : options.delaySeconds,
        ...(this.isFifo && {
          messageGroupId: message.jobId,
          messageDeduplicationId: `${message.jobId}-${options.deduplicationSuffix ?? 'submit'}`,
        }),
      });

      this.logger.debug(`Enqueued job ${message.jobId} as message ${result.messageId}`);
      return result.messageId;
    } catch (error) {
      throw new StorageError(`Failed to enqueue job ${message.jobId}`, error);
    }
  }

  async receive(maxMessages: number): Promise<QueueMessage[]> {
    try {
      const envelopes = await this.sqsService.receiveMessages(this.queueUrl, maxMessages);
      return envelopes.map((envelope) => ({
        messageId: envelope.messageId,
        receiptHandle: envelope.receiptHandle,
        body: envelope.body,
        receiveCount: envelope.approximateReceiveCount,
      }));
    } catch (error) {
      throw new StorageError('Failed to receive job messages', error);
    }
  }

  async acknowledge(receiptHandle: string): Promise<void> {
    try {
      await this.sqsService.deleteMessage(this.queueUrl, receiptHandle);
    } catch (error) {
      throw new StorageError('Failed to acknowledge job message', error);
    }
  }
}
