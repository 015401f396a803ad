import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  SendMessageCommand,
} from '@aws-sdk/client-sqs';
import { AppConfig } from '../../../config/configuration';
import { SqsMessageEnvelope, SqsSendResult } from '../interfaces/sqs-message.interface';
import { PinoLoggerService } from '../../logging/pino-logger.service';

@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly logger: PinoLoggerService;
  private readonly client: SQSClient;
  private readonly waitTimeSeconds: number;
  private readonly visibilityTimeout: number;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const sqsConfig = this.configService.getOrThrow('sqs', { infer: true });

    this.client = new SQSClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.waitTimeSeconds = sqsConfig.waitTimeSeconds;
    this.visibilityTimeout = sqsConfig.visibilityTimeout;

    this.logger = logger.forContext(SqsService.name);
  }

  async receiveMessages(queueUrl: string, maxMessages: number): Promise<SqsMessageEnvelope[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: queueUrl,
      MaxNumberOfMessages: maxMessages,
      WaitTimeSeconds: this.waitTimeSeconds,
      VisibilityTimeout: this.visibilityTimeout,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
    });

    const response = await this.client.send(command);
    const envelopes: SqsMessageEnvelope[] = [];

    for (const message of response.Messages ?? []) {
      if (!message.ReceiptHandle || !message.MessageId) {
        continue;
      }

      let body: unknown;
      try {
        body = JSON.parse(message.Body || '{}');
      } catch {
        this.logger.warn(
          { messageId: message.MessageId },
          'Failed to parse message body as JSON',
        );
        body = message.Body;
      }

      envelopes.push({
        message,
        body,
        receiptHandle: message.ReceiptHandle,
        messageId: message.MessageId,
        approximateReceiveCount: parseInt(
          message.Attributes?.ApproximateReceiveCount || '1',
          10,
        ),
      });
    }

    return envelopes;
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: queueUrl,
        ReceiptHandle: receiptHandle,
      }),
    );
  }

  async sendMessage<T>(
    queueUrl: string,
    body: T,
    options?: {
      delaySeconds?: number;
      messageGroupId?: string;
      messageDeduplicationId?: string;
    },
  ): Promise<SqsSendResult> {
    const command = new SendMessageCommand({
      QueueUrl: queueUrl,
      MessageBody: JSON.stringify(body),
      DelaySeconds: options?.delaySeconds,
      MessageGroupId: options?.messageGroupId,
      MessageDeduplicationId: options?.messageDeduplicationId,
    });

    const response = await this.client.send(command);

    return {
      messageId: response.MessageId ?? '',
      sequenceNumber: response.SequenceNumber,
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
