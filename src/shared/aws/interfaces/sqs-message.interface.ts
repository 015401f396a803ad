import { Message } from '@aws-sdk/client-sqs';

export interface SqsMessageEnvelope {
  message: Message;
  /** Parsed JSON body, or the raw string when the body is not JSON. */
  body: unknown;
  receiptHandle: string;
  messageId: string;
  approximateReceiveCount: number;
}

export interface SqsSendResult {
  messageId: string;
  sequenceNumber?: string;
}
