/**
 * Body of a job message. The payload is never embedded; workers load it
 * from the payload store.
 */
export interface ExportJobMessage {
  jobId: string;
}

export interface QueueMessage {
  messageId: string;
  receiptHandle: string;
  /** Raw decoded body; consumers validate it before use. */
  body: unknown;
  receiveCount: number;
}

export interface EnqueueOptions {
  delaySeconds?: number;
  /** Distinguishes deliberate re-enqueues from duplicates on FIFO queues. */
  deduplicationSuffix?: string;
}

/**
 * Message Queue Port (Driven Port)
 * At-least-once delivery of job messages to the worker pool.
 */
export interface MessageQueuePort {
  enqueue(message: ExportJobMessage, options?: EnqueueOptions): Promise<string>;

  receive(maxMessages: number): Promise<QueueMessage[]>;

  acknowledge(receiptHandle: string): Promise<void>;
}
