import { Injectable, Logger } from '@nestjs/common';
import { JobStateRepositoryPort } from '../../../application/ports/output/job-state-repository.port';
import {
  ExportJobEntity,
  JobTransitionFields,
} from '../../../domain/entities/export-job.entity';
import { JobStatus, JobStatusVO } from '../../../domain/value-objects/job-status.vo';
import { StorageError } from '../../../domain/errors/export.errors';
import { DynamoDbService, DynamoItem } from '../../../shared/aws/dynamodb/dynamodb.service';
import { JobRecord, jobRecordSchema } from './job-record.schema';

/**
 * DynamoDB Job Repository Adapter
 * Implements JobStateRepositoryPort on a single table keyed by `jobId`.
 * Status changes are conditional updates on `status`.
 */
@Injectable()
export class DynamoDbJobRepositoryAdapter implements JobStateRepositoryPort {
  private readonly logger = new Logger(DynamoDbJobRepositoryAdapter.name);

  constructor(private readonly dynamoDb: DynamoDbService) {}

  async create(job: ExportJobEntity): Promise<void> {
    const created = await this.call(`create job ${job.jobId}`, () =>
      this.dynamoDb.putIfAbsent(this.toRecord(job), 'jobId'),
    );
    if (!created) {
      throw new StorageError(`Job ${job.jobId} already exists`);
    }

    this.logger.debug(`Saved job ${job.jobId} to DynamoDB`);
  }

  async findById(jobId: string): Promise<ExportJobEntity | null> {
    const item = await this.call(`read job ${jobId}`, () => this.dynamoDb.getItem({ jobId }));
    return item ? this.toDomainEntity(item) : null;
  }

  async compareAndSetStatus(
    jobId: string,
    expected: JobStatus,
    next: JobStatus,
    fields: JobTransitionFields,
  ): Promise<ExportJobEntity | null> {
    const item = await this.call(`update job ${jobId}`, () =>
      this.dynamoDb.updateIf(
        { jobId },
        {
          set: {
            status: next,
            updatedAt: fields.updatedAt.toISOString(),
            claimedAt: fields.claimedAt ? fields.claimedAt.toISOString() : null,
            resultRef: fields.resultRef,
            error: fields.error ? { ...fields.error } : null,
            retryCount: fields.retryCount,
            progress: fields.progress,
          },
          condition: { attribute: 'status', equals: expected },
        },
      ),
    );

    if (!item) {
      this.logger.debug(`CAS ${expected} -> ${next} lost for job ${jobId}`);
      return null;
    }
    return this.toDomainEntity(item);
  }

  async updateProgress(jobId: string, progress: number, updatedAt: Date): Promise<boolean> {
    const item = await this.call(`record progress of job ${jobId}`, () =>
      this.dynamoDb.updateIf(
        { jobId },
        {
          set: { progress, updatedAt: updatedAt.toISOString() },
          condition: { attribute: 'status', equals: JobStatus.RUNNING },
          below: { attribute: 'progress', value: progress },
        },
      ),
    );
    return item !== null;
  }

  async findExpired(createdBefore: Date, limit: number): Promise<ExportJobEntity[]> {
    const items = await this.call('scan expired jobs', () =>
      this.dynamoDb.scan(
        {
          expression: '#createdAt <= :before',
          names: { '#createdAt': 'createdAt' },
          values: { ':before': createdBefore.toISOString() },
        },
        limit,
      ),
    );
    return items.map((item) => this.toDomainEntity(item));
  }

  async findStaleClaims(claimedBefore: Date, limit: number): Promise<ExportJobEntity[]> {
    const items = await this.call('scan stale claims', () =>
      this.dynamoDb.scan(
        {
          expression: '#status = :running AND #claimedAt <= :before',
          names: { '#status': 'status', '#claimedAt': 'claimedAt' },
          values: { ':running': JobStatus.RUNNING, ':before': claimedBefore.toISOString() },
        },
        limit,
      ),
    );
    return items.map((item) => this.toDomainEntity(item));
  }

  async delete(jobId: string): Promise<boolean> {
    const deleted = await this.call(`delete job ${jobId}`, () =>
      this.dynamoDb.deleteItem({ jobId }),
    );
    if (deleted) {
      this.logger.debug(`Deleted job ${jobId} from DynamoDB`);
    }
    return deleted;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Job store failed to ${operation}`, error);
    }
  }

  /**
   * Convert domain entity to a DynamoDB item
   */
  private toRecord(job: ExportJobEntity): JobRecord {
    return {
      jobId: job.jobId,
      status: job.status.value,
      requester: { ...job.requester },
      formats: [...job.formats],
      template: job.template,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      claimedAt: job.claimedAt?.toISOString(),
      resultRef: job.resultRef,
      error: job.error ? { ...job.error } : undefined,
      retryCount: job.retryCount,
      progress: job.progress,
    };
  }

  /**
   * Convert a DynamoDB item to a domain entity
   */
  private toDomainEntity(item: DynamoItem): ExportJobEntity {
    const parsed = jobRecordSchema.safeParse(item);
    if (!parsed.success) {
      throw new StorageError(
        `Malformed job record ${String(item.jobId)}: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
      );
    }

    const record = parsed.data;
    return ExportJobEntity.reconstitute({
      jobId: record.jobId,
      status: JobStatusVO.of(record.status),
      requester: record.requester,
      formats: record.formats,
      template: record.template,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
      claimedAt: record.claimedAt ? new Date(record.claimedAt) : undefined,
      resultRef: record.resultRef,
      error: record.error,
      retryCount: record.retryCount,
      progress: record.progress,
    });
  }
}
