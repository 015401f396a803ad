import { describe, it, expect, beforeEach } from 'vitest';
import { JobStatus } from '../../../src/domain/value-objects/job-status.vo';
import { StorageError, ValidationError } from '../../../src/domain/errors/export.errors';
import { TestPipeline, createTestPipeline, createTestRequest } from '../helpers/mock-factories';

describe('SubmitExportUseCase', () => {
  let pipeline: TestPipeline;

  beforeEach(() => {
    pipeline = createTestPipeline();
  });

  it('should store the payload, create a pending job and enqueue it', async () => {
    const { jobId } = await pipeline.submitExport.execute(
      createTestRequest({ formats: ['pdf', 'txt'] }),
    );

    const job = pipeline.jobRepository.getJob(jobId);
    expect(job?.status.value).toBe(JobStatus.PENDING);
    expect(job?.formats).toEqual(['pdf', 'txt']);
    expect(job?.template).toBe('summary');
    expect(pipeline.payloadStore.has(jobId)).toBe(true);
    expect(pipeline.messageQueue.enqueued).toEqual([{ message: { jobId }, options: {} }]);
    expect(pipeline.eventPublisher.getEventNames()).toEqual(['job.created']);
  });

  it('should issue a fresh id per submission', async () => {
    const first = await pipeline.submitExport.execute(createTestRequest());
    const second = await pipeline.submitExport.execute(createTestRequest());

    expect(first.jobId).not.toBe(second.jobId);
    expect(pipeline.jobRepository.getJobCount()).toBe(2);
  });

  it('should write nothing for an invalid request', async () => {
    await expect(
      pipeline.submitExport.execute(createTestRequest({ formats: [] })),
    ).rejects.toBeInstanceOf(ValidationError);

    expect(pipeline.jobRepository.getJobCount()).toBe(0);
    expect(pipeline.payloadStore.count()).toBe(0);
    expect(pipeline.messageQueue.getMessageCount()).toBe(0);
  });

  it('should roll back the job and payload when the queue is unavailable', async () => {
    pipeline.messageQueue.failNextEnqueue();

    await expect(pipeline.submitExport.execute(createTestRequest())).rejects.toThrow(StorageError);

    expect(pipeline.jobRepository.getJobCount()).toBe(0);
    expect(pipeline.payloadStore.count()).toBe(0);
    expect(pipeline.eventPublisher.getEventNames()).toEqual([]);
  });

  it('should discard the payload when the job store is unavailable', async () => {
    pipeline.jobRepository.failNext('create');

    await expect(pipeline.submitExport.execute(createTestRequest())).rejects.toThrow(
      'Simulated create failure',
    );

    expect(pipeline.payloadStore.count()).toBe(0);
    expect(pipeline.messageQueue.getMessageCount()).toBe(0);
  });
});
