import { describe, it, expect, beforeEach } from 'vitest';
import { JobNotFoundError } from '../../../src/domain/errors/export.errors';
import { ExportErrorCode } from '../../../src/domain/value-objects/job-error.vo';
import { TestPipeline, createTestJob, createTestPipeline } from '../helpers/mock-factories';

describe('GetJobStatusUseCase', () => {
  const createdAt = new Date('2026-03-01T10:00:00.000Z');
  let pipeline: TestPipeline;

  beforeEach(() => {
    pipeline = createTestPipeline();
  });

  it('should describe a pending job', async () => {
    pipeline.jobRepository.seed(createTestJob('job-1', ['docx', 'txt'], createdAt));

    await expect(pipeline.getJobStatus.execute({ jobId: 'job-1' })).resolves.toEqual({
      jobId: 'job-1',
      status: 'pending',
      formats: ['docx', 'txt'],
      retryCount: 0,
      progress: 0,
      createdAt: '2026-03-01T10:00:00.000Z',
      updatedAt: '2026-03-01T10:00:00.000Z',
      expiresAt: '2026-03-02T10:00:00.000Z',
    });
  });

  it('should include the result reference of a complete job', async () => {
    pipeline.jobRepository.seed(
      createTestJob('job-1', ['txt'], createdAt).claim(createdAt).complete('ref-1', createdAt),
    );

    const view = await pipeline.getJobStatus.execute({ jobId: 'job-1' });

    expect(view.status).toBe('complete');
    expect(view.progress).toBe(100);
    expect(view.resultRef).toBe('ref-1');
    expect(view.error).toBeUndefined();
  });

  it('should expose code and message of a failed job', async () => {
    pipeline.jobRepository.seed(
      createTestJob('job-1', ['txt'], createdAt)
        .claim(createdAt)
        .fail({ code: ExportErrorCode.TIMEOUT, message: 'too slow', retryable: false }, createdAt),
    );

    const view = await pipeline.getJobStatus.execute({ jobId: 'job-1' });

    expect(view.error).toEqual({ code: 'TIMEOUT', message: 'too slow' });
  });

  it('should report the progress a running job has reached', async () => {
    const running = createTestJob('job-1', ['txt'], createdAt).claim(createdAt);
    pipeline.jobRepository.seed(running);
    await pipeline.jobRepository.updateProgress('job-1', 40, createdAt);

    const view = await pipeline.getJobStatus.execute({ jobId: 'job-1' });

    expect(view.status).toBe('running');
    expect(view.progress).toBe(40);
  });

  it('should throw JobNotFoundError for an unknown job', async () => {
    await expect(pipeline.getJobStatus.execute({ jobId: 'missing' })).rejects.toBeInstanceOf(
      JobNotFoundError,
    );
  });
});
