import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HOUR_MS, TestPipeline, createTestJob, createTestPayload, createTestPipeline } from '../helpers/mock-factories';

describe('SweepExpiredJobsUseCase', () => {
  const now = new Date('2026-03-02T12:00:00.000Z');
  let pipeline: TestPipeline;

  beforeEach(() => {
    pipeline = createTestPipeline({ artifactTtlMs: 24 * HOUR_MS });
  });

  async function seedComplete(jobId: string, createdAt: Date): Promise<string> {
    const descriptor = await pipeline.artifactStorage.put(Buffer.from(jobId), {
      contentType: 'application/zip',
      jobId,
    });
    pipeline.jobRepository.seed(
      createTestJob(jobId, ['txt'], createdAt).claim(createdAt).complete(descriptor.ref, createdAt),
    );
    await pipeline.payloadStore.put(jobId, createTestPayload());
    return descriptor.ref;
  }

  it('should delete expired jobs with their artifacts and keep fresh ones', async () => {
    const oldRef = await seedComplete('old', new Date('2026-03-01T11:00:00.000Z'));
    const freshRef = await seedComplete('fresh', new Date('2026-03-02T11:00:00.000Z'));

    const result = await pipeline.sweepExpiredJobs.execute({ now });

    expect(result).toEqual({
      jobsDeleted: 1,
      artifactsDeleted: 1,
      orphanArtifactsPurged: 0,
      errors: 0,
    });
    expect(pipeline.jobRepository.getJob('old')).toBeUndefined();
    expect(pipeline.artifactStorage.has(oldRef)).toBe(false);
    expect(pipeline.payloadStore.has('old')).toBe(false);
    expect(pipeline.jobRepository.getJob('fresh')).toBeDefined();
    expect(pipeline.artifactStorage.has(freshRef)).toBe(true);
    expect(pipeline.eventPublisher.getEventNames()).toEqual(['job.expired']);
  });

  it('should delete the artifact before the job record', async () => {
    await seedComplete('old', new Date('2026-03-01T00:00:00.000Z'));
    const order: string[] = [];
    const deleteArtifact = vi.spyOn(pipeline.artifactStorage, 'delete');
    const deleteJob = vi.spyOn(pipeline.jobRepository, 'delete');
    deleteArtifact.mockImplementation(async () => {
      order.push('artifact');
    });
    deleteJob.mockImplementation(async () => {
      order.push('job');
      return true;
    });

    await pipeline.sweepExpiredJobs.execute({ now });

    expect(order).toEqual(['artifact', 'job']);
  });

  it('should keep the job when its artifact could not be deleted', async () => {
    await seedComplete('old', new Date('2026-03-01T00:00:00.000Z'));
    vi.spyOn(pipeline.artifactStorage, 'delete').mockRejectedValueOnce(new Error('bucket down'));

    const result = await pipeline.sweepExpiredJobs.execute({ now });

    expect(result.errors).toBe(1);
    expect(result.jobsDeleted).toBe(0);
    expect(pipeline.jobRepository.getJob('old')).toBeDefined();
  });

  it('should remove expired jobs in any status', async () => {
    pipeline.jobRepository.seed(createTestJob('pending-old', ['txt'], new Date('2026-03-01T00:00:00.000Z')));

    const result = await pipeline.sweepExpiredJobs.execute({ now });

    expect(result.jobsDeleted).toBe(1);
    expect(result.artifactsDeleted).toBe(0);
  });

  it('should purge expired artifacts no job points at', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
    await pipeline.artifactStorage.put(Buffer.from('orphan'), {
      contentType: 'application/zip',
      jobId: 'crashed',
    });
    vi.useRealTimers();

    const result = await pipeline.sweepExpiredJobs.execute({ now });

    expect(result.orphanArtifactsPurged).toBe(1);
    expect(pipeline.artifactStorage.count()).toBe(0);
  });

  it('should honour the batch size', async () => {
    pipeline = createTestPipeline({ sweepBatchSize: 2 });
    for (const id of ['a', 'b', 'c']) {
      pipeline.jobRepository.seed(createTestJob(id, ['txt'], new Date('2026-03-01T00:00:00.000Z')));
    }

    const result = await pipeline.sweepExpiredJobs.execute({ now });

    expect(result.jobsDeleted).toBe(2);
    expect(pipeline.jobRepository.getJobCount()).toBe(1);
  });
});
