import { describe, it, expect } from 'vitest';
import { ExportJobEntity } from '../../../src/domain/entities/export-job.entity';
import { JobStatus, JobStatusVO } from '../../../src/domain/value-objects/job-status.vo';
import { ExportErrorCode } from '../../../src/domain/value-objects/job-error.vo';
import { HOUR_MS, createTestJob } from '../helpers/mock-factories';

describe('ExportJobEntity', () => {
  const createdAt = new Date('2026-03-01T10:00:00.000Z');
  const later = new Date('2026-03-01T10:05:00.000Z');

  describe('create', () => {
    it('should start pending with zero retries', () => {
      const job = createTestJob('job-1', ['txt', 'docx', 'txt'], createdAt);

      expect(job.status.value).toBe(JobStatus.PENDING);
      expect(job.retryCount).toBe(0);
      expect(job.createdAt).toEqual(createdAt);
      expect(job.updatedAt).toEqual(createdAt);
      expect(job.claimedAt).toBeUndefined();
    });

    it('should store formats deduplicated in canonical order', () => {
      const job = createTestJob('job-1', ['txt', 'pdf', 'docx', 'txt']);

      expect(job.formats).toEqual(['docx', 'pdf', 'txt']);
    });

    it('should reject an empty format list', () => {
      expect(() => createTestJob('job-1', [])).toThrow('At least one export format is required');
    });

    it('should reject a blank session id', () => {
      expect(() =>
        ExportJobEntity.create({
          jobId: 'job-1',
          requester: { sessionId: '  ' },
          formats: ['txt'],
          template: 'summary',
        }),
      ).toThrow('Requester session ID is required');
    });
  });

  describe('transitions', () => {
    it('should claim a pending job', () => {
      const claimed = createTestJob('job-1', ['txt'], createdAt).claim(later);

      expect(claimed.status.value).toBe(JobStatus.RUNNING);
      expect(claimed.claimedAt).toEqual(later);
      expect(claimed.updatedAt).toEqual(later);
    });

    it('should complete a running job and clear the claim', () => {
      const completed = createTestJob('job-1').claim(later).complete('ref-1', later);

      expect(completed.status.value).toBe(JobStatus.COMPLETE);
      expect(completed.resultRef).toBe('ref-1');
      expect(completed.claimedAt).toBeUndefined();
    });

    it('should fail a running job with the error detail', () => {
      const error = { code: ExportErrorCode.RENDER_PERMANENT, message: 'bad', retryable: false };
      const failed = createTestJob('job-1').claim().fail(error);

      expect(failed.status.value).toBe(JobStatus.FAILED);
      expect(failed.error).toEqual(error);
      expect(failed.resultRef).toBeUndefined();
    });

    it('should reset a running job for retry and count it', () => {
      const reset = createTestJob('job-1').claim().resetForRetry();

      expect(reset.status.value).toBe(JobStatus.PENDING);
      expect(reset.retryCount).toBe(1);
      expect(reset.claimedAt).toBeUndefined();
    });

    it('should not mutate the original instance', () => {
      const job = createTestJob('job-1');
      job.claim();

      expect(job.status.value).toBe(JobStatus.PENDING);
    });

    it.each([
      ['complete a pending job', () => createTestJob('job-1').complete('ref-1')],
      ['claim a running job', () => createTestJob('job-1').claim().claim()],
      ['claim a complete job', () => createTestJob('job-1').claim().complete('ref-1').claim()],
      ['reset a pending job', () => createTestJob('job-1').resetForRetry()],
    ])('should refuse to %s', (_label, transition) => {
      expect(transition).toThrow('Invalid status transition');
    });

    it('should refuse an empty result reference', () => {
      expect(() => createTestJob('job-1').claim().complete('')).toThrow(
        'Result reference is required to complete a job',
      );
    });
  });

  describe('reconstitute', () => {
    it('should reject a complete job without a result reference', () => {
      expect(() =>
        ExportJobEntity.reconstitute({
          jobId: 'job-1',
          requester: { sessionId: 'session-1' },
          formats: ['txt'],
          template: 'summary',
          status: JobStatusVO.complete(),
          createdAt,
          updatedAt: createdAt,
          retryCount: 0,
        }),
      ).toThrow('Result reference must be set exactly when job is complete (complete)');
    });

    it('should reject a running job without a claim timestamp', () => {
      expect(() =>
        ExportJobEntity.reconstitute({
          jobId: 'job-1',
          requester: { sessionId: 'session-1' },
          formats: ['txt'],
          template: 'summary',
          status: JobStatusVO.running(),
          createdAt,
          updatedAt: createdAt,
          retryCount: 0,
        }),
      ).toThrow('Claim timestamp must be set exactly when job is running (running)');
    });
  });

  describe('expiry', () => {
    it('should expire exactly at createdAt + ttl', () => {
      const job = createTestJob('job-1', ['txt'], createdAt);
      const ttl = 24 * HOUR_MS;

      expect(job.expiresAt(ttl).toISOString()).toBe('2026-03-02T10:00:00.000Z');
      expect(job.isExpired(new Date('2026-03-02T09:59:59.999Z'), ttl)).toBe(false);
      expect(job.isExpired(new Date('2026-03-02T10:00:00.000Z'), ttl)).toBe(true);
    });
  });

  describe('transitionFields', () => {
    it('should use null for cleared fields', () => {
      const fields = createTestJob('job-1', ['txt'], createdAt).claim(later).transitionFields();

      expect(fields).toEqual({
        updatedAt: later,
        claimedAt: later,
        resultRef: null,
        error: null,
        retryCount: 0,
        progress: 5,
      });
    });
  });

  describe('progress', () => {
    it('should follow the job through its lifecycle', () => {
      const job = createTestJob('job-1');
      const claimed = job.claim(later);
      const completed = claimed.recordProgress(40, later).complete('ref-1', later);

      expect(job.progress).toBe(0);
      expect(claimed.progress).toBe(5);
      expect(completed.progress).toBe(100);
    });

    it('should keep the progress reached when a job fails', () => {
      const error = { code: ExportErrorCode.RENDER_PERMANENT, message: 'bad', retryable: false };
      const failed = createTestJob('job-1').claim().recordProgress(40).fail(error);

      expect(failed.progress).toBe(40);
    });

    it('should start over when a job is reset for retry', () => {
      const reset = createTestJob('job-1').claim().recordProgress(40).resetForRetry();

      expect(reset.progress).toBe(0);
    });

    it('should only move forward while running', () => {
      const running = createTestJob('job-1', ['txt'], createdAt).claim(createdAt).recordProgress(40, later);

      expect(running.recordProgress(30).progress).toBe(40);
      expect(running.recordProgress(40, createdAt).updatedAt).toEqual(later);
      expect(createTestJob('job-2').recordProgress(40).progress).toBe(0);
    });

    it('should reject progress outside 0 to 100', () => {
      const running = createTestJob('job-1').claim();

      expect(() => running.recordProgress(101)).toThrow('Progress must be an integer from 0 to 100');
      expect(() => running.recordProgress(12.5)).toThrow('Progress must be an integer from 0 to 100');
    });

    it('should reject a complete job without full progress', () => {
      expect(() =>
        ExportJobEntity.reconstitute({
          jobId: 'job-1',
          requester: { sessionId: 'session-1' },
          formats: ['txt'],
          template: 'summary',
          status: JobStatusVO.complete(),
          resultRef: 'ref-1',
          createdAt,
          updatedAt: createdAt,
          retryCount: 0,
          progress: 95,
        }),
      ).toThrow('Complete job must report full progress (95)');
    });
  });
});
