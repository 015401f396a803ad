import { z } from 'zod';
import { JobStatus } from '../../../domain/value-objects/job-status.vo';
import { EXPORT_FORMATS } from '../../../domain/value-objects/export-format.vo';
import { ExportErrorCode } from '../../../domain/value-objects/job-error.vo';

/**
 * Shape of a job item in the DynamoDB table. Timestamps are ISO-8601 UTC
 * strings so range filters compare lexicographically.
 */
export const jobRecordSchema = z.object({
  jobId: z.string().min(1),
  status: z.nativeEnum(JobStatus),
  requester: z.object({
    sessionId: z.string().min(1),
    userId: z.string().optional(),
  }),
  formats: z.array(z.enum(EXPORT_FORMATS)).min(1),
  template: z.string(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  claimedAt: z.string().datetime().optional(),
  resultRef: z.string().optional(),
  error: z
    .object({
      code: z.nativeEnum(ExportErrorCode),
      message: z.string(),
      retryable: z.boolean(),
    })
    .optional(),
  retryCount: z.number().int().min(0),
  // Absent on records written before progress was tracked
  progress: z.number().int().min(0).max(100).optional(),
});

export type JobRecord = z.infer<typeof jobRecordSchema>;
