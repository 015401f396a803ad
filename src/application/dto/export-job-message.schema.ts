import { z } from 'zod';

/**
 * Job queue message body
 */
export const exportJobMessageSchema = z.object({
  jobId: z.string().uuid(),
});

export type ExportJobMessageDto = z.infer<typeof exportJobMessageSchema>;
