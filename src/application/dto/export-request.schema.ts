import { z } from 'zod';
import { EXPORT_FORMATS, normalizeFormats } from '../../domain/value-objects/export-format.vo';
import { ExportRequestPayload } from '../../domain/value-objects/export-payload.vo';
import { ValidationError } from '../../domain/errors/export.errors';
import { RequestLimits } from '../../config/export-settings';

const LOCALE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

/**
 * Build the admission schema for the configured limits and template allow-list.
 */
export function createExportRequestSchema(
  limits: RequestLimits,
  allowedTemplates: readonly string[],
) {
  const cellValue = z.union([
    z.string().max(limits.maxCellLength),
    z.number().finite(),
    z.boolean(),
    z.null(),
  ]);

  const section = z.object({
    heading: z.string().trim().min(1).max(limits.maxHeadingLength),
    body: z.string().max(limits.maxBodyLength).default(''),
  });

  const table = z
    .object({
      name: z.string().trim().min(1).max(limits.maxTableNameLength),
      columns: z
        .array(z.string().trim().min(1).max(limits.maxColumnNameLength))
        .min(1)
        .max(limits.maxColumns),
      rows: z
        .array(z.record(z.string(), cellValue))
        .max(limits.maxTableRows, {
          message: `Table row limit of ${limits.maxTableRows} exceeded`,
        }),
    })
    .superRefine((value, ctx) => {
      // Only the first offending row is reported
      const declared = new Set(value.columns);
      const rowIndex = value.rows.findIndex((row) =>
        Object.keys(row).some((key) => !declared.has(key)),
      );
      if (rowIndex >= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', rowIndex],
          message: 'Row has values for columns not listed in columns',
        });
      }
    });

  const options = z.object({
    template: z
      .string()
      .refine((template) => allowedTemplates.includes(template), {
        message: `Template must be one of: ${allowedTemplates.join(', ')}`,
      })
      .optional(),
    locale: z.string().regex(LOCALE_PATTERN, 'Invalid locale').default('en-US'),
    pageOrientation: z.enum(['portrait', 'landscape']).default('portrait'),
  });

  return z.object({
    title: z.string().trim().min(1).max(limits.maxTitleLength),
    summary: z.string().max(limits.maxSummaryLength).default(''),
    sessionId: z.string().trim().min(1).max(limits.maxIdentityLength),
    userId: z.string().trim().min(1).max(limits.maxIdentityLength).optional(),
    sections: z.array(section).max(limits.maxSections).default([]),
    tables: z.array(table).max(limits.maxTables).default([]),
    formats: z.array(z.enum(EXPORT_FORMATS)).min(1, 'At least one format is required'),
    options: options.default({}),
  });
}

export type ExportRequestInput = z.input<ReturnType<typeof createExportRequestSchema>>;

/**
 * Validate an untrusted request body into a payload.
 * @throws ValidationError listing every violated constraint
 */
export function parseExportRequest(
  input: unknown,
  limits: RequestLimits,
  allowedTemplates: readonly string[],
): ExportRequestPayload {
  const result = createExportRequestSchema(limits, allowedTemplates).safeParse(input);

  if (!result.success) {
    throw new ValidationError(
      result.error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const request = result.data;

  return {
    title: request.title,
    summary: request.summary,
    requester: {
      sessionId: request.sessionId,
      ...(request.userId !== undefined && { userId: request.userId }),
    },
    sections: request.sections,
    tables: request.tables,
    formats: normalizeFormats(request.formats),
    options: {
      template: request.options.template ?? allowedTemplates[0],
      locale: request.options.locale,
      pageOrientation: request.options.pageOrientation,
    },
  };
}
