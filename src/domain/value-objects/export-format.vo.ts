/**
 * Supported output formats. Order here is the canonical order used for
 * bundle entries and manifest listings.
 */
export const EXPORT_FORMATS = ['docx', 'xlsx', 'pptx', 'pdf', 'txt'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface FormatDescriptor {
  readonly format: ExportFormat;
  readonly filename: string;
  readonly contentType: string;
}

export const FORMAT_DESCRIPTORS = {
  docx: {
    format: 'docx',
    filename: 'report.docx',
    contentType:
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  },
  xlsx: {
    format: 'xlsx',
    filename: 'tables.xlsx',
    contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  },
  pptx: {
    format: 'pptx',
    filename: 'report.pptx',
    contentType:
      'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  },
  pdf: {
    format: 'pdf',
    filename: 'report.pdf',
    contentType: 'application/pdf',
  },
  txt: {
    format: 'txt',
    filename: 'report.txt',
    contentType: 'text/plain; charset=utf-8',
  },
} as const satisfies Record<ExportFormat, FormatDescriptor>;

export const BUNDLE_FILENAME = 'export.zip';
export const BUNDLE_CONTENT_TYPE = 'application/zip';

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Deduplicate and sort into canonical order.
 */
export function normalizeFormats(formats: readonly ExportFormat[]): ExportFormat[] {
  return EXPORT_FORMATS.filter((format) => formats.includes(format));
}
