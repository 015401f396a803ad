import { ExportFormat } from './export-format.vo';

export type CellValue = string | number | boolean | null;

export type TableRow = Readonly<Record<string, CellValue>>;

export interface ExportSection {
  readonly heading: string;
  readonly body: string;
}

export interface ExportTable {
  readonly name: string;
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export type PageOrientation = 'portrait' | 'landscape';

export interface RenderOptions {
  readonly template: string;
  readonly locale: string;
  readonly pageOrientation: PageOrientation;
}

export interface Requester {
  readonly sessionId: string;
  readonly userId?: string;
}

/**
 * Validated export request content. Persisted once at admission and read
 * back by the worker without re-validation.
 */
export interface ExportRequestPayload {
  readonly title: string;
  readonly summary: string;
  readonly requester: Requester;
  readonly sections: readonly ExportSection[];
  readonly tables: readonly ExportTable[];
  readonly formats: readonly ExportFormat[];
  readonly options: RenderOptions;
}

export function formatCell(value: CellValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}
