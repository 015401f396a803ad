import { Injectable } from '@nestjs/common';
import { Workbook, Worksheet } from 'exceljs';
import {
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import {
  ExportRequestPayload,
  ExportTable,
} from '../../../domain/value-objects/export-payload.vo';

export const MAX_SHEET_NAME_LENGTH = 31;
export const SUMMARY_SHEET_NAME = 'Summary';

const INVALID_SHEET_CHARS = /[[\]:*?/\\]/g;

/**
 * Spreadsheet with one sheet per table, built with `exceljs`. A request
 * without tables gets a single summary sheet.
 */
@Injectable()
export class XlsxRenderer implements FormatRenderer {
  readonly format = 'xlsx' as const;

  async render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer> {
    context.signal.throwIfAborted();

    const workbook = new Workbook();
    workbook.creator = 'document-export-service';
    workbook.title = payload.title;

    if (payload.tables.length === 0) {
      this.addSummarySheet(workbook, payload);
    } else {
      const usedNames = new Set<string>();
      payload.tables.forEach((table, index) => {
        const name = uniqueSheetName(table.name, index, usedNames);
        this.addTableSheet(workbook, name, table);
        // Let the abort signal through between large sheets
        context.signal.throwIfAborted();
      });
    }

    const bytes = await workbook.xlsx.writeBuffer();
    return Buffer.from(bytes);
  }

  private addTableSheet(workbook: Workbook, name: string, table: ExportTable): Worksheet {
    const sheet = workbook.addWorksheet(name, {
      views: [{ state: 'frozen', ySplit: 1 }],
    });
    sheet.columns = table.columns.map((column) => ({
      header: column,
      key: column,
      width: Math.min(Math.max(column.length + 2, 10), 60),
    }));
    sheet.getRow(1).font = { bold: true };

    for (const row of table.rows) {
      sheet.addRow(table.columns.map((column) => row[column] ?? null));
    }
    return sheet;
  }

  private addSummarySheet(workbook: Workbook, payload: ExportRequestPayload): Worksheet {
    const sheet = workbook.addWorksheet(SUMMARY_SHEET_NAME, {
      views: [{ state: 'frozen', ySplit: 1 }],
    });
    sheet.columns = [
      { header: 'Field', key: 'field', width: 24 },
      { header: 'Value', key: 'value', width: 80 },
    ];
    sheet.getRow(1).font = { bold: true };

    sheet.addRow(['Title', payload.title]);
    sheet.addRow(['Summary', payload.summary]);
    for (const section of payload.sections) {
      sheet.addRow([section.heading, section.body]);
    }
    return sheet;
  }
}

/**
 * Excel sheet names: at most 31 characters, no `[]:*?/\`, unique
 * case-insensitively within a workbook.
 */
export function uniqueSheetName(raw: string, index: number, used: Set<string>): string {
  const cleaned = raw.replace(INVALID_SHEET_CHARS, '_').trim();
  const base = (cleaned || `Sheet${index + 1}`).slice(0, MAX_SHEET_NAME_LENGTH);

  let candidate = base;
  for (let n = 2; used.has(candidate.toLowerCase()); n++) {
    const suffix = ` (${n})`;
    candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}
