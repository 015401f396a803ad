import { Injectable } from '@nestjs/common';
import {
  Document,
  HeadingLevel,
  Packer,
  PageOrientation,
  Paragraph,
  Table,
  TableCell,
  TableRow as DocxTableRow,
  TextRun,
  WidthType,
} from 'docx';
import {
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import {
  CellValue,
  ExportRequestPayload,
  ExportTable,
  formatCell,
} from '../../../domain/value-objects/export-payload.vo';

/** Rows of each table shown in the `full-report` template. */
export const TABLE_PREVIEW_ROWS = 50;

export const FULL_REPORT_TEMPLATE = 'full-report';

/**
 * Word report built with `docx`. Every template carries the title, summary
 * and sections; `full-report` adds a preview of each table.
 */
@Injectable()
export class DocxRenderer implements FormatRenderer {
  readonly format = 'docx' as const;

  async render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer> {
    context.signal.throwIfAborted();

    const children: (Paragraph | Table)[] = [
      new Paragraph({ text: payload.title, heading: HeadingLevel.TITLE }),
    ];

    if (payload.summary) {
      children.push(
        new Paragraph({ text: 'Summary', heading: HeadingLevel.HEADING_1 }),
        ...paragraphs(payload.summary),
      );
    }

    for (const section of payload.sections) {
      children.push(
        new Paragraph({ text: section.heading, heading: HeadingLevel.HEADING_1 }),
        ...paragraphs(section.body),
      );
    }

    if (payload.options.template === FULL_REPORT_TEMPLATE) {
      const numberFormat = new Intl.NumberFormat(payload.options.locale);
      for (const table of payload.tables) {
        children.push(...this.tablePreview(table, numberFormat));
      }
    }

    const document = new Document({
      creator: 'document-export-service',
      title: payload.title,
      sections: [
        {
          properties: {
            page: {
              size: {
                orientation:
                  payload.options.pageOrientation === 'landscape'
                    ? PageOrientation.LANDSCAPE
                    : PageOrientation.PORTRAIT,
              },
            },
          },
          children,
        },
      ],
    });

    return Packer.toBuffer(document);
  }

  private tablePreview(table: ExportTable, numberFormat: Intl.NumberFormat): (Paragraph | Table)[] {
    const shown = table.rows.slice(0, TABLE_PREVIEW_ROWS);
    const header = new DocxTableRow({
      tableHeader: true,
      children: table.columns.map(
        (column) =>
          new TableCell({
            children: [new Paragraph({ children: [new TextRun({ text: column, bold: true })] })],
          }),
      ),
    });
    const body = shown.map(
      (row) =>
        new DocxTableRow({
          children: table.columns.map(
            (column) =>
              new TableCell({
                children: [new Paragraph(displayCell(row[column], numberFormat))],
              }),
          ),
        }),
    );

    const blocks: (Paragraph | Table)[] = [
      new Paragraph({ text: table.name, heading: HeadingLevel.HEADING_2 }),
      new Table({ width: { size: 100, type: WidthType.PERCENTAGE }, rows: [header, ...body] }),
    ];
    if (table.rows.length > shown.length) {
      blocks.push(
        new Paragraph({
          children: [
            new TextRun({
              text: `Showing ${shown.length} of ${table.rows.length} rows.`,
              italics: true,
            }),
          ],
        }),
      );
    }
    return blocks;
  }
}

function paragraphs(text: string): Paragraph[] {
  return text.split(/\r?\n/).map((line) => new Paragraph(line));
}

function displayCell(value: CellValue | undefined, numberFormat: Intl.NumberFormat): string {
  return typeof value === 'number' ? numberFormat.format(value) : formatCell(value);
}
