import { Injectable } from '@nestjs/common';
import PptxGenJS from 'pptxgenjs';
import {
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import {
  ExportRequestPayload,
  ExportTable,
  formatCell,
} from '../../../domain/value-objects/export-payload.vo';
import { RenderError } from '../../../domain/errors/export.errors';

/** Rows of a table that fit on its slide. */
export const SLIDE_TABLE_ROWS = 15;

const BODY_FONT_SIZE = 16;
const TABLE_FONT_SIZE = 14;

/**
 * Slide deck built with `pptxgenjs`: a title slide, one slide per section
 * and one table slide per table.
 */
@Injectable()
export class PptxRenderer implements FormatRenderer {
  readonly format = 'pptx' as const;

  async render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer> {
    context.signal.throwIfAborted();

    const deck = new PptxGenJS();
    deck.layout = payload.options.pageOrientation === 'portrait' ? 'LAYOUT_4x3' : 'LAYOUT_WIDE';
    deck.author = 'document-export-service';
    deck.title = payload.title;

    const cover = deck.addSlide();
    cover.addText(payload.title, { x: 0.5, y: 1.5, w: '90%', h: 1.2, fontSize: 36, bold: true });
    if (payload.summary) {
      cover.addText(payload.summary, { x: 0.5, y: 3, w: '90%', h: 2, fontSize: BODY_FONT_SIZE });
    }

    for (const section of payload.sections) {
      const slide = deck.addSlide();
      slide.addText(section.heading, { x: 0.5, y: 0.3, w: '90%', h: 0.8, fontSize: 28, bold: true });
      slide.addText(section.body, {
        x: 0.5,
        y: 1.3,
        w: '90%',
        h: 4,
        fontSize: BODY_FONT_SIZE,
        valign: 'top',
      });
    }

    for (const table of payload.tables) {
      this.addTableSlide(deck, table);
    }

    context.signal.throwIfAborted();
    const output = await deck.write({ outputType: 'nodebuffer' });
    if (Buffer.isBuffer(output)) {
      return output;
    }
    if (output instanceof Uint8Array) {
      return Buffer.from(output);
    }
    if (output instanceof ArrayBuffer) {
      return Buffer.from(output);
    }
    throw RenderError.permanent('pptx', 'Presentation writer returned no binary output');
  }

  private addTableSlide(deck: PptxGenJS, table: ExportTable): void {
    const slide = deck.addSlide();
    slide.addText(table.name, { x: 0.5, y: 0.3, w: '90%', h: 0.8, fontSize: 24, bold: true });

    const shown = table.rows.slice(0, SLIDE_TABLE_ROWS);
    const header: PptxGenJS.TableRow = table.columns.map((column) => ({
      text: column,
      options: { bold: true },
    }));
    const body: PptxGenJS.TableRow[] = shown.map((row) =>
      table.columns.map((column) => ({ text: formatCell(row[column]) })),
    );
    slide.addTable([header, ...body], { x: 0.5, y: 1.2, w: 9, fontSize: TABLE_FONT_SIZE });

    if (table.rows.length > shown.length) {
      slide.addText(`Showing ${shown.length} of ${table.rows.length} rows.`, {
        x: 0.5,
        y: 6.8,
        w: '90%',
        h: 0.4,
        fontSize: 12,
        italic: true,
      });
    }
  }
}
