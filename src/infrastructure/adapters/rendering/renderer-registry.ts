import { Injectable } from '@nestjs/common';
import {
  ArtifactRendererPort,
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import { ExportFormat } from '../../../domain/value-objects/export-format.vo';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';
import { ExportError, RenderError } from '../../../domain/errors/export.errors';
import { DocxRenderer } from './docx.renderer';
import { XlsxRenderer } from './xlsx.renderer';
import { PptxRenderer } from './pptx.renderer';
import { PdfRenderer } from './pdf.renderer';
import { TxtRenderer } from './txt.renderer';

function assertNever(format: never): never {
  throw new Error(`Unsupported export format: ${String(format)}`);
}

/**
 * Renderer Registry
 * Implements ArtifactRendererPort by dispatching on the format. Anything a
 * renderer throws outside the error taxonomy is a permanent failure.
 */
@Injectable()
export class RendererRegistry implements ArtifactRendererPort {
  constructor(
    private readonly docx: DocxRenderer,
    private readonly xlsx: XlsxRenderer,
    private readonly pptx: PptxRenderer,
    private readonly pdf: PdfRenderer,
    private readonly txt: TxtRenderer,
  ) {}

  async render(
    format: ExportFormat,
    payload: ExportRequestPayload,
    context: RenderContext,
  ): Promise<Buffer> {
    try {
      return await this.rendererFor(format).render(payload, context);
    } catch (error) {
      if (context.signal.aborted) {
        throw context.signal.reason;
      }
      if (error instanceof ExportError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw RenderError.permanent(format, `Failed to render ${format}: ${message}`, error);
    }
  }

  rendererFor(format: ExportFormat): FormatRenderer {
    switch (format) {
      case 'docx':
        return this.docx;
      case 'xlsx':
        return this.xlsx;
      case 'pptx':
        return this.pptx;
      case 'pdf':
        return this.pdf;
      case 'txt':
        return this.txt;
      default:
        return assertNever(format);
    }
  }
}
