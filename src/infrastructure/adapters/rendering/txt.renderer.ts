import { Injectable } from '@nestjs/common';
import {
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import { ExportRequestPayload, formatCell } from '../../../domain/value-objects/export-payload.vo';

/**
 * Plain-text report: title block, then summary, sections and pipe tables,
 * each block present only when the request has content for it.
 */
@Injectable()
export class TxtRenderer implements FormatRenderer {
  readonly format = 'txt' as const;

  async render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer> {
    context.signal.throwIfAborted();
    return Buffer.from(this.buildLines(payload).join('\n'), 'utf8');
  }

  buildLines(payload: ExportRequestPayload): string[] {
    const title = payload.title.trim() || 'Export';
    const lines: string[] = [title, '='.repeat(title.length), ''];

    if (payload.summary) {
      lines.push('Summary:', payload.summary.trim(), '');
    }

    if (payload.sections.length > 0) {
      lines.push('Sections:');
      for (const section of payload.sections) {
        lines.push(`- ${section.heading.trim()}`, section.body.trim(), '');
      }
    }

    if (payload.tables.length > 0) {
      lines.push('Tables:');
      for (const table of payload.tables) {
        lines.push(`- ${table.name}`);
        lines.push(pipeRow(table.columns));
        for (const row of table.rows) {
          lines.push(pipeRow(table.columns.map((column) => formatCell(row[column]))));
        }
        lines.push('');
      }
    }

    return lines;
  }
}

function pipeRow(values: readonly string[]): string {
  return `  | ${values.join(' | ')} |`;
}
