import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { AppConfig } from '../../../config/configuration';
import {
  FormatRenderer,
  RenderContext,
} from '../../../application/ports/output/artifact-renderer.port';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';
import { RenderError } from '../../../domain/errors/export.errors';
import { DocxRenderer } from './docx.renderer';

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * PDF via headless LibreOffice: the Word report is rendered first and then
 * converted. The converter runs with the job's abort signal and is killed
 * outright when the deadline passes.
 */
@Injectable()
export class PdfRenderer implements FormatRenderer {
  readonly format = 'pdf' as const;
  private readonly logger = new Logger(PdfRenderer.name);
  private readonly executable: string;

  constructor(
    private readonly docxRenderer: DocxRenderer,
    configService: ConfigService<AppConfig>,
  ) {
    this.executable = configService.getOrThrow('rendering', { infer: true }).libreOfficePath;
  }

  async render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer> {
    const source = await this.docxRenderer.render(payload, context);

    const outDir = join(context.workDir, 'pdf');
    await mkdir(outDir, { recursive: true });
    const sourcePath = join(context.workDir, 'report.docx');
    await writeFile(sourcePath, source);

    await this.convert(sourcePath, outDir, context);

    try {
      return await readFile(join(outDir, 'report.pdf'));
    } catch (error) {
      throw RenderError.permanent('pdf', 'LibreOffice produced no PDF output', error);
    }
  }

  private convert(sourcePath: string, outDir: string, context: RenderContext): Promise<void> {
    const { signal } = context;
    signal.throwIfAborted();

    const args = [
      '--headless',
      // Private profile per conversion; concurrent instances cannot share one
      `-env:UserInstallation=${pathToFileURL(join(context.workDir, 'lo-profile')).href}`,
      '--convert-to',
      'pdf',
      '--outdir',
      outDir,
      sourcePath,
    ];

    this.logger.debug(`Converting ${sourcePath} for job ${context.jobId}`);

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.executable, args, {
        signal,
        killSignal: 'SIGKILL',
        stdio: 'ignore',
      });

      child.once('error', (error) => {
        if (signal.aborted) {
          reject(signal.reason);
        } else if (isMissingExecutable(error)) {
          reject(
            RenderError.permanent('pdf', `LibreOffice executable not found: ${this.executable}`, error),
          );
        } else {
          reject(RenderError.transient('pdf', `LibreOffice failed to start: ${error.message}`, error));
        }
      });

      child.once('exit', (code, killedBy) => {
        if (signal.aborted) {
          reject(signal.reason);
        } else if (code === 0) {
          resolve();
        } else {
          reject(
            RenderError.transient(
              'pdf',
              `LibreOffice exited with ${code !== null ? `code ${code}` : `signal ${killedBy}`}`,
            ),
          );
        }
      });
    });
  }
}
