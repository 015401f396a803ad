import { ExportFormat } from '../../../domain/value-objects/export-format.vo';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';

export interface RenderContext {
  readonly jobId: string;
  /** Scratch directory private to this render call. */
  readonly workDir: string;
  /** Aborted when the job's processing deadline passes. */
  readonly signal: AbortSignal;
}

/**
 * One format's renderer.
 * Fails with `RenderError.transient` or `RenderError.permanent`.
 */
export interface FormatRenderer {
  readonly format: ExportFormat;
  render(payload: ExportRequestPayload, context: RenderContext): Promise<Buffer>;
}

/**
 * Artifact Renderer Port (Driven Port)
 * Dispatches a format to its renderer.
 */
export interface ArtifactRendererPort {
  render(
    format: ExportFormat,
    payload: ExportRequestPayload,
    context: RenderContext,
  ): Promise<Buffer>;
}
