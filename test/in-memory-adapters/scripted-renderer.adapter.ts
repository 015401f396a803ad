import { ArtifactRendererPort, RenderContext } from '../../src/application/ports/output/artifact-renderer.port';
import { ExportFormat } from '../../src/domain/value-objects/export-format.vo';
import { ExportRequestPayload } from '../../src/domain/value-objects/export-payload.vo';
import { RenderError } from '../../src/domain/errors/export.errors';

export type RenderStep =
  | { kind: 'ok' }
  | { kind: 'transient' }
  | { kind: 'permanent' }
  /** Never settles on its own; rejects with the abort reason. */
  | { kind: 'hang' };

/**
 * Renderer whose outcome per call is scripted per format. Unscripted calls
 * succeed with `<format>:<title>` as the bytes.
 */
export class ScriptedRendererAdapter implements ArtifactRendererPort {
  private scripts: Map<ExportFormat, RenderStep[]> = new Map();
  readonly calls: { format: ExportFormat; jobId: string; workDir: string }[] = [];

  script(format: ExportFormat, ...steps: RenderStep[]): this {
    this.scripts.set(format, steps);
    return this;
  }

  async render(
    format: ExportFormat,
    payload: ExportRequestPayload,
    context: RenderContext,
  ): Promise<Buffer> {
    this.calls.push({ format, jobId: context.jobId, workDir: context.workDir });
    const step = this.scripts.get(format)?.shift() ?? { kind: 'ok' };

    switch (step.kind) {
      case 'ok':
        return Buffer.from(`${format}:${payload.title}`, 'utf8');
      case 'transient':
        throw RenderError.transient(format, `${format} converter busy`);
      case 'permanent':
        throw RenderError.permanent(format, `${format} input rejected`);
      case 'hang':
        return new Promise<Buffer>((_resolve, reject) => {
          context.signal.addEventListener('abort', () => reject(context.signal.reason), {
            once: true,
          });
        });
    }
  }

  callCount(format: ExportFormat): number {
    return this.calls.filter((call) => call.format === format).length;
  }
}
