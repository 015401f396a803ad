import { Injectable, Logger } from '@nestjs/common';
import archiver from 'archiver';
import { createWriteStream } from 'fs';
import { readFile, stat } from 'fs/promises';
import { pipeline } from 'stream/promises';
import {
  BundleBuildResult,
  BundleBuilderPort,
  BundleEntry,
} from '../../../application/ports/output/bundle-builder.port';
import {
  BundleManifestVO,
  MANIFEST_FILENAME,
} from '../../../domain/value-objects/bundle-manifest.vo';
import { RenderError } from '../../../domain/errors/export.errors';

/**
 * ZIP Bundle Builder Adapter
 * Deflated archive of the rendered files followed by `manifest.json`. Entry
 * dates are fixed by the caller so the same inputs give the same archive.
 */
@Injectable()
export class ZipBundleBuilderAdapter implements BundleBuilderPort {
  private readonly logger = new Logger(ZipBundleBuilderAdapter.name);

  async build(
    entries: BundleEntry[],
    manifest: BundleManifestVO,
    outputPath: string,
    options: { entryDate: Date },
  ): Promise<BundleBuildResult> {
    try {
      const contents = await Promise.all(entries.map((entry) => readFile(entry.path)));

      const archive = archiver('zip', { zlib: { level: 9 } });
      archive.on('warning', (warning) => archive.destroy(warning));

      // append() keeps insertion order; file() would go through the stat queue
      entries.forEach((entry, index) => {
        archive.append(contents[index], { name: entry.name, date: options.entryDate });
      });
      archive.append(manifest.serialize(), { name: MANIFEST_FILENAME, date: options.entryDate });

      await Promise.all([pipeline(archive, createWriteStream(outputPath)), archive.finalize()]);
    } catch (error) {
      throw RenderError.transient('bundle', `Failed to write bundle for job ${manifest.jobId}`, error);
    }

    const { size } = await stat(outputPath);
    this.logger.debug(`Bundled ${entries.length + 1} entries for job ${manifest.jobId} (${size} bytes)`);

    return { path: outputPath, size };
  }
}
