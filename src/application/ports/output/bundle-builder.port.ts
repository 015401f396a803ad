import { BundleManifestVO } from '../../../domain/value-objects/bundle-manifest.vo';

export interface BundleEntry {
  /** Name inside the archive. */
  name: string;
  /** File on local disk holding the entry bytes. */
  path: string;
}

export interface BundleBuildResult {
  path: string;
  size: number;
}

/**
 * Bundle Builder Port (Driven Port)
 * Packs rendered artifacts and the manifest into a single archive on disk.
 */
export interface BundleBuilderPort {
  build(
    entries: BundleEntry[],
    manifest: BundleManifestVO,
    outputPath: string,
    options: { entryDate: Date },
  ): Promise<BundleBuildResult>;
}
