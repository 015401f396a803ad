import { EXPORT_FORMATS, ExportFormat, FORMAT_DESCRIPTORS } from './export-format.vo';
import { Requester } from './export-payload.vo';

export const MANIFEST_FILENAME = 'manifest.json';

export interface ArtifactChecksum {
  readonly format: ExportFormat;
  readonly file: string;
  readonly algorithm: 'sha256';
  readonly digest: string;
  readonly size: number;
}

export interface BundleManifestProps {
  readonly jobId: string;
  readonly requester: Requester;
  readonly createdAt: Date;
  readonly checksums: readonly ArtifactChecksum[];
}

/**
 * Bundle Manifest Value Object
 *
 * Written as `manifest.json` into every bundle. Serialization is canonical:
 * fixed key order, entries in canonical format order, two-space indent and
 * a trailing newline, so the same job and artifact bytes always give the
 * same manifest bytes.
 */
export class BundleManifestVO {
  private constructor(private readonly props: BundleManifestProps) {}

  static create(props: BundleManifestProps): BundleManifestVO {
    if (props.checksums.length === 0) {
      throw new Error('Bundle manifest requires at least one artifact');
    }
    const seen = new Set<ExportFormat>();
    for (const entry of props.checksums) {
      if (seen.has(entry.format)) {
        throw new Error(`Duplicate manifest entry for format ${entry.format}`);
      }
      if (!/^[0-9a-f]{64}$/.test(entry.digest)) {
        throw new Error(`Invalid sha256 digest for ${entry.file}`);
      }
      seen.add(entry.format);
    }

    const ordered = [...props.checksums].sort(
      (a, b) => EXPORT_FORMATS.indexOf(a.format) - EXPORT_FORMATS.indexOf(b.format),
    );

    return new BundleManifestVO({ ...props, checksums: ordered });
  }

  static checksumFor(format: ExportFormat, digest: string, size: number): ArtifactChecksum {
    return {
      format,
      file: FORMAT_DESCRIPTORS[format].filename,
      algorithm: 'sha256',
      digest,
      size,
    };
  }

  get jobId(): string {
    return this.props.jobId;
  }

  get formats(): ExportFormat[] {
    return this.props.checksums.map((entry) => entry.format);
  }

  get checksums(): readonly ArtifactChecksum[] {
    return this.props.checksums;
  }

  toJSON() {
    return {
      job_id: this.props.jobId,
      requester: {
        session_id: this.props.requester.sessionId,
        user_id: this.props.requester.userId ?? null,
      },
      formats: this.formats,
      created_at: this.props.createdAt.toISOString(),
      checksums: this.props.checksums.map((entry) => ({
        format: entry.format,
        file: entry.file,
        algorithm: entry.algorithm,
        digest: entry.digest,
        size: entry.size,
      })),
    };
  }

  serialize(): string {
    return `${JSON.stringify(this.toJSON(), null, 2)}\n`;
  }
}
