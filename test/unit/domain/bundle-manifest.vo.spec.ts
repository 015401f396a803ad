import { describe, it, expect } from 'vitest';
import { BundleManifestVO } from '../../../src/domain/value-objects/bundle-manifest.vo';

const DIGEST_A = 'a'.repeat(64);
const DIGEST_B = 'b'.repeat(64);

describe('BundleManifestVO', () => {
  const createdAt = new Date('2026-03-01T10:00:00.000Z');

  it('should serialize with fixed key order and canonical format order', () => {
    const manifest = BundleManifestVO.create({
      jobId: 'job-1',
      requester: { sessionId: 'session-1' },
      createdAt,
      checksums: [
        BundleManifestVO.checksumFor('txt', DIGEST_A, 10),
        BundleManifestVO.checksumFor('docx', DIGEST_B, 20),
      ],
    });

    expect(manifest.serialize()).toBe(
      [
        '{',
        '  "job_id": "job-1",',
        '  "requester": {',
        '    "session_id": "session-1",',
        '    "user_id": null',
        '  },',
        '  "formats": [',
        '    "docx",',
        '    "txt"',
        '  ],',
        '  "created_at": "2026-03-01T10:00:00.000Z",',
        '  "checksums": [',
        '    {',
        '      "format": "docx",',
        '      "file": "report.docx",',
        '      "algorithm": "sha256",',
        `      "digest": "${DIGEST_B}",`,
        '      "size": 20',
        '    },',
        '    {',
        '      "format": "txt",',
        '      "file": "report.txt",',
        '      "algorithm": "sha256",',
        `      "digest": "${DIGEST_A}",`,
        '      "size": 10',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('should reject an empty manifest', () => {
    expect(() =>
      BundleManifestVO.create({ jobId: 'job-1', requester: { sessionId: 's' }, createdAt, checksums: [] }),
    ).toThrow('Bundle manifest requires at least one artifact');
  });

  it('should reject a duplicate format', () => {
    expect(() =>
      BundleManifestVO.create({
        jobId: 'job-1',
        requester: { sessionId: 's' },
        createdAt,
        checksums: [
          BundleManifestVO.checksumFor('txt', DIGEST_A, 1),
          BundleManifestVO.checksumFor('txt', DIGEST_B, 1),
        ],
      }),
    ).toThrow('Duplicate manifest entry for format txt');
  });

  it('should reject a malformed digest', () => {
    expect(() =>
      BundleManifestVO.create({
        jobId: 'job-1',
        requester: { sessionId: 's' },
        createdAt,
        checksums: [BundleManifestVO.checksumFor('pdf', 'not-a-digest', 1)],
      }),
    ).toThrow('Invalid sha256 digest for report.pdf');
  });
});
