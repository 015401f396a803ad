import { describe, it, expect } from 'vitest';
import { DocxRenderer } from '../../../../src/infrastructure/adapters/rendering/docx.renderer';
import { createTestPayload, listZipEntries, readZipEntry } from '../../helpers/mock-factories';

describe('DocxRenderer', () => {
  const renderer = new DocxRenderer();
  const context = { jobId: 'job-1', workDir: '/unused', signal: new AbortController().signal };

  it('should produce a Word package', async () => {
    const bytes = await renderer.render(createTestPayload(), context);

    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');
    expect(listZipEntries(bytes)).toContain('word/document.xml');
  });

  it('should include table previews only in the full report', async () => {
    const summary = await renderer.render(createTestPayload(), context);
    const full = await renderer.render(
      createTestPayload({
        options: { template: 'full-report', locale: 'en-US', pageOrientation: 'landscape' },
      }),
      context,
    );

    const summaryXml = readZipEntry(summary, 'word/document.xml').toString('utf8');
    const fullXml = readZipEntry(full, 'word/document.xml').toString('utf8');
    expect(summaryXml).toContain('Quarterly Report');
    expect(summaryXml).not.toContain('<w:tbl');
    expect(fullXml).toContain('<w:tbl');
    expect(fullXml).toContain('1,200');
  });

  it('should note truncated table previews', async () => {
    const rows = Array.from({ length: 60 }, (_, index) => ({ n: index }));

    const bytes = await renderer.render(
      createTestPayload({
        tables: [{ name: 'Numbers', columns: ['n'], rows }],
        options: { template: 'full-report', locale: 'en-US', pageOrientation: 'portrait' },
      }),
      context,
    );

    expect(readZipEntry(bytes, 'word/document.xml').toString('utf8')).toContain(
      'Showing 50 of 60 rows.',
    );
  });
});
