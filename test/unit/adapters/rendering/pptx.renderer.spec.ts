import { describe, it, expect } from 'vitest';
import { PptxRenderer } from '../../../../src/infrastructure/adapters/rendering/pptx.renderer';
import { createTestPayload, listZipEntries, readZipEntry } from '../../helpers/mock-factories';

describe('PptxRenderer', () => {
  const renderer = new PptxRenderer();
  const context = { jobId: 'job-1', workDir: '/unused', signal: new AbortController().signal };

  function slideXml(deck: Buffer, index: number): string {
    return readZipEntry(deck, `ppt/slides/slide${index}.xml`).toString('utf8');
  }

  it('should produce a title slide, a slide per section and a slide per table', async () => {
    const bytes = await renderer.render(createTestPayload(), context);

    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');
    const slides = listZipEntries(bytes).filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name));
    expect(slides.sort()).toEqual([
      'ppt/slides/slide1.xml',
      'ppt/slides/slide2.xml',
      'ppt/slides/slide3.xml',
    ]);
    expect(slideXml(bytes, 1)).toContain('Quarterly Report');
    expect(slideXml(bytes, 1)).toContain('Revenue grew in every region.');
    expect(slideXml(bytes, 2)).toContain('Overview');
    expect(slideXml(bytes, 3)).toContain('Regions');
    expect(slideXml(bytes, 3)).toContain('1200');
  });

  it('should note rows that do not fit on the table slide', async () => {
    const rows = Array.from({ length: 20 }, (_, index) => ({ n: index }));

    const bytes = await renderer.render(
      createTestPayload({ sections: [], tables: [{ name: 'Numbers', columns: ['n'], rows }] }),
      context,
    );

    expect(slideXml(bytes, 2)).toContain('Showing 15 of 20 rows.');
  });

  it('should stop before writing once the deadline passed', async () => {
    const controller = new AbortController();
    const reason = new Error('deadline');
    controller.abort(reason);

    await expect(
      renderer.render(createTestPayload(), { ...context, signal: controller.signal }),
    ).rejects.toBe(reason);
  });
});
