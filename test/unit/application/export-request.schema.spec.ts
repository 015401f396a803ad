import { describe, it, expect } from 'vitest';
import { parseExportRequest } from '../../../src/application/dto/export-request.schema';
import { DEFAULT_REQUEST_LIMITS } from '../../../src/config/export-settings';
import { ValidationError } from '../../../src/domain/errors/export.errors';
import { createTestRequest } from '../helpers/mock-factories';

const TEMPLATES = ['summary', 'full-report'];

function violationsOf(input: unknown): ValidationError['violations'] {
  try {
    parseExportRequest(input, DEFAULT_REQUEST_LIMITS, TEMPLATES);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.violations;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('parseExportRequest', () => {
  it('should apply defaults and normalize formats', () => {
    const payload = parseExportRequest(
      createTestRequest({ formats: ['txt', 'docx', 'txt'], summary: undefined }),
      DEFAULT_REQUEST_LIMITS,
      TEMPLATES,
    );

    expect(payload.formats).toEqual(['docx', 'txt']);
    expect(payload.summary).toBe('');
    expect(payload.requester).toEqual({ sessionId: 'session-1', userId: 'user-1' });
    expect(payload.options).toEqual({
      template: 'summary',
      locale: 'en-US',
      pageOrientation: 'portrait',
    });
  });

  it('should place pptx between xlsx and pdf', () => {
    const payload = parseExportRequest(
      createTestRequest({ formats: ['txt', 'pdf', 'pptx', 'docx'] }),
      DEFAULT_REQUEST_LIMITS,
      TEMPLATES,
    );

    expect(payload.formats).toEqual(['docx', 'pptx', 'pdf', 'txt']);
  });

  it('should omit the user id when none is given', () => {
    const payload = parseExportRequest(
      createTestRequest({ userId: undefined }),
      DEFAULT_REQUEST_LIMITS,
      TEMPLATES,
    );

    expect(payload.requester).toEqual({ sessionId: 'session-1' });
  });

  it('should accept an allowed template and orientation', () => {
    const payload = parseExportRequest(
      createTestRequest({ options: { template: 'full-report', pageOrientation: 'landscape', locale: 'de-DE' } }),
      DEFAULT_REQUEST_LIMITS,
      TEMPLATES,
    );

    expect(payload.options).toEqual({
      template: 'full-report',
      locale: 'de-DE',
      pageOrientation: 'landscape',
    });
  });

  it('should reject an empty format list', () => {
    expect(violationsOf(createTestRequest({ formats: [] }))).toEqual([
      { path: 'formats', message: 'At least one format is required' },
    ]);
  });

  it('should reject an unknown template', () => {
    expect(violationsOf(createTestRequest({ options: { template: 'invoice' } }))).toEqual([
      { path: 'options.template', message: 'Template must be one of: summary, full-report' },
    ]);
  });

  it('should reject a malformed locale', () => {
    expect(violationsOf(createTestRequest({ options: { locale: 'english!' } }))).toEqual([
      { path: 'options.locale', message: 'Invalid locale' },
    ]);
  });

  it('should reject a table over the row limit', () => {
    const row = { region: 'North', revenue: 1 };
    const rows = Array.from({ length: 200_000 }, () => row);

    const violations = violationsOf(
      createTestRequest({ tables: [{ name: 'Big', columns: ['region', 'revenue'], rows }] }),
    );

    expect(violations).toEqual([
      { path: 'tables.0.rows', message: 'Table row limit of 100000 exceeded' },
    ]);
  });

  it('should reject a row with a column the table does not declare', () => {
    const violations = violationsOf(
      createTestRequest({
        tables: [
          {
            name: 'Regions',
            columns: ['region'],
            rows: [{ region: 'North' }, { region: 'South', revenue: 800 }, { other: 1 }],
          },
        ],
      }),
    );

    expect(violations).toEqual([
      { path: 'tables.0.rows.1', message: 'Row has values for columns not listed in columns' },
    ]);
  });

  it('should reject an oversized row key', () => {
    const violations = violationsOf(
      createTestRequest({
        tables: [{ name: 'T', columns: ['a'], rows: [{ ['k'.repeat(1_000_000)]: 'v', other: 1 }] }],
      }),
    );

    expect(violations).toEqual([
      { path: 'tables.0.rows.0', message: 'Row has values for columns not listed in columns' },
    ]);
  });

  it('should reject a non-object body', () => {
    expect(violationsOf('not an object')[0].path).toBe('');
  });

  it('should reject a blank title', () => {
    expect(violationsOf(createTestRequest({ title: '   ' }))[0].path).toBe('title');
  });

  it('should reject non-finite numeric cells', () => {
    const violations = violationsOf(
      createTestRequest({
        tables: [{ name: 'T', columns: ['n'], rows: [{ n: Number.POSITIVE_INFINITY }] }],
      }),
    );

    expect(violations.map((violation) => violation.path)).toContain('tables.0.rows.0.n');
  });
});
