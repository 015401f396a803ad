import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { ExportRequestPayload } from '../../../domain/value-objects/export-payload.vo';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

/**
 * Key layout shared by the storage drivers.
 */
export const PAYLOAD_PREFIX = 'payloads/';
export const ARTIFACT_PREFIX = 'artifacts/';

export const REF_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function isArtifactRef(ref: string): boolean {
  return REF_PATTERN.test(ref);
}

export function payloadKey(jobId: string): string {
  return `${PAYLOAD_PREFIX}${jobId}.json.gz`;
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Payloads are stored as gzipped JSON. Compression runs on the libuv pool.
 */
export function encodePayload(payload: ExportRequestPayload): Promise<Buffer> {
  return gzipAsync(JSON.stringify(payload));
}

export async function decodePayload(bytes: Uint8Array): Promise<ExportRequestPayload> {
  const json = await gunzipAsync(bytes);
  // Written by `encodePayload` from a validated request
  const payload: ExportRequestPayload = JSON.parse(json.toString('utf8'));
  return payload;
}
