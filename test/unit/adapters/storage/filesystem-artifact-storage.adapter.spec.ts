import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import { FilesystemArtifactStorageAdapter } from '../../../../src/infrastructure/adapters/storage/filesystem-artifact-storage.adapter';
import { ArtifactNotFoundError } from '../../../../src/domain/errors/export.errors';
import { HOUR_MS, createTempDir } from '../../helpers/mock-factories';

describe('FilesystemArtifactStorageAdapter', () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let storage: FilesystemArtifactStorageAdapter;

  beforeEach(async () => {
    const temp = await createTempDir('artifacts');
    root = temp.dir;
    cleanup = temp.cleanup;
    storage = new FilesystemArtifactStorageAdapter(root, HOUR_MS);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await cleanup();
  });

  describe('put', () => {
    it('should store a buffer with its metadata', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));

      const descriptor = await storage.put(Buffer.from('hello'), {
        contentType: 'application/zip',
        jobId: 'job-1',
      });

      expect(descriptor.size).toBe(5);
      expect(descriptor.contentType).toBe('application/zip');
      expect(descriptor.createdAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');
      expect(descriptor.expiresAt.toISOString()).toBe('2026-03-01T11:00:00.000Z');
      expect((await readdir(root)).sort()).toEqual([
        `${descriptor.ref}.bin`,
        `${descriptor.ref}.json`,
      ]);
    });

    it('should store a stream', async () => {
      const descriptor = await storage.put(Readable.from([Buffer.from('ab'), Buffer.from('cd')]), {
        contentType: 'application/zip',
        jobId: 'job-1',
      });

      const handle = await storage.get(descriptor.ref);
      expect(descriptor.size).toBe(4);
      await expect(buffer(handle.stream)).resolves.toEqual(Buffer.from('abcd'));
    });

    it('should leave no readable artifact when the source stream fails', async () => {
      const failing = new Readable({
        read() {
          this.destroy(new Error('source broke'));
        },
      });

      await expect(
        storage.put(failing, { contentType: 'application/zip', jobId: 'job-1' }),
      ).rejects.toThrow('Failed to store artifact for job job-1');
      const names = await readdir(root);
      expect(names.filter((name) => !name.endsWith('.part'))).toEqual([]);
    });
  });

  describe('get', () => {
    it('should reject a reference that is not an artifact id', async () => {
      await expect(storage.get('../etc/passwd')).rejects.toBeInstanceOf(ArtifactNotFoundError);
    });

    it('should reject an unknown reference', async () => {
      await expect(storage.get('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(
        ArtifactNotFoundError,
      );
    });

    it('should refuse to serve an expired artifact', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
      const { ref } = await storage.put(Buffer.from('x'), { contentType: 'a/b', jobId: 'job-1' });

      vi.setSystemTime(new Date('2026-03-01T11:00:00.000Z'));

      await expect(storage.get(ref)).rejects.toBeInstanceOf(ArtifactNotFoundError);
    });

    it('should keep an opened stream readable after the artifact is deleted', async () => {
      const { ref } = await storage.put(Buffer.from('still here'), {
        contentType: 'application/zip',
        jobId: 'job-1',
      });
      const handle = await storage.get(ref);

      await storage.delete(ref);

      await expect(storage.get(ref)).rejects.toBeInstanceOf(ArtifactNotFoundError);
      await expect(buffer(handle.stream)).resolves.toEqual(Buffer.from('still here'));
    });

    it('should treat malformed metadata as missing', async () => {
      const { ref } = await storage.put(Buffer.from('x'), { contentType: 'a/b', jobId: 'job-1' });
      await writeFile(join(root, `${ref}.json`), '{not json');

      await expect(storage.get(ref)).rejects.toBeInstanceOf(ArtifactNotFoundError);
    });
  });

  describe('delete', () => {
    it('should be idempotent', async () => {
      const { ref } = await storage.put(Buffer.from('x'), { contentType: 'a/b', jobId: 'job-1' });

      await storage.delete(ref);
      await storage.delete(ref);

      await expect(readdir(root)).resolves.toEqual([]);
    });
  });

  describe('purgeExpired', () => {
    it('should remove only expired artifacts', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
      const old = await storage.put(Buffer.from('old'), { contentType: 'a/b', jobId: 'old' });
      vi.setSystemTime(new Date('2026-03-01T10:30:00.000Z'));
      const fresh = await storage.put(Buffer.from('new'), { contentType: 'a/b', jobId: 'new' });

      const purged = await storage.purgeExpired(new Date('2026-03-01T11:00:00.000Z'));

      expect(purged).toBe(1);
      expect((await readdir(root)).sort()).toEqual([`${fresh.ref}.bin`, `${fresh.ref}.json`]);
      expect(old.ref).not.toBe(fresh.ref);
    });

    it('should return zero when the root does not exist yet', async () => {
      const missing = new FilesystemArtifactStorageAdapter(join(root, 'missing'), HOUR_MS);

      await expect(missing.purgeExpired(new Date())).resolves.toBe(0);
    });
  });
});
