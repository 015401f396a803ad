import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  S3Client,
} from '@aws-sdk/client-s3';
import { S3ArtifactStorageAdapter } from '../../../../src/infrastructure/adapters/storage/s3-artifact-storage.adapter';
import { S3JobPayloadStoreAdapter } from '../../../../src/infrastructure/adapters/storage/s3-job-payload-store.adapter';
import { S3Service } from '../../../../src/shared/aws/s3/s3.service';
import { ArtifactNotFoundError, StorageError } from '../../../../src/domain/errors/export.errors';
import { HOUR_MS, createTestConfigService, createTestLogger } from '../../helpers/mock-factories';

const s3Mock = mockClient(S3Client);

const REF = '3f1c2b4a-5d6e-4f70-8a9b-0c1d2e3f4a5b';

function createS3Service(): S3Service {
  return new S3Service(
    createTestConfigService({
      aws: { region: 'us-east-1' },
      storage: { driver: 's3', bucketName: 'test-bucket', prefix: 'exports/', directory: '/unused' },
    }),
    createTestLogger(),
  );
}

describe('S3 storage adapters', () => {
  beforeEach(() => {
    s3Mock.reset();
  });

  describe('S3ArtifactStorageAdapter', () => {
    let storage: S3ArtifactStorageAdapter;

    beforeEach(() => {
      storage = new S3ArtifactStorageAdapter(createS3Service(), 24 * HOUR_MS);
    });

    it('should map a missing object to ArtifactNotFoundError', async () => {
      s3Mock.on(GetObjectCommand).rejects(new NoSuchKey({ message: 'missing', $metadata: {} }));

      await expect(storage.get(REF)).rejects.toBeInstanceOf(ArtifactNotFoundError);
      expect(s3Mock.commandCalls(GetObjectCommand)[0].args[0].input).toEqual({
        Bucket: 'test-bucket',
        Key: `exports/artifacts/${REF}.zip`,
      });
    });

    it('should not call S3 for a malformed reference', async () => {
      await expect(storage.get('not-a-ref')).rejects.toBeInstanceOf(ArtifactNotFoundError);
      expect(s3Mock.commandCalls(GetObjectCommand)).toHaveLength(0);
    });

    it('should wrap other read failures in StorageError', async () => {
      s3Mock.on(GetObjectCommand).rejects(new Error('Access Denied'));

      await expect(storage.get(REF)).rejects.toBeInstanceOf(StorageError);
    });

    it('should purge objects whose age exceeds the ttl', async () => {
      s3Mock.on(ListObjectsV2Command).resolves({
        Contents: [
          { Key: `exports/artifacts/${REF}.zip`, Size: 10, LastModified: new Date('2026-03-01T00:00:00.000Z') },
          { Key: 'exports/artifacts/fresh.zip', Size: 10, LastModified: new Date('2026-03-01T12:00:00.000Z') },
        ],
      });
      s3Mock.on(DeleteObjectsCommand).resolves({});

      const purged = await storage.purgeExpired(new Date('2026-03-02T06:00:00.000Z'));

      expect(purged).toBe(1);
      expect(s3Mock.commandCalls(ListObjectsV2Command)[0].args[0].input.Prefix).toBe(
        'exports/artifacts/',
      );
      expect(s3Mock.commandCalls(DeleteObjectsCommand)[0].args[0].input.Delete).toEqual({
        Objects: [{ Key: `exports/artifacts/${REF}.zip` }],
        Quiet: true,
      });
    });
  });

  describe('S3JobPayloadStoreAdapter', () => {
    it('should return null for a missing payload', async () => {
      s3Mock.on(GetObjectCommand).rejects(new NoSuchKey({ message: 'missing', $metadata: {} }));

      const store = new S3JobPayloadStoreAdapter(createS3Service());

      await expect(store.get('job-1')).resolves.toBeNull();
      expect(s3Mock.commandCalls(GetObjectCommand)[0].args[0].input.Key).toBe(
        'exports/payloads/job-1.json.gz',
      );
    });
  });
});
