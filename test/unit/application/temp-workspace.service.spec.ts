import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, utimes, writeFile } from 'fs/promises';
import { join } from 'path';
import { TempWorkspaceService } from '../../../src/application/services/temp-workspace.service';
import { createTempDir, createTestSettings } from '../helpers/mock-factories';

describe('TempWorkspaceService', () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let service: TempWorkspaceService;

  beforeEach(async () => {
    const temp = await createTempDir('workspace');
    root = join(temp.dir, 'nested');
    cleanup = temp.cleanup;
    service = new TempWorkspaceService(createTestSettings({ tempDir: root }));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should create a job-scoped directory under the root, creating the root', async () => {
    const dir = await service.create('job-1');

    const names = await readdir(root);
    expect(names).toHaveLength(1);
    expect(names[0].startsWith('export-job-1-')).toBe(true);
    expect(join(root, names[0])).toBe(dir);
  });

  it('should remove a workspace with its contents', async () => {
    const dir = await service.create('job-1');
    await writeFile(join(dir, 'report.txt'), 'x');

    await service.remove(dir);

    await expect(readdir(root)).resolves.toEqual([]);
  });

  it('should purge only workspaces older than the cutoff', async () => {
    const old = await service.create('old');
    await service.create('new');
    await mkdir(join(root, 'unrelated'));
    const twoHoursAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
    await utimes(old, twoHoursAgo, twoHoursAgo);

    const purged = await service.purgeStale(60 * 60 * 1000);

    expect(purged).toBe(1);
    const names = (await readdir(root)).sort();
    expect(names).toHaveLength(2);
    expect(names[0].startsWith('export-new-')).toBe(true);
    expect(names[1]).toBe('unrelated');
  });

  it('should treat a missing root as empty', async () => {
    await expect(service.purgeStale(0)).resolves.toBe(0);
    await expect(service.removeForJob('job-1')).resolves.toBe(0);
  });
});
