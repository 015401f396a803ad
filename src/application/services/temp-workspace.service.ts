import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, mkdtemp, readdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { EXPORT_SETTINGS, ExportSettings } from '../../config/export-settings';

const WORKSPACE_PREFIX = 'export-';

/**
 * Temp Workspace Service
 * Scoped scratch directories under TEMP_DIR, one per job attempt.
 */
@Injectable()
export class TempWorkspaceService {
  private readonly logger = new Logger(TempWorkspaceService.name);

  constructor(
    @Inject(EXPORT_SETTINGS)
    private readonly settings: ExportSettings,
  ) {}

  get root(): string {
    return this.settings.tempDir;
  }

  /**
   * Create `TEMP_DIR/export-<jobId>-XXXXXX`.
   */
  async create(jobId: string): Promise<string> {
    await mkdir(this.root, { recursive: true });
    const dir = await mkdtemp(join(this.root, `${WORKSPACE_PREFIX}${jobId}-`));
    this.logger.debug(`Created workspace ${dir}`);
    return dir;
  }

  async remove(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
    this.logger.debug(`Removed workspace ${dir}`);
  }

  /**
   * Remove every local workspace belonging to `jobId`.
   */
  async removeForJob(jobId: string): Promise<number> {
    const names = await this.listWorkspaces();
    const owned = names.filter((name) => name.startsWith(`${WORKSPACE_PREFIX}${jobId}-`));
    for (const name of owned) {
      await this.remove(join(this.root, name));
    }
    return owned.length;
  }

  /**
   * Remove workspaces last modified more than `olderThanMs` ago. These are
   * left behind by a process that died mid-job.
   */
  async purgeStale(olderThanMs: number, now = new Date()): Promise<number> {
    const cutoff = now.getTime() - olderThanMs;
    let purged = 0;

    for (const name of await this.listWorkspaces()) {
      const dir = join(this.root, name);
      try {
        const info = await stat(dir);
        if (info.isDirectory() && info.mtimeMs <= cutoff) {
          await this.remove(dir);
          purged++;
        }
      } catch (error) {
        this.logger.warn(`Could not inspect workspace ${dir}: ${String(error)}`);
      }
    }

    if (purged > 0) {
      this.logger.log(`Purged ${purged} stale workspace(s) from ${this.root}`);
    }
    return purged;
  }

  private async listWorkspaces(): Promise<string[]> {
    try {
      const names = await readdir(this.root);
      return names.filter((name) => name.startsWith(WORKSPACE_PREFIX));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
