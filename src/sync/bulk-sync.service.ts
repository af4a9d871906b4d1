import { Inject, Injectable, Logger } from '@nestjs/common';
import type { OnModuleInit } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { SyncConfig, AppConfig } from '../config/app.config.js';
import { OwnershipMismatchError, errorMessage } from '../common/errors.js';
import { RepositoryRepo } from '../repositories/repository.repo.js';
import { TaskQueue } from '../queue/task-queue.js';
import type { JobContext, JobHandle } from '../queue/task-queue.js';

export interface BulkSyncItemResult {
  repositoryId: number;
  success: boolean;
  jobId: string | null;
  processedCount: number | null;
  error: string | null;
}

@Injectable()
export class BulkSyncService implements OnModuleInit {
  private readonly logger = new Logger(BulkSyncService.name);
  private readonly sync: SyncConfig;

  constructor(
    private readonly repositories: RepositoryRepo,
    private readonly queue: TaskQueue,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.sync = config.sync;
  }

  onModuleInit() {
    this.queue.register('bulk-sync', ({ repositoryIds, ownerId }, ctx) =>
      this.bulkSync(repositoryIds, ownerId, ctx),
    );
  }

  /** Validates ownership up front, then runs the sweep in the background. */
  async startBulkSync(repositoryIds: number[], ownerId: number): Promise<JobHandle<'bulk-sync'>> {
    await this.assertOwned(repositoryIds, ownerId);
    return this.queue.enqueue('bulk-sync', { repositoryIds, ownerId });
  }

  /**
   * Syncs repositories in chunks, each item awaited with a timeout. One item
   * failing never aborts the rest; results come back in input order.
   */
  async bulkSync(
    repositoryIds: number[],
    ownerId: number,
    ctx?: Pick<JobContext, 'reportProgress'>,
  ): Promise<BulkSyncItemResult[]> {
    await this.assertOwned(repositoryIds, ownerId);

    const total = repositoryIds.length;
    const results: BulkSyncItemResult[] = [];
    let done = 0;
    let failed = 0;

    for (let i = 0; i < total; i += this.sync.bulkChunkSize) {
      const chunk = repositoryIds.slice(i, i + this.sync.bulkChunkSize);
      const chunkResults = await Promise.all(
        chunk.map(async (repositoryId) => {
          const result = await this.syncOne(repositoryId);
          done++;
          if (!result.success) failed++;
          ctx?.reportProgress((done / total) * 100, `Synced ${done - failed}/${total}, ${failed} failed`);
          return result;
        }),
      );
      results.push(...chunkResults);
    }

    this.logger.log(`Bulk sync for owner ${ownerId}: ${total - failed} succeeded, ${failed} failed`);
    return results;
  }

  private async syncOne(repositoryId: number): Promise<BulkSyncItemResult> {
    let jobId: string | null = null;
    try {
      const handle = await this.queue.enqueue('sync-repository', { repositoryId });
      jobId = handle.id;
      const outcome = await this.queue.waitFor(handle, this.sync.bulkItemTimeoutMs);
      return { repositoryId, success: true, jobId, processedCount: outcome.processedCount, error: null };
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.logger.warn(`Bulk sync item ${repositoryId} failed: ${message}`);
      return { repositoryId, success: false, jobId, processedCount: null, error: message };
    }
  }

  private async assertOwned(repositoryIds: number[], ownerId: number): Promise<void> {
    const unique = [...new Set(repositoryIds)];
    const owned = await this.repositories.findByIdsForOwner(unique, ownerId);
    const ownedIds = new Set(owned.map((r) => r.id));
    const foreign = unique.filter((id) => !ownedIds.has(id));
    if (foreign.length > 0) throw new OwnershipMismatchError(foreign);
  }
}
