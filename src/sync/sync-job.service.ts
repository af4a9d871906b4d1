import { Inject, Injectable, Logger } from '@nestjs/common';
import type { OnModuleInit } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { RecordNotFoundError, SyncInProgressError, errorMessage } from '../common/errors.js';
import { AccountRepo } from '../accounts/account.repo.js';
import { RepositoryRepo } from '../repositories/repository.repo.js';
import type { SyncStatusCounts } from '../repositories/repository.repo.js';
import { SyncStatus } from '../repositories/repository.entity.js';
import { CommitIngestionService } from '../commits/commit-ingestion.service.js';
import type { IngestionResult } from '../commits/commit-ingestion.service.js';
import { TaskQueue } from '../queue/task-queue.js';
import type { JobContext, JobHandle } from '../queue/task-queue.js';
import { RetryPolicy } from './retry-policy.js';

export interface SyncRunResult extends IngestionResult {
  repositoryId: number;
  attempts: number;
}

export interface RepositorySyncStatus {
  repositoryId: number;
  syncStatus: SyncStatus;
  syncError: string | null;
  lastSyncedAt: Date | null;
  isActive: boolean;
}

export interface SyncStats {
  repositories: SyncStatusCounts & { total: number };
  accounts: { users: number; organizations: number };
}

const IDLE_STATES = [SyncStatus.PENDING, SyncStatus.COMPLETED, SyncStatus.FAILED];

/**
 * Owns the repository sync lifecycle:
 * pending -> syncing -> completed | failed, failed -> syncing on retry.
 * Entering `syncing` is a conditional update, so one repository never has
 * two runs writing at the same time.
 */
@Injectable()
export class SyncJobService implements OnModuleInit {
  private readonly logger = new Logger(SyncJobService.name);
  private readonly retry: RetryPolicy;

  constructor(
    private readonly repositories: RepositoryRepo,
    private readonly accounts: AccountRepo,
    private readonly ingestion: CommitIngestionService,
    private readonly queue: TaskQueue,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.retry = new RetryPolicy({
      maxAttempts: config.sync.maxAttempts,
      backoffMs: config.sync.retryBackoffMs,
    });
  }

  onModuleInit() {
    this.queue.register('sync-repository', ({ repositoryId }, ctx) => this.runSync(repositoryId, ctx));
  }

  async runSync(repositoryId: number, ctx: JobContext): Promise<SyncRunResult> {
    const repository = await this.repositories.findById(repositoryId);
    if (!repository) throw new RecordNotFoundError('Repository', repositoryId);

    const { jobId } = ctx;
    const entered = await this.repositories.claimSync(repositoryId, jobId, IDLE_STATES);
    if (!entered) throw new SyncInProgressError(repositoryId);

    // commits pushed while this run lists are picked up next time
    const startedAt = new Date();
    const since = repository.lastSyncedAt;
    const report = monotonic(ctx.reportProgress);
    let attempts = 0;

    try {
      const result = await this.retry.run(
        async (attempt) => {
          attempts = attempt;
          if (attempt > 1) {
            const resumed = await this.repositories.transitionOwned(
              repositoryId,
              jobId,
              [SyncStatus.FAILED],
              SyncStatus.SYNCING,
            );
            if (!resumed) throw new SyncInProgressError(repositoryId);
          }
          return this.ingestion.ingest(repository, since, {
            signal: ctx.signal,
            onProgress: report,
          });
        },
        {
          signal: ctx.signal,
          onRetry: async (error, attempt, delayMs) => {
            const message = errorMessage(error);
            this.logger.warn(
              `Sync of repository ${repositoryId} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${message}`,
            );
            await this.repositories.transitionOwned(repositoryId, jobId, [SyncStatus.SYNCING], SyncStatus.FAILED, {
              syncError: message,
            });
          },
        },
      );

      const completed = await this.repositories.transitionOwned(
        repositoryId,
        jobId,
        [SyncStatus.SYNCING],
        SyncStatus.COMPLETED,
        { syncError: null, syncJobId: null, lastSyncedAt: startedAt },
      );
      if (!completed) {
        this.logger.warn(`Repository ${repositoryId} was reset during task ${jobId}; its status belongs to the newer run`);
      }
      report(100, 'Completed');

      this.logger.log(`Repository ${repositoryId} synced: ${result.processedCount} new commits`);
      return { ...result, repositoryId, attempts };
    } catch (error: unknown) {
      if (error instanceof SyncInProgressError) {
        // a newer run took the repository over while this one waited to retry
        this.logger.warn(`Task ${jobId} gave up repository ${repositoryId} to a newer run`);
        throw error;
      }
      const message = errorMessage(error);
      this.logger.error(`Sync of repository ${repositoryId} failed after ${attempts} attempt(s): ${message}`);
      await this.repositories.transitionOwned(
        repositoryId,
        jobId,
        [SyncStatus.SYNCING, SyncStatus.FAILED],
        SyncStatus.FAILED,
        { syncError: message, syncJobId: null },
      );
      throw error;
    }
  }

  /** Resets a stuck or failed repository to pending and queues a fresh run. */
  async forceSync(repositoryId: number, ownerId: number): Promise<JobHandle<'sync-repository'>> {
    const repository = await this.repositories.findForOwner(repositoryId, ownerId);
    if (!repository) throw new RecordNotFoundError('Repository', repositoryId);

    await this.repositories.update(repositoryId, { syncStatus: SyncStatus.PENDING, syncError: null, syncJobId: null });
    this.logger.log(`Force sync requested for repository ${repositoryId}`);
    return this.queue.enqueue('sync-repository', { repositoryId });
  }

  async getSyncStatus(repositoryId: number, ownerId: number): Promise<RepositorySyncStatus> {
    const repository = await this.repositories.findForOwner(repositoryId, ownerId);
    if (!repository) throw new RecordNotFoundError('Repository', repositoryId);

    return {
      repositoryId: repository.id,
      syncStatus: repository.syncStatus,
      syncError: repository.syncError,
      lastSyncedAt: repository.lastSyncedAt,
      isActive: repository.isActive,
    };
  }

  async stats(ownerId: number): Promise<SyncStats> {
    const counts = await this.repositories.countByStatus(ownerId);
    const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
    const [users, organizations] = await Promise.all([
      this.accounts.countForOwner('user', ownerId),
      this.accounts.countForOwner('organization', ownerId),
    ]);
    return { repositories: { ...counts, total }, accounts: { users, organizations } };
  }
}

/** Drops progress values lower than the highest one reported so far. */
function monotonic(sink: (percent: number, message?: string) => void) {
  let highest = 0;
  return (percent: number, message: string) => {
    highest = Math.max(highest, percent);
    sink(highest, message);
  };
}
