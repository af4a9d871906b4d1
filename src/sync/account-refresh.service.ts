import { Inject, Injectable, Logger } from '@nestjs/common';
import type { OnModuleInit } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { errorMessage } from '../common/errors.js';
import { AccountRepo } from '../accounts/account.repo.js';
import { refOf } from '../accounts/account.types.js';
import type { AccountRef, SourceAccount } from '../accounts/account.types.js';
import { TaskQueue } from '../queue/task-queue.js';
import type { JobContext, JobHandle } from '../queue/task-queue.js';

export interface PeriodicRefreshSummary {
  total: number;
  succeeded: number;
  failed: number;
  newCount: number;
  updatedCount: number;
}

@Injectable()
export class AccountRefreshService implements OnModuleInit {
  private readonly logger = new Logger(AccountRefreshService.name);
  private readonly itemTimeoutMs: number;

  constructor(
    private readonly accounts: AccountRepo,
    private readonly queue: TaskQueue,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.itemTimeoutMs = config.sync.refreshItemTimeoutMs;
  }

  onModuleInit() {
    this.queue.register('periodic-refresh', (_payload, ctx) => this.periodicRefreshAll(ctx));
  }

  async refreshAccount(ref: AccountRef, ownerId: number): Promise<JobHandle<'refresh-account'>> {
    await this.accounts.findOwned(ref, ownerId);
    return this.queue.enqueue('refresh-account', ref);
  }

  async startPeriodicRefresh(): Promise<JobHandle<'periodic-refresh'>> {
    return this.queue.enqueue('periodic-refresh', {});
  }

  /**
   * Refreshes every active account one after another. A failing or slow
   * account is counted and logged; the sweep moves on.
   */
  async periodicRefreshAll(ctx?: Pick<JobContext, 'reportProgress'>): Promise<PeriodicRefreshSummary> {
    const sources: SourceAccount[] = [
      ...(await this.accounts.listActive('user')),
      ...(await this.accounts.listActive('organization')),
    ];
    const summary: PeriodicRefreshSummary = {
      total: sources.length,
      succeeded: 0,
      failed: 0,
      newCount: 0,
      updatedCount: 0,
    };
    this.logger.log(`Periodic refresh of ${sources.length} accounts`);

    for (const source of sources) {
      const label = `${source.kind} ${source.account.login}`;
      const attempt = await this.queue.tryEnqueue('refresh-account', refOf(source));

      if (!attempt.scheduled) {
        summary.failed++;
      } else {
        try {
          const result = await this.queue.waitFor(attempt.handle, this.itemTimeoutMs);
          summary.succeeded++;
          summary.newCount += result.newCount;
          summary.updatedCount += result.updatedCount;
        } catch (error: unknown) {
          summary.failed++;
          this.logger.error(`Refresh of ${label} failed: ${errorMessage(error)}`);
        }
      }

      const done = summary.succeeded + summary.failed;
      ctx?.reportProgress((done / summary.total) * 100, `Refreshed ${done}/${summary.total} accounts`);
    }

    this.logger.log(
      `Periodic refresh finished: ${summary.succeeded} succeeded, ${summary.failed} failed`,
    );
    return summary;
  }
}
