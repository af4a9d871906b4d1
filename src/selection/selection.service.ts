import { Injectable, Logger } from '@nestjs/common';
import type { OnModuleInit } from '@nestjs/common';
import { PersistenceConflictError } from '../common/errors.js';
import { AccountRepo } from '../accounts/account.repo.js';
import type { AccountRef } from '../accounts/account.types.js';
import { RepositoryRepo } from '../repositories/repository.repo.js';
import { SyncStatus } from '../repositories/repository.entity.js';
import type { RepositoryEntity, RepositoryDraft } from '../repositories/repository.entity.js';
import { RepositoryProvider } from '../source/source-client.interface.js';
import { TaskQueue } from '../queue/task-queue.js';
import { ReconciliationService } from './reconciliation.service.js';
import { SelectionRepo } from './selection.repo.js';
import { SelectionStatus } from './selection.entity.js';
import type { RepositorySelectionEntity } from './selection.entity.js';

export type SelectionDecision = SelectionStatus.SELECTED | SelectionStatus.DESELECTED;

export interface SelectionUpdateResult {
  updatedCount: number;
  /** Set when deselecting queued a cleanup of linked repositories. */
  cleanupJobId: string | null;
}

export interface PromotedSync {
  repositoryId: number;
  /** Null when the sync could not be queued; the repository stays pending. */
  jobId: string | null;
}

export interface PromotionResult {
  /** Repositories created by this call. */
  syncedCount: number;
  /** Selections linked to a repository that already existed. */
  linkedCount: number;
  syncJobs: PromotedSync[];
}

export interface CleanupResult {
  deactivatedCount: number;
}

export interface OrphanCleanupResult {
  restoredCount: number;
}

@Injectable()
export class SelectionService implements OnModuleInit {
  private readonly logger = new Logger(SelectionService.name);

  constructor(
    private readonly accounts: AccountRepo,
    private readonly selections: SelectionRepo,
    private readonly repositories: RepositoryRepo,
    private readonly reconciliation: ReconciliationService,
    private readonly queue: TaskQueue,
  ) {}

  onModuleInit() {
    this.queue.register('cleanup-deselected', ({ ownerId }) => this.cleanupDeselected(ownerId));
    this.queue.register('cleanup-orphaned', () => this.cleanupOrphaned());
  }

  async listSelections(ref: AccountRef, ownerId: number, refresh = false): Promise<RepositorySelectionEntity[]> {
    await this.accounts.findOwned(ref, ownerId);
    if (refresh) await this.reconciliation.refreshAccount(ref);
    return this.selections.listForAccount(ref);
  }

  /** Ticks or unticks candidates. Already promoted candidates stay promoted when ticked again. */
  async updateSelections(
    ref: AccountRef,
    ownerId: number,
    ids: number[],
    status: SelectionDecision,
  ): Promise<SelectionUpdateResult> {
    await this.accounts.findOwned(ref, ownerId);

    const requested = new Set(ids);
    const targets = (await this.selections.listForAccount(ref))
      .filter((s) => requested.has(s.id))
      .filter((s) => status === SelectionStatus.DESELECTED || s.status !== SelectionStatus.SYNCED)
      .map((s) => s.id);

    const selectedAt = status === SelectionStatus.SELECTED ? new Date() : null;
    const updatedCount = await this.selections.setStatus(ref, targets, status, selectedAt);

    let cleanupJobId: string | null = null;
    if (status === SelectionStatus.DESELECTED && updatedCount > 0) {
      const attempt = await this.queue.tryEnqueue('cleanup-deselected', { ownerId });
      if (attempt.scheduled) cleanupJobId = attempt.handle.id;
    }

    return { updatedCount, cleanupJobId };
  }

  /**
   * Turns every selected, unlinked candidate into a monitored repository
   * exactly once. A repository already present for the same URL and owner
   * is linked instead of duplicated.
   */
  async promoteSelected(ref: AccountRef, ownerId: number): Promise<PromotionResult> {
    await this.accounts.findOwned(ref, ownerId);
    const candidates = await this.selections.listPromotable(ref);
    const result: PromotionResult = { syncedCount: 0, linkedCount: 0, syncJobs: [] };

    for (const selection of candidates) {
      const existing = await this.repositories.findByUrlAndOwner(selection.url, ownerId);
      if (existing) {
        await this.link(selection, existing);
        result.linkedCount++;
        continue;
      }

      let created: RepositoryEntity;
      try {
        created = await this.repositories.create(this.repositoryDraft(selection, ref, ownerId));
      } catch (error: unknown) {
        if (!(error instanceof PersistenceConflictError)) throw error;
        const winner = await this.repositories.findByUrlAndOwner(selection.url, ownerId);
        if (!winner) throw error;
        await this.link(selection, winner);
        result.linkedCount++;
        continue;
      }

      await this.selections.markSynced(selection.id, created.id);
      result.syncedCount++;

      const attempt = await this.queue.tryEnqueue('sync-repository', { repositoryId: created.id });
      result.syncJobs.push({
        repositoryId: created.id,
        jobId: attempt.scheduled ? attempt.handle.id : null,
      });
    }

    this.logger.log(
      `Promoted ${result.syncedCount} repositories, linked ${result.linkedCount} for owner ${ownerId}`,
    );
    return result;
  }

  /** Deactivates repositories whose candidate was deselected and drops the link. */
  async cleanupDeselected(ownerId: number): Promise<CleanupResult> {
    const rows = await this.selections.listDeselectedLinked(ownerId);
    let deactivatedCount = 0;

    for (const row of rows) {
      if (row.repositoryId !== null) {
        await this.repositories.update(row.repositoryId, { isActive: false });
        deactivatedCount++;
      }
      await this.selections.unlink(row.id);
    }

    if (deactivatedCount > 0) {
      this.logger.log(`Deactivated ${deactivatedCount} deselected repositories for owner ${ownerId}`);
    }
    return { deactivatedCount };
  }

  /**
   * A deleted repository leaves its selections synced but unlinked. Those
   * return to selected, so the next promotion creates the repository again.
   */
  async cleanupOrphaned(): Promise<OrphanCleanupResult> {
    const restoredCount = await this.selections.restoreOrphaned();
    if (restoredCount > 0) this.logger.log(`Restored ${restoredCount} orphaned selections`);
    return { restoredCount };
  }

  private async link(selection: RepositorySelectionEntity, repository: RepositoryEntity): Promise<void> {
    if (!repository.isActive) await this.repositories.update(repository.id, { isActive: true });
    await this.selections.markSynced(selection.id, repository.id);
  }

  private repositoryDraft(selection: RepositorySelectionEntity, ref: AccountRef, ownerId: number): RepositoryDraft {
    return {
      name: selection.name,
      fullName: selection.fullName,
      url: selection.url,
      cloneUrl: selection.cloneUrl,
      provider: RepositoryProvider.GITHUB,
      externalId: String(selection.remoteRepoId),
      description: selection.description,
      defaultBranch: selection.defaultBranch,
      isPrivate: selection.isPrivate,
      isActive: true,
      syncStatus: SyncStatus.PENDING,
      syncError: null,
      syncJobId: null,
      lastSyncedAt: null,
      ownerId,
      sourceOrganizationAccountId: ref.kind === 'organization' ? ref.id : null,
    };
  }
}
