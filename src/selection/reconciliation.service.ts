import { Injectable, Logger } from '@nestjs/common';
import type { OnModuleInit } from '@nestjs/common';
import { PersistenceConflictError, RecordNotFoundError } from '../common/errors.js';
import { AccountRepo } from '../accounts/account.repo.js';
import { credentialOf, describeAccount, refOf } from '../accounts/account.types.js';
import type { AccountRef, SourceAccount } from '../accounts/account.types.js';
import { RepositoryProvider, SourceClientFactory } from '../source/source-client.interface.js';
import type { RemoteRepository } from '../source/source-client.interface.js';
import { TaskQueue } from '../queue/task-queue.js';
import { SelectionRepo } from './selection.repo.js';
import { MUTABLE_SELECTION_FIELDS, SelectionStatus } from './selection.entity.js';
import type { MutableSelectionFields, RepositorySelectionEntity, SelectionDraft } from './selection.entity.js';

export interface ReconcileResult {
  newCount: number;
  updatedCount: number;
}

function mutableFieldsOf(item: RemoteRepository): MutableSelectionFields {
  return {
    description: item.description,
    stargazersCount: item.stargazersCount,
    watchersCount: item.watchersCount,
    forksCount: item.forksCount,
    size: item.size,
    language: item.language,
    isArchived: item.isArchived,
  };
}

function hasChanges(current: RepositorySelectionEntity, next: MutableSelectionFields): boolean {
  return MUTABLE_SELECTION_FIELDS.some((field) => current[field] !== next[field]);
}

/**
 * Merges the remote repository list of a source account into its candidate
 * selections. User decisions (status, selectedAt) are never touched.
 */
@Injectable()
export class ReconciliationService implements OnModuleInit {
  private readonly logger = new Logger(ReconciliationService.name);

  constructor(
    private readonly accounts: AccountRepo,
    private readonly selections: SelectionRepo,
    private readonly sources: SourceClientFactory,
    private readonly queue: TaskQueue,
  ) {}

  onModuleInit() {
    this.queue.register('refresh-account', (ref) => this.refreshAccount(ref));
  }

  /** Fetches the account's repositories from the host and reconciles them. */
  async refreshAccount(ref: AccountRef): Promise<ReconcileResult> {
    const source = await this.accounts.find(ref);
    if (!source) throw new RecordNotFoundError(describeAccount(ref), ref.id);

    const client = this.sources.forProvider(RepositoryProvider.GITHUB, credentialOf(source));
    const items = await client.listAccountRepositories({
      kind: source.kind,
      login: source.account.login,
    });

    return this.reconcile(source, items);
  }

  async reconcile(source: SourceAccount, items: RemoteRepository[]): Promise<ReconcileResult> {
    const ref = refOf(source);
    let newCount = 0;
    let updatedCount = 0;

    for (const item of items) {
      const fields = mutableFieldsOf(item);
      const existing = await this.selections.findByRemoteId(ref, item.id);

      if (existing) {
        if (hasChanges(existing, fields)) {
          await this.selections.updateMetadata(existing.id, fields);
          updatedCount++;
        }
        continue;
      }

      try {
        await this.selections.insert(this.draftFor(source, item, fields));
        newCount++;
      } catch (error: unknown) {
        // a concurrent reconcile inserted it first
        if (!(error instanceof PersistenceConflictError)) throw error;
      }
    }

    await this.accounts.updateState(ref, { publicRepos: items.length, lastSyncedAt: new Date() });

    this.logger.log(
      `Reconciled ${source.account.login}: ${items.length} remote, ${newCount} new, ${updatedCount} updated`,
    );
    return { newCount, updatedCount };
  }

  private draftFor(source: SourceAccount, item: RemoteRepository, fields: MutableSelectionFields): SelectionDraft {
    return {
      ...fields,
      remoteRepoId: item.id,
      name: item.name,
      fullName: item.fullName,
      url: item.htmlUrl,
      cloneUrl: item.cloneUrl,
      defaultBranch: item.defaultBranch,
      isPrivate: item.isPrivate,
      isFork: item.isFork,
      status: SelectionStatus.PENDING,
      selectedAt: null,
      repositoryId: null,
      individualAccountId: source.kind === 'user' ? source.account.id : null,
      organizationAccountId: source.kind === 'organization' ? source.account.id : null,
      selectedByUserId: source.account.addedByUserId,
    };
  }
}
