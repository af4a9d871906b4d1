import { Injectable, Logger } from '@nestjs/common';
import { AccountAlreadyMonitoredError } from '../common/errors.js';
import { RepositoryProvider, SourceClientFactory } from '../source/source-client.interface.js';
import type { RemoteAccountProfile } from '../source/source-client.interface.js';
import { SelectionRepo } from '../selection/selection.repo.js';
import { TaskQueue } from '../queue/task-queue.js';
import { AccountRepo } from './account.repo.js';
import { refOf } from './account.types.js';
import type { AccountKind, AccountRef, SourceAccount } from './account.types.js';

export interface AddedAccount {
  source: SourceAccount;
  /** Job listing the account's repositories, null when it could not be queued. */
  refreshJobId: string | null;
}

export interface RemovedAccount {
  removedSelections: number;
}

@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    private readonly accounts: AccountRepo,
    private readonly selections: SelectionRepo,
    private readonly sources: SourceClientFactory,
    private readonly queue: TaskQueue,
  ) {}

  async list(kind: AccountKind, ownerId: number): Promise<SourceAccount[]> {
    return this.accounts.listForOwner(kind, ownerId);
  }

  async addIndividual(ownerId: number, login: string): Promise<AddedAccount> {
    const client = this.sources.forProvider(RepositoryProvider.GITHUB);
    const profile = await client.fetchAccountProfile({ kind: 'user', login });

    if (await this.accounts.findByRemoteId('user', profile.id, ownerId)) {
      throw new AccountAlreadyMonitoredError(profile.login);
    }

    const account = await this.accounts.saveIndividual({
      ...this.profileFields(profile),
      bio: profile.bio,
      isActive: true,
      autoSync: true,
      lastSyncedAt: null,
      addedByUserId: ownerId,
    });
    this.logger.log(`Owner ${ownerId} now monitors GitHub user ${account.login}`);

    return this.withRefresh({ kind: 'user', account });
  }

  /** Connects an organization, or replaces the token of one already connected. */
  async connectOrganization(
    ownerId: number,
    login: string,
    accessToken: string,
    scopes: string | null = null,
  ): Promise<AddedAccount> {
    const client = this.sources.forProvider(RepositoryProvider.GITHUB, accessToken);
    const profile = await client.fetchAccountProfile({ kind: 'organization', login });

    const existing = await this.accounts.findByRemoteId('organization', profile.id, ownerId);
    const previous = existing?.kind === 'organization' ? existing.account : null;

    const account = await this.accounts.saveOrganization({
      ...this.profileFields(profile),
      id: previous?.id,
      description: profile.description,
      accessToken,
      scopes,
      isActive: previous?.isActive ?? true,
      autoSync: previous?.autoSync ?? true,
      lastSyncedAt: previous?.lastSyncedAt ?? null,
      addedByUserId: ownerId,
    });
    this.logger.log(
      `Owner ${ownerId} ${previous ? 'refreshed the token of' : 'connected'} organization ${account.login}`,
    );

    return this.withRefresh({ kind: 'organization', account });
  }

  async setActive(ref: AccountRef, ownerId: number, isActive: boolean): Promise<SourceAccount> {
    await this.accounts.findOwned(ref, ownerId);
    await this.accounts.updateState(ref, { isActive });
    return this.accounts.findOwned(ref, ownerId);
  }

  /** Removes the account together with its candidate selections. */
  async remove(ref: AccountRef, ownerId: number): Promise<RemovedAccount> {
    const source = await this.accounts.findOwned(ref, ownerId);
    const removedSelections = await this.selections.removeForAccount(ref);
    await this.accounts.remove(ref);

    this.logger.log(`Removed ${source.kind} ${source.account.login} and ${removedSelections} selections`);
    return { removedSelections };
  }

  private async withRefresh(source: SourceAccount): Promise<AddedAccount> {
    const attempt = await this.queue.tryEnqueue('refresh-account', refOf(source));
    return { source, refreshJobId: attempt.scheduled ? attempt.handle.id : null };
  }

  private profileFields(profile: RemoteAccountProfile) {
    return {
      remoteId: profile.id,
      login: profile.login,
      displayName: profile.displayName,
      email: profile.email,
      avatarUrl: profile.avatarUrl,
      company: profile.company,
      location: profile.location,
      blog: profile.blog,
      publicRepos: profile.publicRepos,
      publicGists: profile.publicGists,
      followers: profile.followers,
      following: profile.following,
    };
  }
}
