import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, Not, Repository } from 'typeorm';
import type { FindOptionsWhere } from 'typeorm';
import { PersistenceConflictError } from '../common/errors.js';
import { isUniqueViolation } from '../database/unique-violation.js';
import type { AccountRef } from '../accounts/account.types.js';
import { RepositorySelectionEntity, SelectionStatus } from './selection.entity.js';
import type { MutableSelectionFields, SelectionDraft } from './selection.entity.js';

export abstract class SelectionRepo {
  abstract findByRemoteId(account: AccountRef, remoteRepoId: number): Promise<RepositorySelectionEntity | null>;
  abstract listForAccount(account: AccountRef): Promise<RepositorySelectionEntity[]>;
  /** Selected and not linked to a repository yet. */
  abstract listPromotable(account: AccountRef): Promise<RepositorySelectionEntity[]>;
  abstract listDeselectedLinked(ownerId: number): Promise<RepositorySelectionEntity[]>;

  /** Throws PersistenceConflictError when (remote id, account) already exists. */
  abstract insert(row: SelectionDraft): Promise<RepositorySelectionEntity>;
  abstract updateMetadata(id: number, fields: MutableSelectionFields): Promise<void>;
  abstract setStatus(
    account: AccountRef,
    ids: number[],
    status: SelectionStatus,
    selectedAt: Date | null,
  ): Promise<number>;
  abstract markSynced(id: number, repositoryId: number): Promise<void>;
  abstract unlink(id: number): Promise<void>;
  /** Synced selections whose repository was deleted go back to selected. */
  abstract restoreOrphaned(): Promise<number>;
  abstract removeForAccount(account: AccountRef): Promise<number>;
}

function accountWhere(account: AccountRef): FindOptionsWhere<RepositorySelectionEntity> {
  return account.kind === 'user'
    ? { individualAccountId: account.id }
    : { organizationAccountId: account.id };
}

@Injectable()
export class TypeormSelectionRepo extends SelectionRepo {
  constructor(
    @InjectRepository(RepositorySelectionEntity)
    private readonly repo: Repository<RepositorySelectionEntity>,
  ) {
    super();
  }

  async findByRemoteId(account: AccountRef, remoteRepoId: number): Promise<RepositorySelectionEntity | null> {
    return this.repo.findOne({ where: { ...accountWhere(account), remoteRepoId } });
  }

  async listForAccount(account: AccountRef): Promise<RepositorySelectionEntity[]> {
    return this.repo.find({ where: accountWhere(account), order: { fullName: 'ASC' } });
  }

  async listPromotable(account: AccountRef): Promise<RepositorySelectionEntity[]> {
    return this.repo.find({
      where: { ...accountWhere(account), status: SelectionStatus.SELECTED, repositoryId: IsNull() },
      order: { id: 'ASC' },
    });
  }

  async listDeselectedLinked(ownerId: number): Promise<RepositorySelectionEntity[]> {
    return this.repo.find({
      where: {
        selectedByUserId: ownerId,
        status: SelectionStatus.DESELECTED,
        repositoryId: Not(IsNull()),
      },
    });
  }

  async insert(row: SelectionDraft): Promise<RepositorySelectionEntity> {
    try {
      return await this.repo.save(this.repo.create(row));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(`Selection for remote repo ${row.remoteRepoId} already exists`);
      }
      throw error;
    }
  }

  async updateMetadata(id: number, fields: MutableSelectionFields): Promise<void> {
    await this.repo.update({ id }, fields);
  }

  async setStatus(
    account: AccountRef,
    ids: number[],
    status: SelectionStatus,
    selectedAt: Date | null,
  ): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.repo.update({ ...accountWhere(account), id: In(ids) }, { status, selectedAt });
    return result.affected ?? 0;
  }

  async markSynced(id: number, repositoryId: number): Promise<void> {
    await this.repo.update({ id }, { repositoryId, status: SelectionStatus.SYNCED });
  }

  async unlink(id: number): Promise<void> {
    await this.repo.update({ id }, { repositoryId: null });
  }

  async restoreOrphaned(): Promise<number> {
    const result = await this.repo.update(
      { status: SelectionStatus.SYNCED, repositoryId: IsNull() },
      { status: SelectionStatus.SELECTED },
    );
    return result.affected ?? 0;
  }

  async removeForAccount(account: AccountRef): Promise<number> {
    const result = await this.repo.delete(accountWhere(account));
    return result.affected ?? 0;
  }
}
