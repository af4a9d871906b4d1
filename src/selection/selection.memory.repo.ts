// src/selection/selection.memory.repo.ts
import { Injectable } from '@nestjs/common';
import { PersistenceConflictError } from '../common/errors.js';
import type { AccountRef } from '../accounts/account.types.js';
import { SelectionRepo } from './selection.repo.js';
import { RepositorySelectionEntity, SelectionStatus } from './selection.entity.js';
import type { MutableSelectionFields, SelectionDraft } from './selection.entity.js';

const belongsTo = (row: RepositorySelectionEntity, account: AccountRef) =>
  account.kind === 'user'
    ? row.individualAccountId === account.id
    : row.organizationAccountId === account.id;

@Injectable()
export class SelectionMemoryRepo extends SelectionRepo {
  private rows = new Map<number, RepositorySelectionEntity>();
  private nextId = 1;

  async findByRemoteId(account: AccountRef, remoteRepoId: number): Promise<RepositorySelectionEntity | null> {
    return this.all().find((r) => belongsTo(r, account) && r.remoteRepoId === remoteRepoId) ?? null;
  }

  async listForAccount(account: AccountRef): Promise<RepositorySelectionEntity[]> {
    return this.all()
      .filter((r) => belongsTo(r, account))
      .sort((a, b) => a.fullName.localeCompare(b.fullName));
  }

  async listPromotable(account: AccountRef): Promise<RepositorySelectionEntity[]> {
    return this.all().filter(
      (r) => belongsTo(r, account) && r.status === SelectionStatus.SELECTED && r.repositoryId === null,
    );
  }

  async listDeselectedLinked(ownerId: number): Promise<RepositorySelectionEntity[]> {
    return this.all().filter(
      (r) =>
        r.selectedByUserId === ownerId &&
        r.status === SelectionStatus.DESELECTED &&
        r.repositoryId !== null,
    );
  }

  async insert(row: SelectionDraft): Promise<RepositorySelectionEntity> {
    if ((row.individualAccountId === null) === (row.organizationAccountId === null)) {
      throw new Error('Selection must reference exactly one source account');
    }
    const clash = this.all().find(
      (r) =>
        r.remoteRepoId === row.remoteRepoId &&
        ((row.individualAccountId !== null && r.individualAccountId === row.individualAccountId) ||
          (row.organizationAccountId !== null && r.organizationAccountId === row.organizationAccountId)),
    );
    if (clash) {
      throw new PersistenceConflictError(`Selection for remote repo ${row.remoteRepoId} already exists`);
    }

    const now = new Date();
    const entity = Object.assign(new RepositorySelectionEntity(), row, {
      id: this.nextId++,
      createdAt: now,
      updatedAt: now,
    });
    this.rows.set(entity.id, entity);
    return entity;
  }

  async updateMetadata(id: number, fields: MutableSelectionFields): Promise<void> {
    this.patch(id, fields);
  }

  async setStatus(
    account: AccountRef,
    ids: number[],
    status: SelectionStatus,
    selectedAt: Date | null,
  ): Promise<number> {
    let affected = 0;
    for (const id of ids) {
      const row = this.rows.get(id);
      if (row && belongsTo(row, account)) {
        this.patch(id, { status, selectedAt });
        affected++;
      }
    }
    return affected;
  }

  async markSynced(id: number, repositoryId: number): Promise<void> {
    this.patch(id, { repositoryId, status: SelectionStatus.SYNCED });
  }

  async unlink(id: number): Promise<void> {
    this.patch(id, { repositoryId: null });
  }

  async restoreOrphaned(): Promise<number> {
    const orphans = this.all().filter((r) => r.status === SelectionStatus.SYNCED && r.repositoryId === null);
    for (const row of orphans) this.patch(row.id, { status: SelectionStatus.SELECTED });
    return orphans.length;
  }

  async removeForAccount(account: AccountRef): Promise<number> {
    let removed = 0;
    for (const row of this.all()) {
      if (belongsTo(row, account)) {
        this.rows.delete(row.id);
        removed++;
      }
    }
    return removed;
  }

  private patch(id: number, fields: Partial<RepositorySelectionEntity>) {
    const row = this.rows.get(id);
    if (row) Object.assign(row, fields, { updatedAt: new Date() });
  }

  private all(): RepositorySelectionEntity[] {
    return Array.from(this.rows.values());
  }
}
