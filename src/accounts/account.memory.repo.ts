// src/accounts/account.memory.repo.ts
import { Injectable } from '@nestjs/common';
import { PersistenceConflictError } from '../common/errors.js';
import { AccountRepo } from './account.repo.js';
import { IndividualAccountEntity } from './individual-account.entity.js';
import { OrganizationAccountEntity } from './organization-account.entity.js';
import type {
  AccountKind,
  AccountRef,
  AccountStatePatch,
  IndividualAccountDraft,
  OrganizationAccountDraft,
  SourceAccount,
} from './account.types.js';

@Injectable()
export class AccountMemoryRepo extends AccountRepo {
  private individuals = new Map<number, IndividualAccountEntity>();
  private organizations = new Map<number, OrganizationAccountEntity>();
  private nextId = 1;

  async find(ref: AccountRef): Promise<SourceAccount | null> {
    return this.all(ref.kind).find((s) => s.account.id === ref.id) ?? null;
  }

  async findByRemoteId(kind: AccountKind, remoteId: number, ownerId: number): Promise<SourceAccount | null> {
    return (
      this.all(kind).find(
        (s) => s.account.remoteId === remoteId && s.account.addedByUserId === ownerId,
      ) ?? null
    );
  }

  async listForOwner(kind: AccountKind, ownerId: number): Promise<SourceAccount[]> {
    return this.all(kind).filter((s) => s.account.addedByUserId === ownerId);
  }

  async listActive(kind: AccountKind): Promise<SourceAccount[]> {
    return this.all(kind).filter((s) => s.account.isActive);
  }

  async countForOwner(kind: AccountKind, ownerId: number): Promise<number> {
    return (await this.listForOwner(kind, ownerId)).length;
  }

  async saveIndividual(row: IndividualAccountDraft): Promise<IndividualAccountEntity> {
    this.assertUnique('user', row.remoteId, row.addedByUserId, row.id);
    const now = new Date();
    const previous = row.id !== undefined ? this.individuals.get(row.id) : undefined;
    const entity = Object.assign(new IndividualAccountEntity(), row, {
      id: row.id ?? this.nextId++,
      createdAt: previous?.createdAt ?? now,
      updatedAt: now,
    });
    this.individuals.set(entity.id, entity);
    return entity;
  }

  async saveOrganization(row: OrganizationAccountDraft): Promise<OrganizationAccountEntity> {
    this.assertUnique('organization', row.remoteId, row.addedByUserId, row.id);
    const now = new Date();
    const previous = row.id !== undefined ? this.organizations.get(row.id) : undefined;
    const entity = Object.assign(new OrganizationAccountEntity(), row, {
      id: row.id ?? this.nextId++,
      createdAt: previous?.createdAt ?? now,
      updatedAt: now,
    });
    this.organizations.set(entity.id, entity);
    return entity;
  }

  async updateState(ref: AccountRef, patch: AccountStatePatch): Promise<void> {
    const found = await this.find(ref);
    if (found) Object.assign(found.account, patch, { updatedAt: new Date() });
  }

  async remove(ref: AccountRef): Promise<void> {
    if (ref.kind === 'user') this.individuals.delete(ref.id);
    else this.organizations.delete(ref.id);
  }

  private all(kind: AccountKind): SourceAccount[] {
    if (kind === 'user') {
      return Array.from(this.individuals.values(), (account): SourceAccount => ({ kind: 'user', account }));
    }
    return Array.from(this.organizations.values(), (account): SourceAccount => ({ kind: 'organization', account }));
  }

  private assertUnique(kind: AccountKind, remoteId: number, ownerId: number, id?: number) {
    const clash = this.all(kind).find(
      (s) => s.account.remoteId === remoteId && s.account.addedByUserId === ownerId && s.account.id !== id,
    );
    if (clash) {
      throw new PersistenceConflictError(`${kind} ${remoteId} already exists for owner ${ownerId}`);
    }
  }
}
