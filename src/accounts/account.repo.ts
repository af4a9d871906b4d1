import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PersistenceConflictError, RecordNotFoundError } from '../common/errors.js';
import { isUniqueViolation } from '../database/unique-violation.js';
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
import { describeAccount } from './account.types.js';

/** Storage for both source account tables. */
export abstract class AccountRepo {
  abstract find(ref: AccountRef): Promise<SourceAccount | null>;
  abstract findByRemoteId(kind: AccountKind, remoteId: number, ownerId: number): Promise<SourceAccount | null>;
  abstract listForOwner(kind: AccountKind, ownerId: number): Promise<SourceAccount[]>;
  abstract listActive(kind: AccountKind): Promise<SourceAccount[]>;
  abstract countForOwner(kind: AccountKind, ownerId: number): Promise<number>;

  /** Inserts or updates by id; a duplicate (remote id, owner) is a PersistenceConflictError. */
  abstract saveIndividual(row: IndividualAccountDraft): Promise<IndividualAccountEntity>;
  abstract saveOrganization(row: OrganizationAccountDraft): Promise<OrganizationAccountEntity>;

  abstract updateState(ref: AccountRef, patch: AccountStatePatch): Promise<void>;
  abstract remove(ref: AccountRef): Promise<void>;

  /** Accounts of other owners are reported as missing. */
  async findOwned(ref: AccountRef, ownerId: number): Promise<SourceAccount> {
    const source = await this.find(ref);
    if (!source || source.account.addedByUserId !== ownerId) {
      throw new RecordNotFoundError(describeAccount(ref), ref.id);
    }
    return source;
  }
}

@Injectable()
export class TypeormAccountRepo extends AccountRepo {
  constructor(
    @InjectRepository(IndividualAccountEntity)
    private readonly individuals: Repository<IndividualAccountEntity>,
    @InjectRepository(OrganizationAccountEntity)
    private readonly organizations: Repository<OrganizationAccountEntity>,
  ) {
    super();
  }

  async find(ref: AccountRef): Promise<SourceAccount | null> {
    if (ref.kind === 'user') {
      const account = await this.individuals.findOne({ where: { id: ref.id } });
      return account ? { kind: 'user', account } : null;
    }
    const account = await this.organizations.findOne({ where: { id: ref.id } });
    return account ? { kind: 'organization', account } : null;
  }

  async findByRemoteId(kind: AccountKind, remoteId: number, ownerId: number): Promise<SourceAccount | null> {
    if (kind === 'user') {
      const account = await this.individuals.findOne({ where: { remoteId, addedByUserId: ownerId } });
      return account ? { kind: 'user', account } : null;
    }
    const account = await this.organizations.findOne({ where: { remoteId, addedByUserId: ownerId } });
    return account ? { kind: 'organization', account } : null;
  }

  async listForOwner(kind: AccountKind, ownerId: number): Promise<SourceAccount[]> {
    if (kind === 'user') {
      const rows = await this.individuals.find({ where: { addedByUserId: ownerId }, order: { id: 'ASC' } });
      return rows.map((account): SourceAccount => ({ kind: 'user', account }));
    }
    const rows = await this.organizations.find({ where: { addedByUserId: ownerId }, order: { id: 'ASC' } });
    return rows.map((account): SourceAccount => ({ kind: 'organization', account }));
  }

  async listActive(kind: AccountKind): Promise<SourceAccount[]> {
    if (kind === 'user') {
      const rows = await this.individuals.find({ where: { isActive: true }, order: { id: 'ASC' } });
      return rows.map((account): SourceAccount => ({ kind: 'user', account }));
    }
    const rows = await this.organizations.find({ where: { isActive: true }, order: { id: 'ASC' } });
    return rows.map((account): SourceAccount => ({ kind: 'organization', account }));
  }

  async countForOwner(kind: AccountKind, ownerId: number): Promise<number> {
    if (kind === 'user') {
      return this.individuals.count({ where: { addedByUserId: ownerId } });
    }
    return this.organizations.count({ where: { addedByUserId: ownerId } });
  }

  async saveIndividual(row: IndividualAccountDraft): Promise<IndividualAccountEntity> {
    try {
      return await this.individuals.save(this.individuals.create(row));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(`GitHub user ${row.login} already exists for this owner`);
      }
      throw error;
    }
  }

  async saveOrganization(row: OrganizationAccountDraft): Promise<OrganizationAccountEntity> {
    try {
      return await this.organizations.save(this.organizations.create(row));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(`GitHub organization ${row.login} already exists for this owner`);
      }
      throw error;
    }
  }

  async updateState(ref: AccountRef, patch: AccountStatePatch): Promise<void> {
    if (ref.kind === 'user') {
      await this.individuals.update({ id: ref.id }, patch);
    } else {
      await this.organizations.update({ id: ref.id }, patch);
    }
  }

  async remove(ref: AccountRef): Promise<void> {
    if (ref.kind === 'user') {
      await this.individuals.delete({ id: ref.id });
    } else {
      await this.organizations.delete({ id: ref.id });
    }
  }
}
