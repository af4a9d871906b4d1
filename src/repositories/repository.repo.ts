import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { PersistenceConflictError } from '../common/errors.js';
import { isUniqueViolation } from '../database/unique-violation.js';
import { RepositoryEntity, SyncStatus } from './repository.entity.js';
import type { RepositoryDraft, RepositoryPatch } from './repository.entity.js';

export type SyncStatusCounts = Record<SyncStatus, number>;

export function emptyStatusCounts(): SyncStatusCounts {
  return {
    [SyncStatus.PENDING]: 0,
    [SyncStatus.SYNCING]: 0,
    [SyncStatus.COMPLETED]: 0,
    [SyncStatus.FAILED]: 0,
  };
}

export abstract class RepositoryRepo {
  abstract findById(id: number): Promise<RepositoryEntity | null>;
  abstract findForOwner(id: number, ownerId: number): Promise<RepositoryEntity | null>;
  abstract findByIdsForOwner(ids: number[], ownerId: number): Promise<RepositoryEntity[]>;
  abstract findByUrlAndOwner(url: string, ownerId: number): Promise<RepositoryEntity | null>;

  /** Throws PersistenceConflictError when (url, owner) already exists. */
  abstract create(row: RepositoryDraft): Promise<RepositoryEntity>;
  abstract update(id: number, patch: RepositoryPatch): Promise<void>;

  /**
   * Enters `syncing` on behalf of `jobId` from an idle status, or resumes a
   * run `jobId` already owns. False when another task holds the repository.
   */
  abstract claimSync(id: number, jobId: string, idle: SyncStatus[]): Promise<boolean>;

  /**
   * Moves the sync status to `to` only while it is one of `from` and `jobId`
   * still owns the run. False when another writer got there first.
   */
  abstract transitionOwned(
    id: number,
    jobId: string,
    from: SyncStatus[],
    to: SyncStatus,
    patch?: RepositoryPatch,
  ): Promise<boolean>;

  abstract countByStatus(ownerId: number): Promise<SyncStatusCounts>;
}

@Injectable()
export class TypeormRepositoryRepo extends RepositoryRepo {
  constructor(
    @InjectRepository(RepositoryEntity)
    private readonly repo: Repository<RepositoryEntity>,
  ) {
    super();
  }

  async findById(id: number): Promise<RepositoryEntity | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findForOwner(id: number, ownerId: number): Promise<RepositoryEntity | null> {
    return this.repo.findOne({ where: { id, ownerId } });
  }

  async findByIdsForOwner(ids: number[], ownerId: number): Promise<RepositoryEntity[]> {
    if (ids.length === 0) return [];
    return this.repo.find({ where: { id: In(ids), ownerId } });
  }

  async findByUrlAndOwner(url: string, ownerId: number): Promise<RepositoryEntity | null> {
    return this.repo.findOne({ where: { url, ownerId } });
  }

  async create(row: RepositoryDraft): Promise<RepositoryEntity> {
    try {
      return await this.repo.save(this.repo.create(row));
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(`Repository ${row.url} already exists for owner ${row.ownerId}`);
      }
      throw error;
    }
  }

  async update(id: number, patch: RepositoryPatch): Promise<void> {
    await this.repo.update({ id }, patch);
  }

  async claimSync(id: number, jobId: string, idle: SyncStatus[]): Promise<boolean> {
    const result = await this.repo
      .createQueryBuilder()
      .update(RepositoryEntity)
      .set({ syncStatus: SyncStatus.SYNCING, syncJobId: jobId, syncError: null })
      .where('id = :id', { id })
      .andWhere(
        '(sync_status IN (:...idle) OR (sync_status = :syncing AND sync_job_id = :jobId))',
        { idle, syncing: SyncStatus.SYNCING, jobId },
      )
      .execute();
    return (result.affected ?? 0) > 0;
  }

  async transitionOwned(
    id: number,
    jobId: string,
    from: SyncStatus[],
    to: SyncStatus,
    patch: RepositoryPatch = {},
  ): Promise<boolean> {
    const result = await this.repo.update(
      { id, syncJobId: jobId, syncStatus: In(from) },
      { ...patch, syncStatus: to },
    );
    return (result.affected ?? 0) > 0;
  }

  async countByStatus(ownerId: number): Promise<SyncStatusCounts> {
    const rows = await this.repo
      .createQueryBuilder('r')
      .select('r.syncStatus', 'status')
      .addSelect('COUNT(*)', 'count')
      .where('r.ownerId = :ownerId', { ownerId })
      .groupBy('r.syncStatus')
      .getRawMany<{ status: SyncStatus; count: string }>();

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }
}
