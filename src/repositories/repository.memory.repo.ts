// src/repositories/repository.memory.repo.ts
import { Injectable } from '@nestjs/common';
import { PersistenceConflictError } from '../common/errors.js';
import { RepositoryEntity, SyncStatus } from './repository.entity.js';
import type { RepositoryDraft, RepositoryPatch } from './repository.entity.js';
import { RepositoryRepo, emptyStatusCounts } from './repository.repo.js';
import type { SyncStatusCounts } from './repository.repo.js';

@Injectable()
export class RepositoryMemoryRepo extends RepositoryRepo {
  private rows = new Map<number, RepositoryEntity>();
  private nextId = 1;

  async findById(id: number): Promise<RepositoryEntity | null> {
    return this.rows.get(id) ?? null;
  }

  async findForOwner(id: number, ownerId: number): Promise<RepositoryEntity | null> {
    const row = this.rows.get(id);
    return row && row.ownerId === ownerId ? row : null;
  }

  async findByIdsForOwner(ids: number[], ownerId: number): Promise<RepositoryEntity[]> {
    return this.all().filter((r) => ids.includes(r.id) && r.ownerId === ownerId);
  }

  async findByUrlAndOwner(url: string, ownerId: number): Promise<RepositoryEntity | null> {
    return this.all().find((r) => r.url === url && r.ownerId === ownerId) ?? null;
  }

  async create(row: RepositoryDraft): Promise<RepositoryEntity> {
    if (await this.findByUrlAndOwner(row.url, row.ownerId)) {
      throw new PersistenceConflictError(`Repository ${row.url} already exists for owner ${row.ownerId}`);
    }
    const now = new Date();
    const entity = Object.assign(new RepositoryEntity(), row, {
      id: this.nextId++,
      createdAt: now,
      updatedAt: now,
    });
    this.rows.set(entity.id, entity);
    return entity;
  }

  async update(id: number, patch: RepositoryPatch): Promise<void> {
    const row = this.rows.get(id);
    if (row) Object.assign(row, patch, { updatedAt: new Date() });
  }

  async claimSync(id: number, jobId: string, idle: SyncStatus[]): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row) return false;
    const resumable = row.syncStatus === SyncStatus.SYNCING && row.syncJobId === jobId;
    if (!resumable && !idle.includes(row.syncStatus)) return false;
    Object.assign(row, { syncStatus: SyncStatus.SYNCING, syncJobId: jobId, syncError: null, updatedAt: new Date() });
    return true;
  }

  async transitionOwned(
    id: number,
    jobId: string,
    from: SyncStatus[],
    to: SyncStatus,
    patch: RepositoryPatch = {},
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.syncJobId !== jobId || !from.includes(row.syncStatus)) return false;
    Object.assign(row, patch, { syncStatus: to, updatedAt: new Date() });
    return true;
  }

  async countByStatus(ownerId: number): Promise<SyncStatusCounts> {
    const counts = emptyStatusCounts();
    for (const row of this.all()) {
      if (row.ownerId === ownerId) counts[row.syncStatus]++;
    }
    return counts;
  }

  private all(): RepositoryEntity[] {
    return Array.from(this.rows.values());
  }
}
