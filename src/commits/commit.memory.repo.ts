// src/commits/commit.memory.repo.ts
import { Injectable } from '@nestjs/common';
import { CommitRepo } from './commit.repo.js';
import { CommitEntity } from './commit.entity.js';
import type { CommitDraft } from './commit.entity.js';
import { DeveloperRepo } from './developer.repo.js';
import { DeveloperEntity } from './developer.entity.js';
import type { DeveloperDraft } from './developer.entity.js';

const key = (repositoryId: number, sha: string) => `${repositoryId}:${sha}`;

@Injectable()
export class CommitMemoryRepo extends CommitRepo {
  private rows = new Map<string, CommitEntity>();
  private nextId = 1;
  /** Sizes of every batch handed to insertBatch, in call order. */
  readonly batches: number[] = [];

  async findExistingShas(repositoryId: number, shas: string[]): Promise<Set<string>> {
    return new Set(shas.filter((sha) => this.rows.has(key(repositoryId, sha))));
  }

  async insertBatch(rows: CommitDraft[]): Promise<number> {
    if (rows.length === 0) return 0;
    this.batches.push(rows.length);

    let inserted = 0;
    for (const row of rows) {
      const k = key(row.repositoryId, row.sha);
      if (this.rows.has(k)) continue;
      this.rows.set(k, Object.assign(new CommitEntity(), row, { id: this.nextId++, createdAt: new Date() }));
      inserted++;
    }
    return inserted;
  }

  async countForRepository(repositoryId: number): Promise<number> {
    return this.forRepository(repositoryId).length;
  }

  forRepository(repositoryId: number): CommitEntity[] {
    return Array.from(this.rows.values()).filter((c) => c.repositoryId === repositoryId);
  }
}

@Injectable()
export class DeveloperMemoryRepo extends DeveloperRepo {
  private rows: DeveloperEntity[] = [];
  private nextId = 1;

  async findByEmail(email: string): Promise<DeveloperEntity | null> {
    return this.rows.find((d) => d.email === email) ?? null;
  }

  async create(row: DeveloperDraft): Promise<DeveloperEntity> {
    const now = new Date();
    const entity = Object.assign(new DeveloperEntity(), row, {
      id: this.nextId++,
      userId: null,
      isMerged: false,
      mergedWithId: null,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    });
    this.rows.push(entity);
    return entity;
  }

  all(): DeveloperEntity[] {
    return [...this.rows];
  }
}
