import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CommitEntity } from './commit.entity.js';
import type { CommitDraft } from './commit.entity.js';

export abstract class CommitRepo {
  /** SHAs among `shas` already stored for the repository. */
  abstract findExistingShas(repositoryId: number, shas: string[]): Promise<Set<string>>;

  /**
   * Writes the batch in one transaction, skipping (repository, sha) pairs
   * that already exist. Returns the number of rows actually inserted.
   */
  abstract insertBatch(rows: CommitDraft[]): Promise<number>;

  abstract countForRepository(repositoryId: number): Promise<number>;
}

@Injectable()
export class TypeormCommitRepo extends CommitRepo {
  constructor(
    @InjectRepository(CommitEntity)
    private readonly repo: Repository<CommitEntity>,
  ) {
    super();
  }

  async findExistingShas(repositoryId: number, shas: string[]): Promise<Set<string>> {
    if (shas.length === 0) return new Set();
    const rows = await this.repo.find({
      select: { sha: true },
      where: { repositoryId, sha: In(shas) },
    });
    return new Set(rows.map((r) => r.sha));
  }

  async insertBatch(rows: CommitDraft[]): Promise<number> {
    if (rows.length === 0) return 0;

    const result = await this.repo.manager.transaction((em) =>
      em
        .createQueryBuilder()
        .insert()
        .into(CommitEntity)
        .values(rows)
        .orIgnore()
        .returning('id')
        .execute(),
    );

    // RETURNING only yields rows that were not skipped by ON CONFLICT
    const raw: unknown = result.raw;
    return Array.isArray(raw) ? raw.length : 0;
  }

  async countForRepository(repositoryId: number): Promise<number> {
    return this.repo.count({ where: { repositoryId } });
  }
}
