import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DeveloperEntity } from './developer.entity.js';
import type { DeveloperDraft } from './developer.entity.js';

export abstract class DeveloperRepo {
  /** First developer (lowest id) registered under the email. */
  abstract findByEmail(email: string): Promise<DeveloperEntity | null>;
  abstract create(row: DeveloperDraft): Promise<DeveloperEntity>;
}

@Injectable()
export class TypeormDeveloperRepo extends DeveloperRepo {
  constructor(
    @InjectRepository(DeveloperEntity)
    private readonly repo: Repository<DeveloperEntity>,
  ) {
    super();
  }

  async findByEmail(email: string): Promise<DeveloperEntity | null> {
    return this.repo.findOne({ where: { email }, order: { id: 'ASC' } });
  }

  async create(row: DeveloperDraft): Promise<DeveloperEntity> {
    return this.repo.save(this.repo.create(row));
  }
}
