import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from './entities.js';
import { AccountRepo, TypeormAccountRepo } from '../accounts/account.repo.js';
import { SelectionRepo, TypeormSelectionRepo } from '../selection/selection.repo.js';
import { RepositoryRepo, TypeormRepositoryRepo } from '../repositories/repository.repo.js';
import { CommitRepo, TypeormCommitRepo } from '../commits/commit.repo.js';
import { DeveloperRepo, TypeormDeveloperRepo } from '../commits/developer.repo.js';

/** Binds every repo token to its TypeORM implementation. */
@Global()
@Module({
  imports: [TypeOrmModule.forFeature(ENTITIES)],
  providers: [
    { provide: AccountRepo, useClass: TypeormAccountRepo },
    { provide: SelectionRepo, useClass: TypeormSelectionRepo },
    { provide: RepositoryRepo, useClass: TypeormRepositoryRepo },
    { provide: CommitRepo, useClass: TypeormCommitRepo },
    { provide: DeveloperRepo, useClass: TypeormDeveloperRepo },
  ],
  exports: [AccountRepo, SelectionRepo, RepositoryRepo, CommitRepo, DeveloperRepo],
})
export class PersistenceModule {}
