import { IndividualAccountEntity } from '../accounts/individual-account.entity.js';
import { OrganizationAccountEntity } from '../accounts/organization-account.entity.js';
import { RepositorySelectionEntity } from '../selection/selection.entity.js';
import { RepositoryEntity } from '../repositories/repository.entity.js';
import { CommitEntity } from '../commits/commit.entity.js';
import { DeveloperEntity } from '../commits/developer.entity.js';

export const ENTITIES = [
  IndividualAccountEntity,
  OrganizationAccountEntity,
  RepositorySelectionEntity,
  RepositoryEntity,
  DeveloperEntity,
  CommitEntity,
];
