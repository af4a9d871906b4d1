import type { AccountKind } from '../source/source-client.interface.js';
import type { IndividualAccountEntity } from './individual-account.entity.js';
import type { OrganizationAccountEntity } from './organization-account.entity.js';

export type { AccountKind };

export interface AccountRef {
  kind: AccountKind;
  id: number;
}

export type SourceAccount =
  | { kind: 'user'; account: IndividualAccountEntity }
  | { kind: 'organization'; account: OrganizationAccountEntity };

type Generated = 'id' | 'createdAt' | 'updatedAt';

export type IndividualAccountDraft = Omit<IndividualAccountEntity, Generated> & { id?: number };
export type OrganizationAccountDraft = Omit<OrganizationAccountEntity, Generated> & { id?: number };

export interface AccountStatePatch {
  isActive?: boolean;
  publicRepos?: number;
  lastSyncedAt?: Date | null;
}

export function refOf(source: SourceAccount): AccountRef {
  return { kind: source.kind, id: source.account.id };
}

/** Token to use against the host: organizations may carry their own. */
export function credentialOf(source: SourceAccount): string | null {
  return source.kind === 'organization' ? source.account.accessToken : null;
}

export function describeAccount(ref: AccountRef): string {
  return `${ref.kind === 'user' ? 'GitHub user' : 'GitHub organization'} ${ref.id}`;
}
