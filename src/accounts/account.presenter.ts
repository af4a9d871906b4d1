import type { SourceAccount } from './account.types.js';

export interface AccountView {
  kind: SourceAccount['kind'];
  id: number;
  remoteId: number;
  login: string;
  displayName: string | null;
  avatarUrl: string | null;
  publicRepos: number;
  followers: number;
  isActive: boolean;
  autoSync: boolean;
  lastSyncedAt: Date | null;
  /** Organizations only: whether a token is stored. The token itself never leaves the server. */
  hasAccessToken?: boolean;
  scopes?: string | null;
  createdAt: Date;
}

export function presentAccount(source: SourceAccount): AccountView {
  const { account } = source;
  const view: AccountView = {
    kind: source.kind,
    id: account.id,
    remoteId: account.remoteId,
    login: account.login,
    displayName: account.displayName,
    avatarUrl: account.avatarUrl,
    publicRepos: account.publicRepos,
    followers: account.followers,
    isActive: account.isActive,
    autoSync: account.autoSync,
    lastSyncedAt: account.lastSyncedAt,
    createdAt: account.createdAt,
  };
  if (source.kind === 'organization') {
    view.hasAccessToken = source.account.accessToken !== null;
    view.scopes = source.account.scopes;
  }
  return view;
}
