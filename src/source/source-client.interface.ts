// Abstraction over remote repository hosts consumed by the sync pipeline

export enum RepositoryProvider {
  GITHUB = 'github',
  GITLAB = 'gitlab',
  BITBUCKET = 'bitbucket',
  LOCAL = 'local',
}

export type AccountKind = 'user' | 'organization';

export interface RemoteAccountProfile {
  id: number;
  login: string;
  displayName: string | null;
  description: string | null;
  email: string | null;
  avatarUrl: string | null;
  bio: string | null;
  company: string | null;
  location: string | null;
  blog: string | null;
  publicRepos: number;
  publicGists: number;
  followers: number;
  following: number;
}

export interface RemoteRepository {
  id: number;
  name: string;
  fullName: string;
  description: string | null;
  htmlUrl: string;
  cloneUrl: string | null;
  defaultBranch: string;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
  stargazersCount: number;
  watchersCount: number;
  forksCount: number;
  size: number; // KB
  language: string | null;
}

export interface RemoteCommitSummary {
  sha: string;
}

export interface RawCommitFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
}

export interface RawCommitIdentity {
  name: string | null;
  email: string | null;
  date: string | null; // ISO
}

/** Commit detail as returned by the host, before normalization. */
export interface RawCommitDetail {
  sha: string;
  message: string;
  author: RawCommitIdentity | null;
  committer: RawCommitIdentity | null;
  parents: string[];
  files: RawCommitFile[];
}

export interface NormalizedCommit {
  sha: string;
  message: string;
  authorName: string;
  authorEmail: string;
  committerName: string;
  committerEmail: string;
  commitDate: Date;
  linesAdded: number;
  linesRemoved: number;
  filesChanged: number;
  filesAdded: string[];
  filesModified: string[];
  filesDeleted: string[];
  parentShas: string[];
  isMerge: boolean;
}

// The interface every provider implements
export interface SourceClient {
  readonly provider: RepositoryProvider;

  fetchAccountProfile(params: { kind: AccountKind; login: string }): Promise<RemoteAccountProfile>;
  listAccountRepositories(params: { kind: AccountKind; login: string }): Promise<RemoteRepository[]>;

  fetchRepoInfo(params: { owner: string; repo: string }): Promise<RemoteRepository>;
  fetchCommits(params: {
    owner: string;
    repo: string;
    since?: Date | null;
  }): Promise<RemoteCommitSummary[]>;
  fetchCommitDetail(params: { owner: string; repo: string; sha: string }): Promise<RawCommitDetail>;
}

/**
 * Builds the client for a provider. `credential` overrides the default token,
 * e.g. an organization's OAuth token.
 */
export abstract class SourceClientFactory {
  abstract forProvider(provider: RepositoryProvider, credential?: string | null): SourceClient;
}
