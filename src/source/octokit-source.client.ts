import { Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

import {
  UpstreamNotFoundError,
  UpstreamRateLimitedError,
  UpstreamUnavailableError,
  errorMessage,
} from '../common/errors.js';
import { RepositoryProvider } from './source-client.interface.js';
import type {
  AccountKind,
  RawCommitDetail,
  RawCommitIdentity,
  RemoteAccountProfile,
  RemoteCommitSummary,
  RemoteRepository,
  SourceClient,
} from './source-client.interface.js';

// ---------- PARAM TYPES ----------
type RepoCommitParams =
  RestEndpointMethodTypes['repos']['listCommits']['parameters'];

type UserResponse =
  RestEndpointMethodTypes['users']['getByUsername']['response']['data'];

type OrgResponse =
  RestEndpointMethodTypes['orgs']['get']['response']['data'];

type CommitDetailResponse =
  RestEndpointMethodTypes['repos']['getCommit']['response']['data'];

type GitIdentity = { name?: string; email?: string; date?: string } | null | undefined;

// Shape shared by the full and the minimal repository payloads
type RepoPayload = {
  id: number;
  name: string;
  full_name: string;
  description: string | null;
  html_url: string;
  clone_url?: string;
  default_branch?: string;
  private: boolean;
  fork: boolean;
  archived?: boolean;
  stargazers_count?: number;
  watchers_count?: number;
  forks_count?: number;
  size?: number;
  language?: string | null;
};

export const DEFAULT_PAGE_CAP = 1000;
const PER_PAGE = 100;

export interface OctokitSourceClientOptions {
  token?: string | null;
  baseUrl?: string;
  pageCap?: number;
  fetch?: typeof globalThis.fetch;
}

export class OctokitSourceClient implements SourceClient {
  readonly provider = RepositoryProvider.GITHUB;

  private readonly logger = new Logger(OctokitSourceClient.name);
  private readonly octokit: Octokit;
  private readonly pageCap: number;

  constructor(options: OctokitSourceClientOptions = {}) {
    this.pageCap = options.pageCap ?? DEFAULT_PAGE_CAP;
    this.octokit = new Octokit({
      auth: options.token ?? undefined,
      baseUrl: options.baseUrl,
      userAgent: 'repo-pulse-backend/1.0',
      request: {
        headers: { accept: 'application/vnd.github+json' },
        ...(options.fetch ? { fetch: options.fetch } : {}),
      },
    });
  }

  // ---------- ACCOUNTS ----------
  async fetchAccountProfile(params: {
    kind: AccountKind;
    login: string;
  }): Promise<RemoteAccountProfile> {
    if (params.kind === 'organization') {
      const { data } = await this.call(`GET org ${params.login}`, () =>
        this.octokit.orgs.get({ org: params.login }),
      );
      return this.mapOrg(data);
    }

    const { data } = await this.call(`GET user ${params.login}`, () =>
      this.octokit.users.getByUsername({ username: params.login }),
    );
    return this.mapUser(data);
  }

  async listAccountRepositories(params: {
    kind: AccountKind;
    login: string;
  }): Promise<RemoteRepository[]> {
    const items =
      params.kind === 'organization'
        ? await this.fetchPages(`list repos of org ${params.login}`, () =>
            this.octokit.paginate.iterator(this.octokit.repos.listForOrg, {
              org: params.login,
              type: 'all',
              sort: 'updated',
              direction: 'desc',
              per_page: PER_PAGE,
            }),
          )
        : await this.fetchPages(`list repos of user ${params.login}`, () =>
            this.octokit.paginate.iterator(this.octokit.repos.listForUser, {
              username: params.login,
              sort: 'updated',
              direction: 'desc',
              per_page: PER_PAGE,
            }),
          );

    return items.map((r) => this.mapRepo(r));
  }

  // ---------- REPOS ----------
  async fetchRepoInfo(params: {
    owner: string;
    repo: string;
  }): Promise<RemoteRepository> {
    const { data } = await this.call(`GET repo ${params.owner}/${params.repo}`, () =>
      this.octokit.repos.get({ owner: params.owner, repo: params.repo }),
    );
    return this.mapRepo(data);
  }

  async fetchCommits(params: {
    owner: string;
    repo: string;
    since?: Date | null;
  }): Promise<RemoteCommitSummary[]> {
    const payload: RepoCommitParams = {
      owner: params.owner,
      repo: params.repo,
      per_page: PER_PAGE,
    };
    if (params.since) payload.since = params.since.toISOString();

    const items = await this.fetchPages(
      `list commits of ${params.owner}/${params.repo}`,
      () => this.octokit.paginate.iterator(this.octokit.repos.listCommits, payload),
    );

    return items.map((c) => ({ sha: String(c.sha) }));
  }

  async fetchCommitDetail(params: {
    owner: string;
    repo: string;
    sha: string;
  }): Promise<RawCommitDetail> {
    const { data } = await this.call(`GET commit ${params.sha}`, () =>
      this.octokit.repos.getCommit({
        owner: params.owner,
        repo: params.repo,
        ref: params.sha,
      }),
    );
    return this.mapCommitDetail(data);
  }

  // ---------- PAGINATION ----------
  /**
   * Walks pages until an empty page, the last page, or the cap, whichever
   * comes first. The result never exceeds the cap.
   */
  private async fetchPages<T>(
    operation: string,
    pages: () => AsyncIterable<{ data: T[] }>,
  ): Promise<T[]> {
    const items: T[] = [];

    try {
      for await (const page of pages()) {
        if (page.data.length === 0) break;
        items.push(...page.data);
        if (items.length >= this.pageCap) {
          this.logger.debug(`${operation}: reached cap of ${this.pageCap} items`);
          break;
        }
      }
    } catch (error: unknown) {
      throw this.mapError(error, operation);
    }

    return items.slice(0, this.pageCap);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw this.mapError(error, operation);
    }
  }

  private mapError(error: unknown, operation: string): Error {
    const cause = error instanceof Error ? error : undefined;

    if (error instanceof RequestError) {
      const status = error.status;
      if (status === 404) {
        return new UpstreamNotFoundError(`${operation}: not found upstream`, cause);
      }
      if (status === 403 || status === 429) {
        return new UpstreamRateLimitedError(`${operation}: GitHub API rate limit exceeded (${status})`, cause);
      }
      return new UpstreamUnavailableError(`${operation}: GitHub API error ${status}`, status, cause);
    }

    return new UpstreamUnavailableError(
      `${operation}: failed to connect to GitHub API: ${errorMessage(error)}`,
      undefined,
      cause,
    );
  }

  // ---------- MAPPERS ----------
  private mapRepo(r: RepoPayload): RemoteRepository {
    return {
      id: Number(r.id),
      name: r.name,
      fullName: r.full_name,
      description: r.description ?? null,
      htmlUrl: r.html_url,
      cloneUrl: r.clone_url ?? null,
      defaultBranch: r.default_branch ?? 'main',
      isPrivate: Boolean(r.private),
      isFork: Boolean(r.fork),
      isArchived: Boolean(r.archived),
      stargazersCount: r.stargazers_count ?? 0,
      watchersCount: r.watchers_count ?? 0,
      forksCount: r.forks_count ?? 0,
      size: r.size ?? 0,
      language: r.language ?? null,
    };
  }

  private mapUser(data: UserResponse): RemoteAccountProfile {
    return {
      id: Number(data.id),
      login: data.login,
      displayName: data.name ?? null,
      description: null,
      email: data.email ?? null,
      avatarUrl: data.avatar_url ?? null,
      bio: data.bio ?? null,
      company: data.company ?? null,
      location: data.location ?? null,
      blog: data.blog ?? null,
      publicRepos: data.public_repos ?? 0,
      publicGists: data.public_gists ?? 0,
      followers: data.followers ?? 0,
      following: data.following ?? 0,
    };
  }

  private mapOrg(data: OrgResponse): RemoteAccountProfile {
    return {
      id: Number(data.id),
      login: data.login,
      displayName: data.name ?? null,
      description: data.description ?? null,
      email: data.email ?? null,
      avatarUrl: data.avatar_url ?? null,
      bio: null,
      company: data.company ?? null,
      location: data.location ?? null,
      blog: data.blog ?? null,
      publicRepos: data.public_repos ?? 0,
      publicGists: data.public_gists ?? 0,
      followers: data.followers ?? 0,
      following: data.following ?? 0,
    };
  }

  private mapIdentity(identity: GitIdentity): RawCommitIdentity | null {
    if (!identity) return null;
    return {
      name: identity.name ?? null,
      email: identity.email ?? null,
      date: identity.date ?? null,
    };
  }

  private mapCommitDetail(data: CommitDetailResponse): RawCommitDetail {
    return {
      sha: data.sha,
      message: data.commit.message ?? '',
      author: this.mapIdentity(data.commit.author),
      committer: this.mapIdentity(data.commit.committer),
      parents: (data.parents ?? []).map((p) => p.sha),
      files: (data.files ?? []).map((f) => ({
        filename: f.filename,
        status: String(f.status),
        additions: f.additions ?? 0,
        deletions: f.deletions ?? 0,
      })),
    };
  }
}
