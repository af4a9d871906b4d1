import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { AccountRepo } from '../accounts/account.repo.js';
import { RepositoryRepo } from '../repositories/repository.repo.js';
import type { RepositoryEntity } from '../repositories/repository.entity.js';
import { SourceClientFactory } from '../source/source-client.interface.js';
import type { NormalizedCommit } from '../source/source-client.interface.js';
import { parseCommit, parseRepositoryUrl } from '../source/parsers.js';
import { CommitRepo } from './commit.repo.js';
import { DeveloperRepo } from './developer.repo.js';
import type { CommitDraft } from './commit.entity.js';

export interface IngestionResult {
  /** Commit rows actually inserted by this run. */
  processedCount: number;
  listedCount: number;
  /** Listed commits already stored, or listed twice. */
  skippedCount: number;
}

export interface IngestionOptions {
  signal?: AbortSignal;
  onProgress?: (percent: number, message: string) => void;
}

// progress milestones of one run
const PROGRESS_REPO_INFO = 5;
const PROGRESS_LISTING = 20;
const PROGRESS_PROCESSING = 40;
const PROGRESS_PROCESSING_SPAN = 50;
const PROGRESS_FINALIZING = 95;

@Injectable()
export class CommitIngestionService {
  private readonly logger = new Logger(CommitIngestionService.name);
  private readonly batchSize: number;

  constructor(
    private readonly sources: SourceClientFactory,
    private readonly accounts: AccountRepo,
    private readonly repositories: RepositoryRepo,
    private readonly commits: CommitRepo,
    private readonly developers: DeveloperRepo,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.batchSize = config.sync.commitBatchSize;
  }

  /**
   * Pulls commits newer than `since` for one repository. Batches already
   * flushed stay stored when the run fails or is revoked midway.
   */
  async ingest(
    repository: RepositoryEntity,
    since: Date | null,
    options: IngestionOptions = {},
  ): Promise<IngestionResult> {
    const report = options.onProgress ?? (() => undefined);
    const { owner, repo } = parseRepositoryUrl(repository.url);
    const client = this.sources.forProvider(repository.provider, await this.credentialFor(repository));

    report(PROGRESS_REPO_INFO, 'Fetching repository info');
    const info = await client.fetchRepoInfo({ owner, repo });
    await this.repositories.update(repository.id, {
      description: info.description,
      defaultBranch: info.defaultBranch,
      isPrivate: info.isPrivate,
    });

    report(PROGRESS_LISTING, 'Fetching commits');
    const listed = await client.fetchCommits({ owner, repo, since });
    const total = listed.length;

    report(PROGRESS_PROCESSING, `Processing ${total} commits`);
    const stored = await this.commits.findExistingShas(
      repository.id,
      listed.map((c) => c.sha),
    );
    const seen = new Set<string>();
    const developerIds = new Map<string, number>();
    let staged: CommitDraft[] = [];
    let processedCount = 0;
    let skippedCount = 0;

    for (const [index, summary] of listed.entries()) {
      if (stored.has(summary.sha) || seen.has(summary.sha)) {
        skippedCount++;
      } else {
        seen.add(summary.sha);
        options.signal?.throwIfAborted();

        const detail = await client.fetchCommitDetail({ owner, repo, sha: summary.sha });
        const commit = parseCommit(detail);
        const developerId = await this.resolveDeveloper(commit, developerIds);
        staged.push(this.toDraft(commit, repository.id, developerId));

        if (staged.length >= this.batchSize) {
          processedCount += await this.commits.insertBatch(staged);
          staged = [];
        }
      }

      report(
        PROGRESS_PROCESSING + (PROGRESS_PROCESSING_SPAN * (index + 1)) / total,
        `Processed ${index + 1}/${total} commits`,
      );
    }

    processedCount += await this.commits.insertBatch(staged);
    report(PROGRESS_FINALIZING, 'Finalizing');

    this.logger.log(
      `${owner}/${repo}: ${total} listed, ${processedCount} stored, ${skippedCount} already known`,
    );
    return { processedCount, listedCount: total, skippedCount };
  }

  private async credentialFor(repository: RepositoryEntity): Promise<string | null> {
    if (repository.sourceOrganizationAccountId === null) return null;
    const source = await this.accounts.find({
      kind: 'organization',
      id: repository.sourceOrganizationAccountId,
    });
    return source?.kind === 'organization' ? source.account.accessToken : null;
  }

  /** First developer by email wins; commits without an author email get none. */
  private async resolveDeveloper(commit: NormalizedCommit, cache: Map<string, number>): Promise<number | null> {
    const email = commit.authorEmail.trim();
    if (!email) return null;

    const cached = cache.get(email);
    if (cached !== undefined) return cached;

    const developer =
      (await this.developers.findByEmail(email)) ??
      (await this.developers.create({
        name: commit.authorName || email,
        email,
        gitName: commit.authorName || null,
        gitEmail: email,
      }));

    cache.set(email, developer.id);
    return developer.id;
  }

  private toDraft(commit: NormalizedCommit, repositoryId: number, developerId: number | null): CommitDraft {
    return {
      sha: commit.sha,
      message: commit.message,
      authorName: commit.authorName || null,
      authorEmail: commit.authorEmail || null,
      committerName: commit.committerName || null,
      committerEmail: commit.committerEmail || null,
      commitDate: commit.commitDate,
      linesAdded: commit.linesAdded,
      linesRemoved: commit.linesRemoved,
      filesChanged: commit.filesChanged,
      filesAdded: commit.filesAdded,
      filesModified: commit.filesModified,
      filesDeleted: commit.filesDeleted,
      parentShas: commit.parentShas,
      isMerge: commit.isMerge,
      isAnalyzed: false,
      repositoryId,
      developerId,
    };
  }
}
