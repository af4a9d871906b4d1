import { jest } from '@jest/globals';
import {
  JobRevokedError,
  RecordNotFoundError,
  SyncInProgressError,
  UpstreamNotFoundError,
  UpstreamUnavailableError,
} from '../../common/errors.js';
import { SyncStatus } from '../../repositories/repository.entity.js';
import type { RepositoryEntity } from '../../repositories/repository.entity.js';
import {
  buildHarness,
  flushJobs,
  rawCommit,
  remoteRepo,
  seedIndividual,
  seedOrganization,
  seedRepository,
} from '../../__tests__/support/fakes.js';
import type { Harness } from '../../__tests__/support/fakes.js';

const widgets = remoteRepo(5, {
  name: 'widgets',
  fullName: 'acme/widgets',
  htmlUrl: 'https://github.com/acme/widgets',
});

describe('SyncJobService', () => {
  let h: Harness;
  let repository: RepositoryEntity;
  let progress: number[];
  let runs = 0;

  const ctx = (jobId = `direct-${++runs}`) => ({
    jobId,
    signal: new AbortController().signal,
    reportProgress: (percent: number) => {
      progress.push(percent);
    },
  });

  const setup = async (env: Record<string, string> = {}) => {
    h = buildHarness(env);
    repository = await seedRepository(h.repositories, 'acme/widgets');
    h.source.addRepository(widgets, [rawCommit('a')]);
    progress = [];
  };

  beforeEach(async () => {
    await setup();
  });

  afterEach(() => {
    h.queue.onModuleDestroy();
  });

  describe('runSync', () => {
    it('ingests and completes the repository', async () => {
      const before = Date.now();

      const result = await h.syncJobs.runSync(repository.id, ctx());

      expect(result).toEqual({
        processedCount: 1,
        listedCount: 1,
        skippedCount: 0,
        repositoryId: repository.id,
        attempts: 1,
      });
      expect(repository.syncStatus).toBe(SyncStatus.COMPLETED);
      expect(repository.syncError).toBeNull();
      expect(repository.lastSyncedAt?.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('reports progress that never goes back and ends at 100', async () => {
      await h.syncJobs.runSync(repository.id, ctx());

      expect(progress).toEqual([5, 20, 40, 90, 95, 100]);
    });

    it('only asks for commits after the last successful sync', async () => {
      const lastSyncedAt = new Date('2024-02-01T00:00:00Z');
      await h.repositories.update(repository.id, { lastSyncedAt });

      await h.syncJobs.runSync(repository.id, ctx());

      expect(h.source.sinceRequests).toEqual([lastSyncedAt]);
    });

    it('retries a transient failure and then succeeds', async () => {
      jest
        .spyOn(h.source, 'fetchRepoInfo')
        .mockRejectedValueOnce(new UpstreamUnavailableError('GitHub API error 503', 503));
      const transitions = jest.spyOn(h.repositories, 'transitionOwned');

      const result = await h.syncJobs.runSync(repository.id, ctx('direct-retry'));

      expect(result.attempts).toBe(2);
      expect(transitions.mock.calls.map((call) => call[3])).toEqual([
        SyncStatus.FAILED,
        SyncStatus.SYNCING,
        SyncStatus.COMPLETED,
      ]);
      expect(transitions.mock.calls.map((call) => call[1])).toEqual(['direct-retry', 'direct-retry', 'direct-retry']);
      expect(transitions.mock.calls[0][4]).toEqual({ syncError: 'GitHub API error 503' });
      expect(repository).toMatchObject({ syncStatus: SyncStatus.COMPLETED, syncError: null, syncJobId: null });
      expect(progress).toEqual([5, 5, 20, 40, 90, 95, 100]);
    });

    it('marks the repository failed once attempts run out', async () => {
      const fetchInfo = jest.spyOn(h.source, 'fetchRepoInfo');
      h.source.failures.set('acme/widgets', new UpstreamUnavailableError('GitHub API error 503', 503));

      await expect(h.syncJobs.runSync(repository.id, ctx())).rejects.toThrow('GitHub API error 503');

      expect(fetchInfo).toHaveBeenCalledTimes(3);
      expect(repository).toMatchObject({
        syncStatus: SyncStatus.FAILED,
        syncError: 'GitHub API error 503',
        lastSyncedAt: null,
      });
    });

    it('does not retry a permanent failure', async () => {
      const fetchInfo = jest.spyOn(h.source, 'fetchRepoInfo');
      h.source.failures.set('acme/widgets', new UpstreamNotFoundError('GET repo acme/widgets: not found upstream'));

      await expect(h.syncJobs.runSync(repository.id, ctx())).rejects.toBeInstanceOf(UpstreamNotFoundError);

      expect(fetchInfo).toHaveBeenCalledTimes(1);
      expect(repository.syncStatus).toBe(SyncStatus.FAILED);
    });

    it('refuses to start while another run is syncing', async () => {
      await h.repositories.update(repository.id, { syncStatus: SyncStatus.SYNCING });

      await expect(h.syncJobs.runSync(repository.id, ctx())).rejects.toBeInstanceOf(SyncInProgressError);

      expect(repository.syncStatus).toBe(SyncStatus.SYNCING);
      expect(h.source.sinceRequests).toEqual([]);
    });

    it('resumes a run redelivered under the task that owns it', async () => {
      await h.repositories.update(repository.id, {
        syncStatus: SyncStatus.SYNCING,
        syncJobId: 'repository-sync:7',
      });

      const result = await h.syncJobs.runSync(repository.id, ctx('repository-sync:7'));

      expect(result.processedCount).toBe(1);
      expect(repository).toMatchObject({ syncStatus: SyncStatus.COMPLETED, syncJobId: null });
    });

    it('leaves a forced run alone when an older run wakes from its retry delay', async () => {
      await setup({ SYNC_RETRY_BACKOFF_MS: '150' });
      jest
        .spyOn(h.source, 'fetchRepoInfo')
        .mockRejectedValueOnce(new UpstreamUnavailableError('GitHub API error 502', 502));
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      h.source.onDetail = () => gate;

      const stale = h.syncJobs.runSync(repository.id, ctx('direct-stale'));
      await flushJobs();
      expect(repository).toMatchObject({ syncStatus: SyncStatus.FAILED, syncError: 'GitHub API error 502' });

      const handle = await h.syncJobs.forceSync(repository.id, 1);
      await flushJobs();
      expect(h.source.detailRequests).toEqual(['a']);

      await expect(stale).rejects.toBeInstanceOf(SyncInProgressError);
      expect(repository).toMatchObject({ syncStatus: SyncStatus.SYNCING, syncError: null, syncJobId: handle.id });
      await expect(h.syncJobs.runSync(repository.id, ctx())).rejects.toBeInstanceOf(SyncInProgressError);

      release();
      await h.queue.waitFor(handle, 1_000);
      expect(repository).toMatchObject({ syncStatus: SyncStatus.COMPLETED, syncError: null, syncJobId: null });
    });

    it('lets only one of two concurrent runs through', async () => {
      const [first, second] = await Promise.allSettled([
        h.syncJobs.runSync(repository.id, ctx()),
        h.syncJobs.runSync(repository.id, ctx()),
      ]);

      expect(first.status).toBe('fulfilled');
      expect(second).toMatchObject({ status: 'rejected', reason: expect.any(SyncInProgressError) });
      expect(h.commits.forRepository(repository.id)).toHaveLength(1);
    });

    it('fails for an unknown repository', async () => {
      await expect(h.syncJobs.runSync(404, ctx())).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('forceSync', () => {
    it('resets a stuck repository and runs it on the queue', async () => {
      await h.repositories.update(repository.id, { syncStatus: SyncStatus.SYNCING, syncError: 'worker died' });

      const handle = await h.syncJobs.forceSync(repository.id, 1);
      const result = await h.queue.waitFor(handle, 1_000);

      expect(result.processedCount).toBe(1);
      expect(repository).toMatchObject({ syncStatus: SyncStatus.COMPLETED, syncError: null });
      expect(await h.queue.status(handle.id)).toMatchObject({ state: 'succeeded', progress: 100 });
    });

    it('hides repositories of other owners', async () => {
      await expect(h.syncJobs.forceSync(repository.id, 2)).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('stops a revoked run and leaves the repository failed', async () => {
      h.source.addRepository(widgets, [rawCommit('a'), rawCommit('b')]);
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      h.source.onDetail = () => gate;

      const handle = await h.syncJobs.forceSync(repository.id, 1);
      await flushJobs();
      expect(h.source.detailRequests).toEqual(['a']);
      expect(await h.queue.revoke(handle.id)).toBe(true);
      release();

      await expect(h.queue.waitFor(handle, 1_000)).rejects.toBeInstanceOf(JobRevokedError);
      expect((await h.queue.status(handle.id))?.state).toBe('revoked');
      expect(repository.syncStatus).toBe(SyncStatus.FAILED);
      expect(h.source.detailRequests).toEqual(['a']);
    });
  });

  describe('getSyncStatus', () => {
    it('returns the stored sync state', async () => {
      await h.repositories.update(repository.id, { syncStatus: SyncStatus.FAILED, syncError: 'boom' });

      await expect(h.syncJobs.getSyncStatus(repository.id, 1)).resolves.toEqual({
        repositoryId: repository.id,
        syncStatus: SyncStatus.FAILED,
        syncError: 'boom',
        lastSyncedAt: null,
        isActive: true,
      });
    });

    it('hides repositories of other owners', async () => {
      await expect(h.syncJobs.getSyncStatus(repository.id, 2)).rejects.toBeInstanceOf(RecordNotFoundError);
    });
  });

  describe('stats', () => {
    it('counts repositories by status and accounts by kind for one owner', async () => {
      await seedRepository(h.repositories, 'acme/done', 1, { syncStatus: SyncStatus.COMPLETED });
      await seedRepository(h.repositories, 'acme/broken', 1, { syncStatus: SyncStatus.FAILED });
      await seedRepository(h.repositories, 'other/repo', 2, { syncStatus: SyncStatus.COMPLETED });
      await seedIndividual(h.accounts, 'dana');
      await seedOrganization(h.accounts, 'acme');

      await expect(h.syncJobs.stats(1)).resolves.toEqual({
        repositories: { pending: 1, syncing: 0, completed: 1, failed: 1, total: 3 },
        accounts: { users: 1, organizations: 1 },
      });
    });
  });
});
