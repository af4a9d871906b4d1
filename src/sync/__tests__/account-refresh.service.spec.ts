import { RecordNotFoundError, UpstreamUnavailableError } from '../../common/errors.js';
import {
  buildHarness,
  remoteRepo,
  seedIndividual,
  seedOrganization,
} from '../../__tests__/support/fakes.js';
import type { Harness } from '../../__tests__/support/fakes.js';

describe('AccountRefreshService', () => {
  let h: Harness;

  beforeEach(() => {
    h = buildHarness();
  });

  afterEach(() => {
    h.queue.onModuleDestroy();
  });

  describe('periodicRefreshAll', () => {
    it('keeps going when one account fails', async () => {
      await seedIndividual(h.accounts, 'dana', 1, 1000);
      await seedIndividual(h.accounts, 'eve', 1, 1001);
      await seedOrganization(h.accounts, 'acme', 2, 2000);
      h.source.accountRepos.set('dana', [remoteRepo(1), remoteRepo(2)]);
      h.source.accountRepos.set('acme', [remoteRepo(3)]);
      h.source.failures.set('eve', new UpstreamUnavailableError('GitHub API error 502', 502));
      const progress: number[] = [];

      const summary = await h.refresh.periodicRefreshAll({ reportProgress: (p) => progress.push(p) });

      expect(summary).toEqual({ total: 3, succeeded: 2, failed: 1, newCount: 3, updatedCount: 0 });
      expect(progress).toHaveLength(3);
      expect(progress[2]).toBe(100);
    });

    it('skips paused accounts', async () => {
      const paused = await seedIndividual(h.accounts, 'dana');
      await h.accounts.updateState({ kind: 'user', id: paused.account.id }, { isActive: false });

      await expect(h.refresh.periodicRefreshAll()).resolves.toEqual({
        total: 0,
        succeeded: 0,
        failed: 0,
        newCount: 0,
        updatedCount: 0,
      });
    });

    it('counts accounts it could not queue as failed', async () => {
      await seedIndividual(h.accounts, 'dana');
      h.queue.onModuleDestroy();

      const summary = await h.refresh.periodicRefreshAll();

      expect(summary).toMatchObject({ total: 1, succeeded: 0, failed: 1 });
    });
  });

  it('runs the sweep as a queued job', async () => {
    await seedIndividual(h.accounts, 'dana');
    h.source.accountRepos.set('dana', [remoteRepo(1)]);

    const handle = await h.refresh.startPeriodicRefresh();

    await expect(h.queue.waitFor(handle, 1_000)).resolves.toMatchObject({ total: 1, succeeded: 1, newCount: 1 });
  });

  describe('refreshAccount', () => {
    it('queues a refresh of an owned account', async () => {
      const source = await seedOrganization(h.accounts, 'acme');
      h.source.accountRepos.set('acme', [remoteRepo(1), remoteRepo(2)]);

      const handle = await h.refresh.refreshAccount({ kind: 'organization', id: source.account.id }, 1);

      await expect(h.queue.waitFor(handle, 1_000)).resolves.toEqual({ newCount: 2, updatedCount: 0 });
    });

    it('hides accounts of other owners', async () => {
      const source = await seedIndividual(h.accounts, 'dana', 1);

      await expect(h.refresh.refreshAccount({ kind: 'user', id: source.account.id }, 2)).rejects.toBeInstanceOf(
        RecordNotFoundError,
      );
    });
  });
});
