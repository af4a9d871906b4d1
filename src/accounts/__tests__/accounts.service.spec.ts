import { BadRequestException } from '@nestjs/common';
import {
  AccountAlreadyMonitoredError,
  RecordNotFoundError,
  UpstreamNotFoundError,
} from '../../common/errors.js';
import { buildHarness, flushJobs, profile, remoteRepo, seedIndividual } from '../../__tests__/support/fakes.js';
import type { Harness } from '../../__tests__/support/fakes.js';
import { ParseAccountKindPipe } from '../account-kind.pipe.js';
import { presentAccount } from '../account.presenter.js';

describe('AccountsService', () => {
  let h: Harness;

  beforeEach(() => {
    h = buildHarness();
    h.source.profiles.set('dana', profile(1000, 'dana'));
    h.source.profiles.set('acme', profile(2000, 'acme'));
    h.source.accountRepos.set('dana', [remoteRepo(1), remoteRepo(2)]);
  });

  afterEach(() => {
    h.queue.onModuleDestroy();
  });

  describe('addIndividual', () => {
    it('stores the profile and lists its repositories in the background', async () => {
      const added = await h.accountsService.addIndividual(1, 'dana');

      expect(added.source).toMatchObject({
        kind: 'user',
        account: { remoteId: 1000, login: 'dana', addedByUserId: 1, isActive: true },
      });
      expect(added.refreshJobId).toEqual(expect.any(String));

      await flushJobs();
      const selections = await h.selections.listForAccount({ kind: 'user', id: added.source.account.id });
      expect(selections).toHaveLength(2);
    });

    it('refuses an account the owner already monitors', async () => {
      await h.accountsService.addIndividual(1, 'dana');

      await expect(h.accountsService.addIndividual(1, 'dana')).rejects.toBeInstanceOf(AccountAlreadyMonitoredError);
    });

    it('lets another owner monitor the same account', async () => {
      await h.accountsService.addIndividual(1, 'dana');

      await expect(h.accountsService.addIndividual(2, 'dana')).resolves.toMatchObject({
        source: { account: { addedByUserId: 2 } },
      });
    });

    it('fails for a login unknown to GitHub', async () => {
      await expect(h.accountsService.addIndividual(1, 'ghost')).rejects.toBeInstanceOf(UpstreamNotFoundError);
      expect(await h.accountsService.list('user', 1)).toEqual([]);
    });
  });

  describe('connectOrganization', () => {
    it('stores the token and uses it against GitHub', async () => {
      const added = await h.accountsService.connectOrganization(1, 'acme', 'test-org-token', 'read:org');

      expect(added.source).toMatchObject({
        kind: 'organization',
        account: { login: 'acme', accessToken: 'test-org-token', scopes: 'read:org' },
      });
      await flushJobs();
      expect(h.sources.credentials).toEqual(['test-org-token', 'test-org-token']);
    });

    it('replaces the token of an organization already connected', async () => {
      const first = await h.accountsService.connectOrganization(1, 'acme', 'test-org-token');
      await h.accountsService.setActive({ kind: 'organization', id: first.source.account.id }, 1, false);

      const second = await h.accountsService.connectOrganization(1, 'acme', 'test-new-token');

      expect(second.source.account.id).toBe(first.source.account.id);
      expect(second.source).toMatchObject({ account: { accessToken: 'test-new-token', isActive: false } });
      expect(await h.accountsService.list('organization', 1)).toHaveLength(1);
    });
  });

  describe('setActive', () => {
    it('pauses and resumes an account', async () => {
      const source = await seedIndividual(h.accounts, 'dana');
      const ref = { kind: 'user' as const, id: source.account.id };

      await expect(h.accountsService.setActive(ref, 1, false)).resolves.toMatchObject({
        account: { isActive: false },
      });
      await expect(h.accountsService.setActive(ref, 1, true)).resolves.toMatchObject({
        account: { isActive: true },
      });
    });

    it('hides accounts of other owners', async () => {
      const source = await seedIndividual(h.accounts, 'dana');

      await expect(
        h.accountsService.setActive({ kind: 'user', id: source.account.id }, 2, false),
      ).rejects.toBeInstanceOf(RecordNotFoundError);
      expect(source.account.isActive).toBe(true);
    });
  });

  describe('remove', () => {
    it('drops the account and its candidates', async () => {
      const source = await seedIndividual(h.accounts, 'dana');
      await h.reconciliation.reconcile(source, [remoteRepo(1), remoteRepo(2)]);
      const ref = { kind: 'user' as const, id: source.account.id };

      await expect(h.accountsService.remove(ref, 1)).resolves.toEqual({ removedSelections: 2 });

      expect(await h.accounts.find(ref)).toBeNull();
      expect(await h.selections.listForAccount(ref)).toEqual([]);
    });
  });
});

describe('presentAccount', () => {
  it('never exposes an organization token', async () => {
    const h = buildHarness();
    const added = await h.accountsService.connectOrganization(1, 'acme', 'test-org-token');
    h.queue.onModuleDestroy();

    const view = presentAccount(added.source);

    expect(view).toMatchObject({ kind: 'organization', login: 'acme', hasAccessToken: true, scopes: null });
    expect(Object.keys(view)).not.toContain('accessToken');
  });

  it('leaves organization-only fields off individuals', async () => {
    const h = buildHarness();
    const source = await seedIndividual(h.accounts, 'dana');

    const view = presentAccount(source);

    expect(view.hasAccessToken).toBeUndefined();
    expect(view.login).toBe('dana');
  });
});

describe('ParseAccountKindPipe', () => {
  const pipe = new ParseAccountKindPipe();

  it('maps path segments to account kinds', () => {
    expect(pipe.transform('users')).toBe('user');
    expect(pipe.transform('organizations')).toBe('organization');
  });

  it('rejects anything else', () => {
    expect(() => pipe.transform('teams')).toThrow(BadRequestException);
    expect(() => pipe.transform('constructor')).toThrow(BadRequestException);
  });
});
