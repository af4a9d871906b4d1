import {
  UpstreamNotFoundError,
  UpstreamRateLimitedError,
  UpstreamUnavailableError,
} from '../../common/errors.js';
import { OctokitSourceClient } from '../octokit-source.client.js';

const BASE_URL = 'https://github.test';

type Route = { status?: number; body: unknown; next?: string };

/** fetch stand-in: answers by path + query and records every URL requested. */
function fakeFetch(routes: Record<string, Route>) {
  const requested: string[] = [];

  const fetch: typeof globalThis.fetch = async (input) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const key = `${url.pathname}${url.search}`;
    requested.push(key);

    const route = routes[key];
    if (!route) {
      return new Response(JSON.stringify({ message: 'Not Found' }), {
        status: 404,
        headers: { 'content-type': 'application/json' },
      });
    }

    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (route.next) headers.link = `<${BASE_URL}${route.next}>; rel="next"`;
    return new Response(JSON.stringify(route.body), { status: route.status ?? 200, headers });
  };

  return { fetch, requested };
}

const shas = (from: number, count: number) =>
  Array.from({ length: count }, (_, i) => ({ sha: `sha-${from + i}` }));

describe('OctokitSourceClient', () => {
  it('follows next links until the last page', async () => {
    const { fetch, requested } = fakeFetch({
      '/repos/acme/widgets/commits?per_page=100': {
        body: shas(0, 100),
        next: '/repos/acme/widgets/commits?per_page=100&page=2',
      },
      '/repos/acme/widgets/commits?per_page=100&page=2': { body: shas(100, 30) },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const commits = await client.fetchCommits({ owner: 'acme', repo: 'widgets' });

    expect(commits).toHaveLength(130);
    expect(commits[129]).toEqual({ sha: 'sha-129' });
    expect(requested).toHaveLength(2);
  });

  it('stops at the page cap and truncates to it', async () => {
    const { fetch, requested } = fakeFetch({
      '/repos/acme/widgets/commits?per_page=100': {
        body: shas(0, 100),
        next: '/repos/acme/widgets/commits?per_page=100&page=2',
      },
      '/repos/acme/widgets/commits?per_page=100&page=2': {
        body: shas(100, 100),
        next: '/repos/acme/widgets/commits?per_page=100&page=3',
      },
      '/repos/acme/widgets/commits?per_page=100&page=3': { body: shas(200, 100) },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch, pageCap: 150 });

    const commits = await client.fetchCommits({ owner: 'acme', repo: 'widgets' });

    expect(commits).toHaveLength(150);
    expect(requested).toHaveLength(2);
  });

  it('stops on an empty page even when a next link is present', async () => {
    const { fetch, requested } = fakeFetch({
      '/users/dana/repos?sort=updated&direction=desc&per_page=100': {
        body: [],
        next: '/users/dana/repos?page=2',
      },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    await expect(client.listAccountRepositories({ kind: 'user', login: 'dana' })).resolves.toEqual([]);
    expect(requested).toHaveLength(1);
  });

  it('passes since as an ISO timestamp', async () => {
    const { fetch, requested } = fakeFetch({
      '/repos/acme/widgets/commits?per_page=100&since=2024-01-01T00%3A00%3A00.000Z': { body: shas(0, 1) },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const commits = await client.fetchCommits({
      owner: 'acme',
      repo: 'widgets',
      since: new Date('2024-01-01T00:00:00Z'),
    });

    expect(commits).toEqual([{ sha: 'sha-0' }]);
    expect(requested).toEqual(['/repos/acme/widgets/commits?per_page=100&since=2024-01-01T00%3A00%3A00.000Z']);
  });

  it('maps repository payloads', async () => {
    const { fetch } = fakeFetch({
      '/repos/acme/widgets': {
        body: {
          id: 42,
          name: 'widgets',
          full_name: 'acme/widgets',
          description: null,
          html_url: 'https://github.com/acme/widgets',
          clone_url: 'https://github.com/acme/widgets.git',
          default_branch: 'trunk',
          private: true,
          fork: false,
          archived: false,
          stargazers_count: 5,
          watchers_count: 5,
          forks_count: 1,
          size: 120,
          language: 'Go',
        },
      },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const repo = await client.fetchRepoInfo({ owner: 'acme', repo: 'widgets' });

    expect(repo).toEqual({
      id: 42,
      name: 'widgets',
      fullName: 'acme/widgets',
      description: null,
      htmlUrl: 'https://github.com/acme/widgets',
      cloneUrl: 'https://github.com/acme/widgets.git',
      defaultBranch: 'trunk',
      isPrivate: true,
      isFork: false,
      isArchived: false,
      stargazersCount: 5,
      watchersCount: 5,
      forksCount: 1,
      size: 120,
      language: 'Go',
    });
  });

  it('maps 404 to UpstreamNotFoundError', async () => {
    const { fetch } = fakeFetch({});
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    await expect(client.fetchRepoInfo({ owner: 'acme', repo: 'gone' })).rejects.toBeInstanceOf(
      UpstreamNotFoundError,
    );
  });

  it('maps 403 to a retryable rate limit error', async () => {
    const { fetch } = fakeFetch({
      '/repos/acme/widgets': { status: 403, body: { message: 'API rate limit exceeded' } },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const error = await client.fetchRepoInfo({ owner: 'acme', repo: 'widgets' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamRateLimitedError);
    expect(error).toMatchObject({ retryable: true });
  });

  it('maps 5xx to a retryable unavailable error and other 4xx to a final one', async () => {
    const { fetch } = fakeFetch({
      '/repos/acme/down': { status: 502, body: { message: 'Bad Gateway' } },
      '/repos/acme/bad': { status: 422, body: { message: 'Unprocessable' } },
    });
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const down = await client.fetchRepoInfo({ owner: 'acme', repo: 'down' }).catch((e: unknown) => e);
    const bad = await client.fetchRepoInfo({ owner: 'acme', repo: 'bad' }).catch((e: unknown) => e);

    expect(down).toBeInstanceOf(UpstreamUnavailableError);
    expect(down).toMatchObject({ retryable: true, status: 502 });
    expect(bad).toBeInstanceOf(UpstreamUnavailableError);
    expect(bad).toMatchObject({ retryable: false, status: 422 });
  });

  it('maps transport failures to a retryable unavailable error', async () => {
    const fetch: typeof globalThis.fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const client = new OctokitSourceClient({ baseUrl: BASE_URL, fetch });

    const error = await client.fetchCommitDetail({ owner: 'acme', repo: 'widgets', sha: 'abc' }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toMatchObject({ retryable: true });
  });
});
