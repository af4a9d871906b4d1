import { MalformedInputError, MalformedUrlError } from '../../common/errors.js';
import { parseCommit, parseRepositoryUrl } from '../parsers.js';
import type { RawCommitDetail } from '../source-client.interface.js';

const detail = (overrides: Partial<RawCommitDetail> = {}): RawCommitDetail => ({
  sha: 'abc123',
  message: 'Fix the widget',
  author: { name: 'Ada', email: 'ada@example.com', date: '2024-05-01T12:30:00Z' },
  committer: { name: 'Bot', email: 'bot@example.com', date: '2024-05-01T12:31:00Z' },
  parents: ['p1'],
  files: [],
  ...overrides,
});

describe('parseRepositoryUrl', () => {
  it('strips a trailing .git and slash', () => {
    expect(parseRepositoryUrl('https://github.com/acme/widgets.git/')).toEqual({
      owner: 'acme',
      repo: 'widgets',
    });
  });

  it('ignores extra path segments after owner and repo', () => {
    expect(parseRepositoryUrl('https://github.com/acme/widgets/tree/main')).toEqual({
      owner: 'acme',
      repo: 'widgets',
    });
  });

  it('accepts a URL written without a scheme', () => {
    expect(parseRepositoryUrl('github.com/acme/widgets')).toEqual({ owner: 'acme', repo: 'widgets' });
    expect(parseRepositoryUrl('github.com/acme/widgets.git')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it('rejects text that is not a URL', () => {
    expect(() => parseRepositoryUrl('not-a-url')).toThrow(MalformedUrlError);
    expect(() => parseRepositoryUrl('not-a-url')).toThrow('Invalid repository URL: not-a-url');
  });

  it('rejects a URL without a repository segment', () => {
    expect(() => parseRepositoryUrl('https://github.com/acme')).toThrow(MalformedUrlError);
  });
});

describe('parseCommit', () => {
  it('flags a commit with two parents as a merge', () => {
    expect(parseCommit(detail({ parents: ['p1', 'p2'] })).isMerge).toBe(true);
  });

  it('does not flag root or single-parent commits as merges', () => {
    expect(parseCommit(detail({ parents: [] })).isMerge).toBe(false);
    expect(parseCommit(detail({ parents: ['p1'] })).isMerge).toBe(false);
  });

  it('sums line counts and classifies files by status', () => {
    const commit = parseCommit(
      detail({
        files: [
          { filename: 'a.ts', status: 'added', additions: 10, deletions: 0 },
          { filename: 'b.ts', status: 'removed', additions: 0, deletions: 7 },
          { filename: 'c.ts', status: 'modified', additions: 2, deletions: 2 },
          { filename: 'd.ts', status: 'renamed', additions: 1, deletions: 0 },
        ],
      }),
    );

    expect(commit.linesAdded).toBe(13);
    expect(commit.linesRemoved).toBe(9);
    expect(commit.filesChanged).toBe(4);
    expect(commit.filesAdded).toEqual(['a.ts']);
    expect(commit.filesDeleted).toEqual(['b.ts']);
    expect(commit.filesModified).toEqual(['c.ts', 'd.ts']);
  });

  it('reads the author date as UTC', () => {
    expect(parseCommit(detail()).commitDate.toISOString()).toBe('2024-05-01T12:30:00.000Z');
  });

  it('fails on a missing author date', () => {
    expect(() => parseCommit(detail({ author: { name: 'Ada', email: null, date: null } }))).toThrow(
      MalformedInputError,
    );
  });

  it('fills missing identities with empty strings', () => {
    const commit = parseCommit(
      detail({
        author: { name: null, email: null, date: '2024-05-01T00:00:00Z' },
        committer: null,
      }),
    );
    expect(commit.authorEmail).toBe('');
    expect(commit.committerName).toBe('');
  });
});
