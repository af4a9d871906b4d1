import { MalformedInputError, MalformedUrlError } from '../common/errors.js';
import type { NormalizedCommit, RawCommitDetail } from './source-client.interface.js';

// host with a dot, then a path: github.com/acme/widgets
const SCHEMELESS_URL = /^[\w-]+(\.[\w-]+)+\//;

function pathnameOf(url: string): string | null {
  const candidates = SCHEMELESS_URL.test(url) ? [url, `https://${url}`] : [url];
  for (const candidate of candidates) {
    try {
      return new URL(candidate).pathname;
    } catch {
      // try the next form
    }
  }
  return null;
}

/**
 * Extracts `{ owner, repo }` from a repository URL such as
 * `https://github.com/acme/widgets.git/` or `github.com/acme/widgets`.
 */
export function parseRepositoryUrl(repoUrl: string): { owner: string; repo: string } {
  let url = repoUrl.trim().replace(/\/+$/, '');
  if (url.endsWith('.git')) url = url.slice(0, -4);

  const pathname = pathnameOf(url);
  if (pathname === null) {
    throw new MalformedUrlError(repoUrl);
  }

  const parts = pathname.split('/').filter(Boolean);
  if (parts.length < 2) {
    throw new MalformedUrlError(repoUrl);
  }

  return { owner: decodeURIComponent(parts[0]), repo: decodeURIComponent(parts[1]) };
}

function parseInstant(value: string | null | undefined, sha: string): Date {
  const date = value ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new MalformedInputError(`Commit ${sha} has an invalid author date: ${value ?? '<missing>'}`);
  }
  return date;
}

/** Turns host commit detail into the stored commit shape. */
export function parseCommit(raw: RawCommitDetail): NormalizedCommit {
  const filesAdded: string[] = [];
  const filesModified: string[] = [];
  const filesDeleted: string[] = [];
  let linesAdded = 0;
  let linesRemoved = 0;

  for (const file of raw.files) {
    linesAdded += file.additions;
    linesRemoved += file.deletions;

    if (file.status === 'added') filesAdded.push(file.filename);
    else if (file.status === 'removed') filesDeleted.push(file.filename);
    else filesModified.push(file.filename);
  }

  return {
    sha: raw.sha,
    message: raw.message,
    authorName: raw.author?.name ?? '',
    authorEmail: raw.author?.email ?? '',
    committerName: raw.committer?.name ?? '',
    committerEmail: raw.committer?.email ?? '',
    commitDate: parseInstant(raw.author?.date, raw.sha),
    linesAdded,
    linesRemoved,
    filesChanged: raw.files.length,
    filesAdded,
    filesModified,
    filesDeleted,
    parentShas: [...raw.parents],
    isMerge: raw.parents.length > 1,
  };
}
