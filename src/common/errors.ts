// Error taxonomy shared by the source client, the sync pipeline and the HTTP layer.

export type SyncErrorCode =
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_RATE_LIMITED'
  | 'UPSTREAM_NOT_FOUND'
  | 'MALFORMED_URL'
  | 'MALFORMED_INPUT'
  | 'OWNERSHIP_MISMATCH'
  | 'PERSISTENCE_CONFLICT'
  | 'RECORD_NOT_FOUND'
  | 'ACCOUNT_ALREADY_MONITORED'
  | 'SYNC_IN_PROGRESS'
  | 'JOB_TIMEOUT'
  | 'JOB_REVOKED'
  | 'QUEUE_UNAVAILABLE';

/**
 * Base class for every error raised by the core.
 *
 * `retryable` tells the sync retry policy whether another attempt can succeed.
 */
export class SyncError extends Error {
  public readonly code: SyncErrorCode;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, code: SyncErrorCode, retryable = false, cause?: Error) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.retryable = retryable;
    this.cause = cause;

    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class UpstreamUnavailableError extends SyncError {
  public readonly status?: number;

  constructor(message: string, status?: number, cause?: Error) {
    // 4xx answers other than the ones mapped elsewhere won't change on retry
    const retryable = status === undefined || status >= 500;
    super(message, 'UPSTREAM_UNAVAILABLE', retryable, cause);
    this.name = 'UpstreamUnavailableError';
    this.status = status;
  }
}

export class UpstreamRateLimitedError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(
      `${message}. Configure a GitHub token with a higher rate limit.`,
      'UPSTREAM_RATE_LIMITED',
      true,
      cause,
    );
    this.name = 'UpstreamRateLimitedError';
  }
}

export class UpstreamNotFoundError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'UPSTREAM_NOT_FOUND', false, cause);
    this.name = 'UpstreamNotFoundError';
  }
}

export class MalformedUrlError extends SyncError {
  constructor(url: string) {
    super(`Invalid repository URL: ${url}`, 'MALFORMED_URL');
    this.name = 'MalformedUrlError';
  }
}

export class MalformedInputError extends SyncError {
  constructor(message: string) {
    super(message, 'MALFORMED_INPUT');
    this.name = 'MalformedInputError';
  }
}

export class OwnershipMismatchError extends SyncError {
  public readonly foreignIds: number[];

  constructor(foreignIds: number[]) {
    super(
      `Some repositories not found or not owned by user: ${foreignIds.join(', ')}`,
      'OWNERSHIP_MISMATCH',
    );
    this.name = 'OwnershipMismatchError';
    this.foreignIds = foreignIds;
  }
}

/** Unique-key violation. Callers treat it as "already there". */
export class PersistenceConflictError extends SyncError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_CONFLICT', false, cause);
    this.name = 'PersistenceConflictError';
  }
}

export class RecordNotFoundError extends SyncError {
  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, 'RECORD_NOT_FOUND');
    this.name = 'RecordNotFoundError';
  }
}

export class AccountAlreadyMonitoredError extends SyncError {
  constructor(login: string) {
    super(`GitHub account ${login} is already being monitored`, 'ACCOUNT_ALREADY_MONITORED');
    this.name = 'AccountAlreadyMonitoredError';
  }
}

export class SyncInProgressError extends SyncError {
  constructor(repositoryId: number) {
    super(`Repository ${repositoryId} is already syncing`, 'SYNC_IN_PROGRESS');
    this.name = 'SyncInProgressError';
  }
}

export class JobTimeoutError extends SyncError {
  constructor(jobId: string, timeoutMs: number) {
    super(`Job ${jobId} did not finish within ${timeoutMs}ms`, 'JOB_TIMEOUT');
    this.name = 'JobTimeoutError';
  }
}

export class JobRevokedError extends SyncError {
  constructor(jobId: string) {
    super(`Job ${jobId} was revoked`, 'JOB_REVOKED');
    this.name = 'JobRevokedError';
  }
}

export class QueueUnavailableError extends SyncError {
  constructor(message: string) {
    super(message, 'QUEUE_UNAVAILABLE');
    this.name = 'QueueUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
