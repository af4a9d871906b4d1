import 'dotenv/config';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface ApiKeyEntry {
  userId: number;
  isAdmin: boolean;
}

export interface SyncConfig {
  /** Total ingestion attempts per sync job, first run included. */
  maxAttempts: number;
  retryBackoffMs: number;
  commitBatchSize: number;
  bulkChunkSize: number;
  bulkItemTimeoutMs: number;
  refreshItemTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  isProduction: boolean;
  databaseUrl?: string;
  github: {
    token?: string;
    apiUrl: string;
    pageCap: number;
  };
  auth: {
    apiKeys: Map<string, ApiKeyEntry>;
    devUserId: number;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    /** Key prefix shared by every Bull queue of the backend. */
    prefix: string;
  };
  queue: {
    /** Workers per lane in this process. */
    concurrency: number;
  };
  sync: SyncConfig;
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/** Parses `key:userId[:admin]` entries separated by commas. */
export function parseApiKeys(raw: string | undefined): Map<string, ApiKeyEntry> {
  const keys = new Map<string, ApiKeyEntry>();

  for (const entry of (raw ?? '').split(',').map((s) => s.trim()).filter(Boolean)) {
    const [key, userId, role] = entry.split(':');
    const id = Number(userId);
    if (!key || !Number.isInteger(id) || id <= 0) {
      throw new Error(`API_KEYS entry "${entry}" must look like key:userId[:admin]`);
    }
    keys.set(key, { userId: id, isAdmin: role === 'admin' });
  }

  return keys;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    port: intFrom(env, 'PORT', 3000, 1),
    isProduction: env.NODE_ENV === 'production',
    databaseUrl: env.DATABASE_URL || undefined,
    github: {
      token: env.GITHUB_TOKEN || undefined,
      apiUrl: env.GITHUB_API_URL || 'https://api.github.com',
      pageCap: intFrom(env, 'SOURCE_PAGE_CAP', 1000, 1),
    },
    auth: {
      apiKeys: parseApiKeys(env.API_KEYS),
      devUserId: intFrom(env, 'DEV_USER_ID', 1, 1),
    },
    redis: {
      host: env.REDIS_HOST || 'localhost',
      port: intFrom(env, 'REDIS_PORT', 6379, 1),
      password: env.REDIS_PASSWORD || undefined,
      prefix: env.QUEUE_PREFIX || 'repo-pulse',
    },
    queue: {
      concurrency: intFrom(env, 'QUEUE_CONCURRENCY', 8, 1),
    },
    sync: {
      maxAttempts: intFrom(env, 'SYNC_MAX_ATTEMPTS', 3, 1),
      retryBackoffMs: intFrom(env, 'SYNC_RETRY_BACKOFF_MS', 60_000),
      commitBatchSize: intFrom(env, 'SYNC_COMMIT_BATCH_SIZE', 50, 1),
      bulkChunkSize: intFrom(env, 'BULK_SYNC_CHUNK_SIZE', 5, 1),
      bulkItemTimeoutMs: intFrom(env, 'BULK_SYNC_ITEM_TIMEOUT_MS', 300_000, 1),
      refreshItemTimeoutMs: intFrom(env, 'REFRESH_ITEM_TIMEOUT_MS', 180_000, 1),
    },
  };
}
