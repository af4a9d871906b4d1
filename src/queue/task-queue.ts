import { Logger } from '@nestjs/common';
import { JobTimeoutError, errorMessage } from '../common/errors.js';
import type { AccountRef } from '../accounts/account.types.js';
import type { ReconcileResult } from '../selection/reconciliation.service.js';
import type { CleanupResult, OrphanCleanupResult } from '../selection/selection.service.js';
import type { SyncRunResult } from '../sync/sync-job.service.js';
import type { BulkSyncItemResult } from '../sync/bulk-sync.service.js';
import type { PeriodicRefreshSummary } from '../sync/account-refresh.service.js';

/** Payload and result of every job the backend runs in the background. */
export interface JobTypes {
  'sync-repository': { payload: { repositoryId: number }; result: SyncRunResult };
  'refresh-account': { payload: AccountRef; result: ReconcileResult };
  'bulk-sync': { payload: { repositoryIds: number[]; ownerId: number }; result: BulkSyncItemResult[] };
  'periodic-refresh': { payload: Record<string, never>; result: PeriodicRefreshSummary };
  'cleanup-deselected': { payload: { ownerId: number }; result: CleanupResult };
  'cleanup-orphaned': { payload: Record<string, never>; result: OrphanCleanupResult };
}

export type JobName = keyof JobTypes;
export type JobPayload<N extends JobName> = JobTypes[N]['payload'];
export type JobResult<N extends JobName> = JobTypes[N]['result'];

export const SYNC_LANE = 'repository-sync';
export const ORCHESTRATION_LANE = 'orchestration';
export type QueueLane = typeof SYNC_LANE | typeof ORCHESTRATION_LANE;

/**
 * Jobs that wait on other jobs run in their own lane, so they never hold
 * the workers their children need.
 */
export const JOB_LANES: { readonly [N in JobName]: QueueLane } = {
  'sync-repository': SYNC_LANE,
  'refresh-account': SYNC_LANE,
  'cleanup-deselected': SYNC_LANE,
  'cleanup-orphaned': SYNC_LANE,
  'bulk-sync': ORCHESTRATION_LANE,
  'periodic-refresh': ORCHESTRATION_LANE,
};

export function isJobName(value: string): value is JobName {
  return Object.hasOwn(JOB_LANES, value);
}

/** Task ids carry their lane: `repository-sync:42`. */
export function taskId(lane: QueueLane, jobId: string | number): string {
  return `${lane}:${jobId}`;
}

export function parseTaskId(id: string): { lane: QueueLane; jobId: string } | null {
  const separator = id.lastIndexOf(':');
  if (separator < 0) return null;
  const lane = id.slice(0, separator);
  const jobId = id.slice(separator + 1);
  if (jobId === '') return null;
  if (lane === SYNC_LANE || lane === ORCHESTRATION_LANE) return { lane, jobId };
  return null;
}

/** Progress is kept within 0..100 and never goes backwards. */
export function clampProgress(current: number, percent: number): number {
  return Math.max(current, Math.min(100, Math.max(0, Math.round(percent))));
}

export interface JobContext {
  /** Stable across redeliveries of the same job. */
  jobId: string;
  /** Aborted when the job is revoked while running. */
  signal: AbortSignal;
  reportProgress(percent: number, message?: string): void;
}

export type JobHandler<N extends JobName> = (payload: JobPayload<N>, ctx: JobContext) => Promise<JobResult<N>>;
export type JobHandlers = { [N in JobName]: JobHandler<N> };

export interface JobHandle<N extends JobName> {
  id: string;
  name: N;
}

export type JobState = 'queued' | 'running' | 'succeeded' | 'failed' | 'revoked';

export interface JobSnapshot {
  id: string;
  name: JobName;
  state: JobState;
  progress: number;
  message: string | null;
  result: unknown;
  error: string | null;
  enqueuedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export type EnqueueAttempt<N extends JobName> =
  | { scheduled: true; handle: JobHandle<N> }
  | { scheduled: false; reason: string };

export abstract class TaskQueue {
  protected readonly logger = new Logger(TaskQueue.name);

  abstract register<N extends JobName>(name: N, handler: JobHandlers[N]): void;

  /** Rejects with QueueUnavailableError when the job cannot be accepted. */
  abstract enqueue<N extends JobName>(name: N, payload: JobPayload<N>): Promise<JobHandle<N>>;

  abstract status(id: string): Promise<JobSnapshot | null>;

  /** Best effort: queued jobs never start, running jobs see their signal aborted. */
  abstract revoke(id: string): Promise<boolean>;

  /** Resolves with the job result or rejects with its error. */
  protected abstract settled<N extends JobName>(handle: JobHandle<N>): Promise<JobResult<N>>;

  /** Enqueue without throwing; the caller decides how to degrade. */
  async tryEnqueue<N extends JobName>(name: N, payload: JobPayload<N>): Promise<EnqueueAttempt<N>> {
    try {
      return { scheduled: true, handle: await this.enqueue(name, payload) };
    } catch (error: unknown) {
      const reason = errorMessage(error);
      this.logger.warn(`Could not enqueue ${name}: ${reason}`);
      return { scheduled: false, reason };
    }
  }

  /**
   * Resolves with the job result or rejects with its error. After `timeoutMs`
   * rejects with JobTimeoutError; the job itself keeps running.
   */
  async waitFor<N extends JobName>(handle: JobHandle<N>, timeoutMs: number): Promise<JobResult<N>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new JobTimeoutError(handle.id, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([this.settled(handle), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
