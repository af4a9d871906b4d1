import { Inject, Injectable } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { JobRevokedError, QueueUnavailableError } from '../common/errors.js';
import { JOB_LANES, ORCHESTRATION_LANE, SYNC_LANE, TaskQueue, clampProgress, taskId } from './task-queue.js';
import type {
  JobContext,
  JobHandle,
  JobHandler,
  JobHandlers,
  JobName,
  JobPayload,
  JobResult,
  JobSnapshot,
  QueueLane,
} from './task-queue.js';

type JobOutcome<R> = { ok: true; result: R } | { ok: false; error: Error };

interface QueuedJob {
  snapshot: JobSnapshot;
  controller: AbortController;
  run(): Promise<void>;
  cancel(error: Error): void;
}

interface Lane {
  waiting: QueuedJob[];
  running: number;
  nextId: number;
}

type HandlerSlots = { [N in JobName]?: JobHandler<N> };
type OutcomeSlots = { [N in JobName]: Map<string, Promise<JobOutcome<JobResult<N>>>> };

const FINISHED_JOBS_KEPT = 500;

/**
 * Worker pool inside the current process with the same lanes as the Redis
 * queue. Jobs are lost on restart; tests and single-process tools use it.
 */
@Injectable()
export class InProcessTaskQueue extends TaskQueue implements OnModuleDestroy {
  private readonly handlers: HandlerSlots = {};
  private readonly jobs = new Map<string, QueuedJob>();
  private readonly outcomes: OutcomeSlots = {
    'sync-repository': new Map(),
    'refresh-account': new Map(),
    'cleanup-deselected': new Map(),
    'cleanup-orphaned': new Map(),
    'bulk-sync': new Map(),
    'periodic-refresh': new Map(),
  };
  private readonly lanes: Record<QueueLane, Lane> = {
    [SYNC_LANE]: { waiting: [], running: 0, nextId: 1 },
    [ORCHESTRATION_LANE]: { waiting: [], running: 0, nextId: 1 },
  };
  private readonly finished: string[] = [];
  private readonly concurrency: number;
  private closed = false;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    super();
    this.concurrency = config.queue.concurrency;
  }

  register<N extends JobName>(name: N, handler: JobHandlers[N]): void {
    this.handlers[name] = handler;
    this.logger.log(`Registered handler for ${name}`);
  }

  async enqueue<N extends JobName>(name: N, payload: JobPayload<N>): Promise<JobHandle<N>> {
    if (this.closed) throw new QueueUnavailableError('Task queue is shutting down');
    const handler = this.handlers[name];
    if (!handler) throw new QueueUnavailableError(`No worker registered for ${name}`);

    const lane = this.lanes[JOB_LANES[name]];
    const id = taskId(JOB_LANES[name], lane.nextId++);
    const controller = new AbortController();
    const snapshot: JobSnapshot = {
      id,
      name,
      state: 'queued',
      progress: 0,
      message: null,
      result: null,
      error: null,
      enqueuedAt: new Date(),
      startedAt: null,
      finishedAt: null,
    };
    const ctx: JobContext = {
      jobId: id,
      signal: controller.signal,
      reportProgress: (percent, message) => this.progress(snapshot, percent, message),
    };

    let settle: (outcome: JobOutcome<JobResult<N>>) => void = () => undefined;
    const outcome = new Promise<JobOutcome<JobResult<N>>>((resolve) => {
      settle = resolve;
    });

    const job: QueuedJob = {
      snapshot,
      controller,
      run: async () => {
        snapshot.state = 'running';
        snapshot.startedAt = new Date();
        try {
          const result = await handler(payload, ctx);
          if (controller.signal.aborted) throw new JobRevokedError(id);
          snapshot.state = 'succeeded';
          snapshot.progress = 100;
          snapshot.result = result;
          settle({ ok: true, result });
        } catch (caught: unknown) {
          const error = controller.signal.aborted
            ? new JobRevokedError(id)
            : caught instanceof Error
              ? caught
              : new Error(String(caught));
          snapshot.state = controller.signal.aborted ? 'revoked' : 'failed';
          snapshot.error = error.message;
          this.logger.warn(`Job ${name} ${id} ${snapshot.state}: ${error.message}`);
          settle({ ok: false, error });
        } finally {
          this.markFinished(snapshot);
        }
      },
      cancel: (error) => {
        snapshot.state = 'revoked';
        snapshot.error = error.message;
        this.markFinished(snapshot);
        settle({ ok: false, error });
      },
    };

    this.jobs.set(id, job);
    this.outcomes[name].set(id, outcome);
    lane.waiting.push(job);
    this.drain(lane);

    return { id, name };
  }

  async status(id: string): Promise<JobSnapshot | null> {
    const job = this.jobs.get(id);
    return job ? { ...job.snapshot } : null;
  }

  async revoke(id: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job) return false;

    if (job.snapshot.state === 'queued') {
      const { waiting } = this.lanes[JOB_LANES[job.snapshot.name]];
      waiting.splice(waiting.indexOf(job), 1);
      job.cancel(new JobRevokedError(id));
      return true;
    }
    if (job.snapshot.state === 'running') {
      job.controller.abort();
      return true;
    }
    return false;
  }

  onModuleDestroy(): void {
    this.closed = true;
    for (const lane of Object.values(this.lanes)) {
      for (const job of lane.waiting.splice(0)) job.cancel(new JobRevokedError(job.snapshot.id));
    }
    for (const job of this.jobs.values()) {
      if (job.snapshot.state === 'running') job.controller.abort();
    }
  }

  protected async settled<N extends JobName>(handle: JobHandle<N>): Promise<JobResult<N>> {
    const pending = this.outcomes[handle.name].get(handle.id);
    if (!pending) throw new QueueUnavailableError(`Task ${handle.id} is no longer tracked`);

    const outcome = await pending;
    if (!outcome.ok) throw outcome.error;
    return outcome.result;
  }

  private drain(lane: Lane): void {
    while (lane.running < this.concurrency && lane.waiting.length > 0) {
      const job = lane.waiting.shift();
      if (!job) break;
      lane.running++;
      // run() settles the job's outcome itself and never rejects
      void job.run().finally(() => {
        lane.running--;
        this.drain(lane);
      });
    }
  }

  private progress(snapshot: JobSnapshot, percent: number, message?: string): void {
    if (snapshot.state !== 'running') return;
    snapshot.progress = clampProgress(snapshot.progress, percent);
    if (message !== undefined) snapshot.message = message;
  }

  private markFinished(snapshot: JobSnapshot): void {
    snapshot.finishedAt = new Date();
    this.finished.push(snapshot.id);
    while (this.finished.length > FINISHED_JOBS_KEPT) {
      const oldest = this.finished.shift();
      const job = oldest ? this.jobs.get(oldest) : undefined;
      if (!oldest || !job) continue;
      this.jobs.delete(oldest);
      this.outcomes[job.snapshot.name].delete(oldest);
    }
  }
}
