import { Inject, Injectable } from '@nestjs/common';
import type { OnModuleDestroy } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bull';
import type { DoneCallback, Job, JobStatus, Queue } from 'bull';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { JobRevokedError, QueueUnavailableError, RecordNotFoundError, errorMessage } from '../common/errors.js';
import {
  JOB_LANES,
  ORCHESTRATION_LANE,
  SYNC_LANE,
  TaskQueue,
  clampProgress,
  isJobName,
  parseTaskId,
  taskId,
} from './task-queue.js';
import type {
  JobContext,
  JobHandle,
  JobHandler,
  JobHandlers,
  JobName,
  JobPayload,
  JobResult,
  JobSnapshot,
  JobState,
  QueueLane,
} from './task-queue.js';

interface StoredProgress {
  percent: number;
  message: string | null;
}

function isStoredProgress(value: unknown): value is StoredProgress {
  return typeof value === 'object' && value !== null && 'percent' in value && typeof value.percent === 'number';
}

function messageOf(progress: StoredProgress): string | null {
  return 'message' in progress && typeof progress.message === 'string' ? progress.message : null;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

type HandlerSlots = { [N in JobName]?: JobHandler<N> };

const FINISHED_JOBS_KEPT = 500;

/**
 * Task queue on Redis through Bull. Each lane is its own Bull queue with
 * `QUEUE_CONCURRENCY` workers in this process; any API instance can enqueue,
 * inspect or revoke a job. A job whose worker dies is redelivered with the
 * same id once Bull marks it stalled.
 */
@Injectable()
export class BullTaskQueue extends TaskQueue implements OnModuleDestroy {
  private readonly handlers: HandlerSlots = {};
  private readonly lanes: Record<QueueLane, Queue>;
  private readonly workers = new Set<QueueLane>();
  /** Jobs running in this process, so revoke can reach their signal. */
  private readonly running = new Map<string, AbortController>();
  private readonly concurrency: number;
  private closing = false;

  constructor(
    @InjectQueue(SYNC_LANE) syncQueue: Queue,
    @InjectQueue(ORCHESTRATION_LANE) orchestrationQueue: Queue,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    super();
    this.lanes = { [SYNC_LANE]: syncQueue, [ORCHESTRATION_LANE]: orchestrationQueue };
    this.concurrency = config.queue.concurrency;
  }

  register<N extends JobName>(name: N, handler: JobHandlers[N]): void {
    this.handlers[name] = handler;
    const lane = JOB_LANES[name];
    this.logger.log(`Registered handler for ${name} on ${lane}`);
    if (this.workers.has(lane)) return;

    this.workers.add(lane);
    this.lanes[lane]
      .process('*', this.concurrency, (job: Job, done: DoneCallback) => {
        // both branches hand the outcome to Bull
        void this.process(job).then(
          (result) => done(null, result),
          (error: unknown) => done(toError(error)),
        );
      })
      .catch((error: unknown) => this.logger.error(`Workers of ${lane} stopped: ${errorMessage(error)}`));
  }

  async enqueue<N extends JobName>(name: N, payload: JobPayload<N>): Promise<JobHandle<N>> {
    if (this.closing) throw new QueueUnavailableError('Task queue is shutting down');

    const lane = JOB_LANES[name];
    try {
      const job = await this.lanes[lane].add(name, payload, {
        removeOnComplete: FINISHED_JOBS_KEPT,
        removeOnFail: FINISHED_JOBS_KEPT,
      });
      return { id: taskId(lane, job.id), name };
    } catch (error: unknown) {
      throw new QueueUnavailableError(`Could not queue ${name}: ${errorMessage(error)}`);
    }
  }

  async status(id: string): Promise<JobSnapshot | null> {
    const job = await this.find(id);
    if (!job || !isJobName(job.name)) return null;

    const state = await job.getState();
    const progress: unknown = job.progress();
    const stored = isStoredProgress(progress) ? progress : null;

    return {
      id,
      name: job.name,
      state: this.stateOf(id, state, job.failedReason),
      progress: stored?.percent ?? 0,
      message: stored ? messageOf(stored) : null,
      result: job.returnvalue ?? null,
      error: job.failedReason ?? null,
      enqueuedAt: new Date(job.timestamp),
      startedAt: job.processedOn ? new Date(job.processedOn) : null,
      finishedAt: job.finishedOn ? new Date(job.finishedOn) : null,
    };
  }

  async revoke(id: string): Promise<boolean> {
    const job = await this.find(id);
    if (!job) return false;

    const state = await job.getState();
    if (state === 'waiting' || state === 'delayed' || state === 'paused') {
      await job.remove();
      this.logger.log(`Removed queued task ${id}`);
      return true;
    }

    const controller = this.running.get(id);
    if (state === 'active' && controller) {
      job.discard();
      controller.abort();
      return true;
    }
    // running on another instance, or already finished
    return false;
  }

  onModuleDestroy(): void {
    // queues are closed by BullModule; running jobs finish or are redelivered
    this.closing = true;
  }

  protected async settled<N extends JobName>(handle: JobHandle<N>): Promise<JobResult<N>> {
    const job = await this.find(handle.id);
    if (!job) throw new RecordNotFoundError('Task', handle.id);
    return job.finished();
  }

  private async find(id: string): Promise<Job | null> {
    const parsed = parseTaskId(id);
    if (!parsed) return null;
    return this.lanes[parsed.lane].getJob(parsed.jobId);
  }

  private async process(job: Job): Promise<unknown> {
    const name = job.name;
    if (!isJobName(name)) throw new Error(`No worker registered for ${name}`);

    const id = taskId(JOB_LANES[name], job.id);
    const controller = new AbortController();
    let percent = 0;
    let message: string | null = null;
    const ctx: JobContext = {
      jobId: id,
      signal: controller.signal,
      reportProgress: (value, text) => {
        percent = clampProgress(percent, value);
        if (text !== undefined) message = text;
        job
          .progress({ percent, message })
          .catch((error: unknown) => this.logger.warn(`Could not record progress of ${id}: ${errorMessage(error)}`));
      },
    };

    this.running.set(id, controller);
    try {
      const result = await this.run(name, job.data, ctx);
      if (controller.signal.aborted) throw new JobRevokedError(id);
      await job.progress({ percent: 100, message });
      return result;
    } catch (error: unknown) {
      if (controller.signal.aborted) throw new JobRevokedError(id);
      this.logger.warn(`Job ${name} ${id} failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.running.delete(id);
    }
  }

  private async run<N extends JobName>(name: N, payload: JobPayload<N>, ctx: JobContext): Promise<JobResult<N>> {
    const handler = this.handlers[name];
    if (!handler) throw new Error(`No worker registered for ${name}`);
    return handler(payload, ctx);
  }

  private stateOf(id: string, state: JobStatus | 'stuck', failedReason: string | undefined): JobState {
    switch (state) {
      case 'active':
        return 'running';
      case 'completed':
        return 'succeeded';
      case 'failed':
        return failedReason === new JobRevokedError(id).message ? 'revoked' : 'failed';
      default:
        return 'queued';
    }
  }
}
