import type { JobOptions, JobStatus, Queue } from 'bull';
import { JobRevokedError, QueueUnavailableError } from '../../common/errors.js';
import { testConfig } from '../../__tests__/support/fakes.js';
import { BullTaskQueue } from '../bull-task-queue.js';

type Done = (error: Error | null, result?: unknown) => void;

class FakeJob {
  state: JobStatus = 'waiting';
  readonly timestamp = Date.parse('2024-05-01T12:00:00Z');
  processedOn?: number;
  finishedOn?: number;
  failedReason?: string;
  returnvalue: unknown = null;
  discarded = false;
  private stored: unknown = 0;
  private resolveFinished: (value: unknown) => void = () => undefined;
  private rejectFinished: (error: Error) => void = () => undefined;
  private readonly outcome = new Promise<unknown>((resolve, reject) => {
    this.resolveFinished = resolve;
    this.rejectFinished = reject;
  });

  constructor(
    readonly id: number,
    readonly name: string,
    readonly data: unknown,
    private readonly lane: FakeLane,
  ) {
    // only some tests wait for the outcome
    this.outcome.catch(() => undefined);
  }

  progress(value?: unknown): unknown {
    if (value === undefined) return this.stored;
    this.stored = value;
    return Promise.resolve();
  }

  async getState(): Promise<JobStatus> {
    return this.state;
  }

  finished(): Promise<unknown> {
    return this.outcome;
  }

  async remove(): Promise<void> {
    this.lane.jobs.delete(String(this.id));
  }

  discard(): void {
    this.discarded = true;
  }

  settle(error: Error | null, result: unknown): void {
    this.finishedOn = Date.parse('2024-05-01T12:00:05Z');
    if (error) {
      this.state = 'failed';
      this.failedReason = error.message;
      this.rejectFinished(error);
    } else {
      this.state = 'completed';
      this.returnvalue = result;
      this.resolveFinished(result);
    }
  }
}

/** The slice of a Bull queue the adapter talks to, kept in memory. */
class FakeLane {
  readonly jobs = new Map<string, FakeJob>();
  readonly added: Array<{ name: string; data: unknown; opts: JobOptions }> = [];
  readonly workers: Array<{ name: string; concurrency: number }> = [];
  unreachable = false;
  private worker: ((job: FakeJob, done: Done) => void) | null = null;
  private nextId = 1;

  async add(name: string, data: unknown, opts: JobOptions): Promise<FakeJob> {
    if (this.unreachable) throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    const job = new FakeJob(this.nextId++, name, data, this);
    this.jobs.set(String(job.id), job);
    this.added.push({ name, data, opts });
    return job;
  }

  async getJob(id: string): Promise<FakeJob | null> {
    return this.jobs.get(id) ?? null;
  }

  process(name: string, concurrency: number, worker: (job: FakeJob, done: Done) => void): Promise<void> {
    this.workers.push({ name, concurrency });
    this.worker = worker;
    return new Promise<void>(() => undefined);
  }

  /** Hands a stored job to the worker and resolves once it calls back. */
  deliver(id: string): Promise<Error | null> {
    const job = this.jobs.get(id);
    const worker = this.worker;
    if (!job || !worker) throw new Error(`Nothing to deliver ${id} to`);
    job.state = 'active';
    job.processedOn = Date.parse('2024-05-01T12:00:01Z');
    return new Promise((resolve) => {
      worker(job, (error, result) => {
        job.settle(error, result);
        resolve(error);
      });
    });
  }
}

describe('BullTaskQueue', () => {
  let sync: FakeLane;
  let orchestration: FakeLane;
  let queue: BullTaskQueue;

  beforeEach(() => {
    sync = new FakeLane();
    orchestration = new FakeLane();
    queue = new BullTaskQueue(
      sync as unknown as Queue,
      orchestration as unknown as Queue,
      testConfig({ QUEUE_CONCURRENCY: '3' }),
    );
  });

  it('adds a job to the queue of its lane', async () => {
    const handle = await queue.enqueue('bulk-sync', { repositoryIds: [4], ownerId: 1 });

    expect(handle).toEqual({ id: 'orchestration:1', name: 'bulk-sync' });
    expect(orchestration.added).toEqual([
      {
        name: 'bulk-sync',
        data: { repositoryIds: [4], ownerId: 1 },
        opts: { removeOnComplete: 500, removeOnFail: 500 },
      },
    ]);
    expect(sync.added).toEqual([]);
  });

  it('starts one wildcard worker per lane with the configured concurrency', () => {
    queue.register('sync-repository', async ({ repositoryId }) => ({
      repositoryId,
      attempts: 1,
      processedCount: 0,
      listedCount: 0,
      skippedCount: 0,
    }));
    queue.register('cleanup-deselected', async () => ({ deactivatedCount: 0 }));

    expect(sync.workers).toEqual([{ name: '*', concurrency: 3 }]);
    expect(orchestration.workers).toEqual([]);
  });

  it('runs the handler and records progress and result', async () => {
    queue.register('cleanup-deselected', async ({ ownerId }, ctx) => {
      ctx.reportProgress(30, 'halfway');
      ctx.reportProgress(10);
      return { deactivatedCount: ownerId };
    });
    const handle = await queue.enqueue('cleanup-deselected', { ownerId: 7 });
    const waiting = queue.waitFor(handle, 1_000);

    expect(await sync.deliver('1')).toBeNull();

    await expect(waiting).resolves.toEqual({ deactivatedCount: 7 });
    expect(await queue.status(handle.id)).toEqual({
      id: 'repository-sync:1',
      name: 'cleanup-deselected',
      state: 'succeeded',
      progress: 100,
      message: 'halfway',
      result: { deactivatedCount: 7 },
      error: null,
      enqueuedAt: new Date('2024-05-01T12:00:00Z'),
      startedAt: new Date('2024-05-01T12:00:01Z'),
      finishedAt: new Date('2024-05-01T12:00:05Z'),
    });
  });

  it('hands a failure back to Bull', async () => {
    queue.register('cleanup-deselected', async () => {
      throw new Error('database unavailable');
    });
    const handle = await queue.enqueue('cleanup-deselected', { ownerId: 1 });

    const error = await sync.deliver('1');

    expect(error?.message).toBe('database unavailable');
    expect(await queue.status(handle.id)).toMatchObject({ state: 'failed', error: 'database unavailable' });
  });

  it('reports a queued job as queued', async () => {
    const handle = await queue.enqueue('sync-repository', { repositoryId: 5 });

    expect(await queue.status(handle.id)).toMatchObject({
      state: 'queued',
      progress: 0,
      message: null,
      startedAt: null,
      finishedAt: null,
    });
  });

  it('removes a queued job on revoke', async () => {
    const handle = await queue.enqueue('sync-repository', { repositoryId: 5 });

    expect(await queue.revoke(handle.id)).toBe(true);

    expect(sync.jobs.size).toBe(0);
    expect(await queue.status(handle.id)).toBeNull();
  });

  it('discards a running job and aborts its signal on revoke', async () => {
    const signals: AbortSignal[] = [];
    queue.register('cleanup-deselected', (_payload, ctx) => {
      signals.push(ctx.signal);
      return new Promise<never>((_resolve, reject) => {
        ctx.signal.addEventListener('abort', () => reject(new Error('interrupted')));
      });
    });
    const handle = await queue.enqueue('cleanup-deselected', { ownerId: 1 });
    const delivery = sync.deliver('1');

    expect(await queue.revoke(handle.id)).toBe(true);

    expect(await delivery).toBeInstanceOf(JobRevokedError);
    expect(signals.map((s) => s.aborted)).toEqual([true]);
    expect(sync.jobs.get('1')?.discarded).toBe(true);
    expect(await queue.status(handle.id)).toMatchObject({
      state: 'revoked',
      error: 'Job repository-sync:1 was revoked',
    });
    expect(await queue.revoke(handle.id)).toBe(false);
  });

  it('turns an unreachable Redis into QueueUnavailableError', async () => {
    sync.unreachable = true;

    await expect(queue.enqueue('sync-repository', { repositoryId: 1 })).rejects.toBeInstanceOf(
      QueueUnavailableError,
    );
    await expect(queue.tryEnqueue('sync-repository', { repositoryId: 1 })).resolves.toEqual({
      scheduled: false,
      reason: 'Could not queue sync-repository: connect ECONNREFUSED 127.0.0.1:6379',
    });
  });

  it('refuses new jobs once shut down', async () => {
    queue.onModuleDestroy();

    await expect(queue.enqueue('sync-repository', { repositoryId: 1 })).rejects.toThrow(
      'Task queue is shutting down',
    );
    expect(sync.added).toEqual([]);
  });

  it('knows nothing about unknown ids', async () => {
    expect(await queue.status('missing')).toBeNull();
    expect(await queue.status('repository-sync:9')).toBeNull();
    expect(await queue.revoke('orchestration:9')).toBe(false);
  });
});
