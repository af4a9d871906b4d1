import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { TaskQueue } from '../queue/task-queue.js';

@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);

  constructor(private readonly queue: TaskQueue) {}

  // Every 6 hours: reconcile all active accounts with GitHub
  @Cron(CronExpression.EVERY_6_HOURS)
  async handlePeriodicRefresh(): Promise<boolean> {
    this.logger.log('Queueing periodic account refresh...');
    const attempt = await this.queue.tryEnqueue('periodic-refresh', {});
    if (attempt.scheduled) {
      this.logger.log(`Periodic refresh queued as task ${attempt.handle.id}`);
    }
    return attempt.scheduled;
  }

  // Daily: return selections of deleted repositories to the selectable pool
  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT)
  async handleOrphanCleanup(): Promise<boolean> {
    const attempt = await this.queue.tryEnqueue('cleanup-orphaned', {});
    if (attempt.scheduled) {
      this.logger.log(`Orphan cleanup queued as task ${attempt.handle.id}`);
    }
    return attempt.scheduled;
  }
}
