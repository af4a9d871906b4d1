import { Global, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { ORCHESTRATION_LANE, SYNC_LANE, TaskQueue } from './task-queue.js';
import { BullTaskQueue } from './bull-task-queue.js';

@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        redis: {
          host: config.redis.host,
          port: config.redis.port,
          password: config.redis.password,
        },
        prefix: config.redis.prefix,
      }),
    }),

    // children (syncs, refreshes, cleanups) and the jobs that wait on them
    BullModule.registerQueue({ name: SYNC_LANE }, { name: ORCHESTRATION_LANE }),
  ],
  providers: [{ provide: TaskQueue, useClass: BullTaskQueue }],
  exports: [TaskQueue],
})
export class QueueModule {}
