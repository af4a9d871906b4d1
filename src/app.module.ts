// src/app.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';

import { APP_CONFIG } from './config/app.config.js';
import type { AppConfig } from './config/app.config.js';
import { ConfigModule } from './config/config.module.js';
import { dataSourceOptions } from './database/data-source.js';
import { PersistenceModule } from './database/persistence.module.js';
import { QueueModule } from './queue/queue.module.js';
import { AccountsModule } from './accounts/accounts.module.js';
import { SelectionModule } from './selection/selection.module.js';
import { SyncModule } from './sync/sync.module.js';
import { SchedulerModule } from './scheduler/scheduler.module.js';
import { AppController } from './app.controller.js';
import { ApiKeyGuard } from './auth/api-key.guard.js';
import { SyncExceptionFilter } from './common/sync-exception.filter.js';

function pgConfig(config: AppConfig): TypeOrmModuleOptions {
  return {
    ...dataSourceOptions(config.databaseUrl),
    autoLoadEntities: true,
    synchronize: false,
  };
}

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      inject: [APP_CONFIG],
      useFactory: pgConfig,
    }),
    PersistenceModule,
    QueueModule,
    SelectionModule,
    AccountsModule,
    SyncModule,
    SchedulerModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
    {
      provide: APP_FILTER,
      useClass: SyncExceptionFilter,
    },
  ],
})
export class AppModule {}
