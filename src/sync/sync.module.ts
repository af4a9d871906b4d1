import { Module } from '@nestjs/common';
import { CommitsModule } from '../commits/commits.module.js';
import { SyncJobService } from './sync-job.service.js';
import { BulkSyncService } from './bulk-sync.service.js';
import { AccountRefreshService } from './account-refresh.service.js';
import { SyncController } from './sync.controller.js';

@Module({
  imports: [CommitsModule],
  controllers: [SyncController],
  providers: [SyncJobService, BulkSyncService, AccountRefreshService],
  exports: [AccountRefreshService],
})
export class SyncModule {}
