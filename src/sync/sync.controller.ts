import {
  Body,
  Controller,
  Delete,
  ForbiddenException,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { RecordNotFoundError } from '../common/errors.js';
import { CurrentPrincipal } from '../auth/principal.js';
import type { Principal } from '../auth/principal.js';
import { ParseAccountKindPipe } from '../accounts/account-kind.pipe.js';
import type { AccountKind } from '../accounts/account.types.js';
import { TaskQueue } from '../queue/task-queue.js';
import { BulkSyncService } from './bulk-sync.service.js';
import { AccountRefreshService } from './account-refresh.service.js';
import { SyncJobService } from './sync-job.service.js';
import { BulkSyncDto } from './dto/bulk-sync.dto.js';

@ApiTags('sync')
@ApiSecurity('X-API-Key')
@Controller('sync')
export class SyncController {
  constructor(
    private readonly bulk: BulkSyncService,
    private readonly refresh: AccountRefreshService,
    private readonly syncJobs: SyncJobService,
    private readonly queue: TaskQueue,
  ) {}

  @Post('repositories/bulk-sync')
  @HttpCode(202)
  @ApiOperation({ summary: 'Sync several owned repositories in the background' })
  async bulkSync(@CurrentPrincipal() principal: Principal, @Body() body: BulkSyncDto) {
    const handle = await this.bulk.startBulkSync(body.repositoryIds, principal.userId);
    return { taskId: handle.id, status: 'queued', total: body.repositoryIds.length };
  }

  @Post('accounts/:kind/:id/refresh')
  @HttpCode(202)
  @ApiParam({ name: 'kind', enum: ['users', 'organizations'] })
  @ApiOperation({ summary: 'Reconcile one account with GitHub in the background' })
  async refreshAccount(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    const handle = await this.refresh.refreshAccount({ kind, id }, principal.userId);
    return { taskId: handle.id, status: 'queued' };
  }

  @Post('periodic-refresh')
  @HttpCode(202)
  @ApiOperation({ summary: 'Refresh every active account now (admin only)' })
  async startPeriodicRefresh(@CurrentPrincipal() principal: Principal) {
    if (!principal.isAdmin) throw new ForbiddenException('Admin privileges required');
    const handle = await this.refresh.startPeriodicRefresh();
    return { taskId: handle.id, status: 'queued' };
  }

  @Post('cleanup/orphaned')
  @HttpCode(202)
  @ApiOperation({ summary: 'Return selections of deleted repositories to selected (admin only)' })
  async cleanupOrphaned(@CurrentPrincipal() principal: Principal) {
    if (!principal.isAdmin) throw new ForbiddenException('Admin privileges required');
    const handle = await this.queue.enqueue('cleanup-orphaned', {});
    return { taskId: handle.id, status: 'queued' };
  }

  @Get('tasks/:id')
  async getTask(@Param('id') id: string) {
    const snapshot = await this.queue.status(id);
    if (!snapshot) throw new RecordNotFoundError('Task', id);
    return snapshot;
  }

  @Delete('tasks/:id')
  @ApiOperation({ summary: 'Revoke a queued or running task' })
  async revokeTask(@Param('id') id: string) {
    if (!(await this.queue.status(id))) throw new RecordNotFoundError('Task', id);
    return { taskId: id, revoked: await this.queue.revoke(id) };
  }

  @Get('repositories/:id/status')
  async getSyncStatus(@CurrentPrincipal() principal: Principal, @Param('id', ParseIntPipe) id: number) {
    return this.syncJobs.getSyncStatus(id, principal.userId);
  }

  @Post('repositories/:id/force-sync')
  @HttpCode(202)
  @ApiOperation({ summary: 'Reset a stuck or failed repository and sync it again' })
  async forceSync(@CurrentPrincipal() principal: Principal, @Param('id', ParseIntPipe) id: number) {
    const handle = await this.syncJobs.forceSync(id, principal.userId);
    return { taskId: handle.id, status: 'queued' };
  }

  @Get('stats')
  async stats(@CurrentPrincipal() principal: Principal) {
    return this.syncJobs.stats(principal.userId);
  }
}
