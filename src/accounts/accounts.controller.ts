import { Body, Controller, Delete, Get, Param, ParseIntPipe, Patch, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { CurrentPrincipal } from '../auth/principal.js';
import type { Principal } from '../auth/principal.js';
import { SelectionService } from '../selection/selection.service.js';
import { AccountsService } from './accounts.service.js';
import { ParseAccountKindPipe } from './account-kind.pipe.js';
import { presentAccount } from './account.presenter.js';
import type { AccountKind } from './account.types.js';
import { AddIndividualDto } from './dto/add-individual.dto.js';
import { ConnectOrganizationDto } from './dto/connect-organization.dto.js';
import { SetActiveDto } from './dto/set-active.dto.js';
import { UpdateSelectionDto } from './dto/update-selection.dto.js';
import { ListSelectionsQuery } from './dto/list-selections.query.js';

const KIND_PARAM = { name: 'kind', enum: ['users', 'organizations'] };

@ApiTags('accounts')
@ApiSecurity('X-API-Key')
@Controller('accounts')
export class AccountsController {
  constructor(
    private readonly accounts: AccountsService,
    private readonly selections: SelectionService,
  ) {}

  @Get(':kind')
  @ApiParam(KIND_PARAM)
  @ApiOperation({ summary: 'List monitored GitHub users or organizations' })
  async list(@CurrentPrincipal() principal: Principal, @Param('kind', ParseAccountKindPipe) kind: AccountKind) {
    const sources = await this.accounts.list(kind, principal.userId);
    return sources.map(presentAccount);
  }

  @Post('users')
  @ApiOperation({ summary: 'Start monitoring a GitHub user' })
  async addIndividual(@CurrentPrincipal() principal: Principal, @Body() body: AddIndividualDto) {
    const added = await this.accounts.addIndividual(principal.userId, body.login);
    return { account: presentAccount(added.source), refreshTaskId: added.refreshJobId };
  }

  @Post('organizations')
  @ApiOperation({ summary: 'Connect a GitHub organization with an OAuth token' })
  async connectOrganization(@CurrentPrincipal() principal: Principal, @Body() body: ConnectOrganizationDto) {
    const added = await this.accounts.connectOrganization(
      principal.userId,
      body.login,
      body.accessToken,
      body.scopes ?? null,
    );
    return { account: presentAccount(added.source), refreshTaskId: added.refreshJobId };
  }

  @Patch(':kind/:id')
  @ApiParam(KIND_PARAM)
  async setActive(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: SetActiveDto,
  ) {
    const source = await this.accounts.setActive({ kind, id }, principal.userId, body.isActive);
    return presentAccount(source);
  }

  @Delete(':kind/:id')
  @ApiParam(KIND_PARAM)
  @ApiOperation({ summary: 'Stop monitoring an account and drop its candidate repositories' })
  async remove(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.accounts.remove({ kind, id }, principal.userId);
  }

  @Get(':kind/:id/repositories')
  @ApiParam(KIND_PARAM)
  @ApiOperation({ summary: 'List candidate repositories, optionally reconciling with GitHub first' })
  async listSelections(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
    @Query() query: ListSelectionsQuery,
  ) {
    return this.selections.listSelections({ kind, id }, principal.userId, query.refresh ?? false);
  }

  @Post(':kind/:id/repositories/selection')
  @ApiParam(KIND_PARAM)
  @ApiOperation({ summary: 'Select or deselect candidate repositories' })
  async updateSelections(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateSelectionDto,
  ) {
    return this.selections.updateSelections({ kind, id }, principal.userId, body.selectionIds, body.status);
  }

  @Post(':kind/:id/repositories/promote')
  @ApiParam(KIND_PARAM)
  @ApiOperation({ summary: 'Promote selected candidates to monitored repositories and queue their sync' })
  async promote(
    @CurrentPrincipal() principal: Principal,
    @Param('kind', ParseAccountKindPipe) kind: AccountKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.selections.promoteSelected({ kind, id }, principal.userId);
  }
}
