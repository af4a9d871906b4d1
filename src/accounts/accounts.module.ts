import { Module } from '@nestjs/common';
import { SourceModule } from '../source/source.module.js';
import { SelectionModule } from '../selection/selection.module.js';
import { AccountsController } from './accounts.controller.js';
import { AccountsService } from './accounts.service.js';

@Module({
  imports: [SourceModule, SelectionModule],
  controllers: [AccountsController],
  providers: [AccountsService],
})
export class AccountsModule {}
