import { Module } from '@nestjs/common';
import { SourceModule } from '../source/source.module.js';
import { ReconciliationService } from './reconciliation.service.js';
import { SelectionService } from './selection.service.js';

@Module({
  imports: [SourceModule],
  providers: [ReconciliationService, SelectionService],
  exports: [ReconciliationService, SelectionService],
})
export class SelectionModule {}
