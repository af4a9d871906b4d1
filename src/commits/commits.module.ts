import { Module } from '@nestjs/common';
import { SourceModule } from '../source/source.module.js';
import { CommitIngestionService } from './commit-ingestion.service.js';

@Module({
  imports: [SourceModule],
  providers: [CommitIngestionService],
  exports: [CommitIngestionService],
})
export class CommitsModule {}
