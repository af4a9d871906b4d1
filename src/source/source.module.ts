import { Module } from '@nestjs/common';
import { OctokitSourceClientFactory } from './octokit-source-client.factory.js';
import { SourceClientFactory } from './source-client.interface.js';

@Module({
  providers: [{ provide: SourceClientFactory, useClass: OctokitSourceClientFactory }],
  exports: [SourceClientFactory],
})
export class SourceModule {}
