import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { MalformedInputError } from '../common/errors.js';
import { OctokitSourceClient } from './octokit-source.client.js';
import { RepositoryProvider, SourceClientFactory } from './source-client.interface.js';
import type { SourceClient } from './source-client.interface.js';

@Injectable()
export class OctokitSourceClientFactory extends SourceClientFactory {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    super();
  }

  forProvider(provider: RepositoryProvider, credential?: string | null): SourceClient {
    switch (provider) {
      case RepositoryProvider.GITHUB:
        return new OctokitSourceClient({
          token: credential ?? this.config.github.token,
          baseUrl: this.config.github.apiUrl,
          pageCap: this.config.github.pageCap,
        });
      case RepositoryProvider.GITLAB:
      case RepositoryProvider.BITBUCKET:
      case RepositoryProvider.LOCAL:
        throw new MalformedInputError(`Provider ${provider} is not supported yet`);
      default: {
        const unknown: never = provider;
        throw new MalformedInputError(`Unknown provider ${String(unknown)}`);
      }
    }
  }
}
