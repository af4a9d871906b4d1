import { Injectable, CanActivate, ExecutionContext, Inject, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { IS_PUBLIC } from './public.decorator.js';
import type { Principal, RequestWithPrincipal } from './principal.js';

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<RequestWithPrincipal>();
    request.principal = this.resolvePrincipal(request);
    return true;
  }

  private resolvePrincipal(request: RequestWithPrincipal): Principal {
    // Development trusts the caller-supplied user id
    if (!this.config.isProduction) {
      const userId = Number(this.firstHeader(request, 'x-user-id'));
      return {
        userId: Number.isInteger(userId) && userId > 0 ? userId : this.config.auth.devUserId,
        isAdmin: true,
      };
    }

    if (this.config.auth.apiKeys.size === 0) {
      throw new Error('API_KEYS environment variable is not configured');
    }

    const apiKey = this.extractApiKey(request);
    if (!apiKey) {
      throw new UnauthorizedException('Missing API key');
    }

    const entry = this.config.auth.apiKeys.get(apiKey);
    if (!entry) {
      throw new UnauthorizedException('Invalid API key');
    }

    return { userId: entry.userId, isAdmin: entry.isAdmin };
  }

  private firstHeader(request: RequestWithPrincipal, name: string): string | undefined {
    const header = request.headers[name];
    const value = Array.isArray(header) ? header[0] : header;
    return typeof value === 'string' ? value : undefined;
  }

  private extractApiKey(request: RequestWithPrincipal): string | undefined {
    const apiKey = this.firstHeader(request, 'x-api-key');
    if (apiKey && apiKey.trim().length > 0) {
      return apiKey.trim();
    }

    const authValue = this.firstHeader(request, 'authorization');
    if (authValue?.startsWith('Bearer ')) {
      return authValue.slice(7).trim();
    }

    return undefined;
  }
}
