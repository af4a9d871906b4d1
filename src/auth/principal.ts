import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

/** Authenticated local user the core acts on behalf of. */
export interface Principal {
  userId: number;
  isAdmin: boolean;
}

export type RequestWithPrincipal = FastifyRequest & { principal?: Principal };

export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<RequestWithPrincipal>();
    if (!request.principal) {
      throw new UnauthorizedException('Missing principal');
    }
    return request.principal;
  },
);
