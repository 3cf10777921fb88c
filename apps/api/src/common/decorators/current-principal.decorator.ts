import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import type { Principal } from '@gridsearch/shared';

/** The caller resolved by BasicAuthGuard; only valid on guarded routes */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<FastifyRequest>();
    if (!request.principal) {
      throw new UnauthorizedException('Missing Basic Auth credentials');
    }
    return request.principal;
  },
);
