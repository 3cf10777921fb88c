import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { FastifyRequest } from 'fastify';
import type { Principal } from '@gridsearch/shared';
import type { AuthUser } from '../../config/env.config';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by BasicAuthGuard once credentials check out */
    principal?: Principal;
  }
}

@Injectable()
export class BasicAuthGuard implements CanActivate {
  private readonly logger = new Logger(BasicAuthGuard.name);

  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const authHeader = request.headers.authorization;

    if (!authHeader?.startsWith('Basic ')) {
      throw new UnauthorizedException('Missing Basic Auth credentials');
    }

    const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
    const colonIdx = decoded.indexOf(':');
    if (colonIdx === -1) {
      throw new UnauthorizedException('Invalid credentials format');
    }

    const username = decoded.slice(0, colonIdx);
    const password = decoded.slice(colonIdx + 1);

    const user = this.findUser(username);
    // Compare against a throwaway value when the user is unknown so timing stays flat
    const passMatch = this.safeCompare(password, user?.password ?? '\0'.repeat(password.length));

    if (!user || !passMatch) {
      this.logger.warn(`Auth rejected for user "${username}"`);
      throw new UnauthorizedException('Invalid credentials');
    }

    request.principal = { username: user.username, roles: [...user.roles] };
    return true;
  }

  private findUser(username: string): AuthUser | undefined {
    const users = this.config.getOrThrow<AuthUser[]>('AUTH_USERS');
    let found: AuthUser | undefined;
    for (const user of users) {
      if (this.safeCompare(username, user.username) && !found) found = user;
    }
    return found;
  }

  /** Constant-time string comparison using crypto.timingSafeEqual */
  private safeCompare(a: string, b: string): boolean {
    const bufA = Buffer.from(a, 'utf-8');
    const bufB = Buffer.from(b, 'utf-8');

    if (bufA.length !== bufB.length) {
      // Burn the same CPU time, then reject
      timingSafeEqual(bufA, Buffer.alloc(bufA.length));
      return false;
    }

    return timingSafeEqual(bufA, bufB);
  }
}
