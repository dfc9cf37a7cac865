import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { FastifyRequest } from 'fastify';
import { tenancyConfig } from '../../config/tenancy.config';

export const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Guards the operator API. Admin routes are never tenant-bound.
 */
@Injectable()
export class AdminKeyGuard implements CanActivate {
  constructor(@Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const provided = request.headers[ADMIN_KEY_HEADER];

    if (typeof provided !== 'string' || !this.matches(provided)) {
      throw new UnauthorizedException('Missing or invalid admin key');
    }
    return true;
  }

  private matches(provided: string): boolean {
    const expected = Buffer.from(this.config.adminApiKey);
    const actual = Buffer.from(provided);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
