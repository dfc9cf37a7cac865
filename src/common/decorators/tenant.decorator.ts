import { createParamDecorator, ExecutionContext, InternalServerErrorException } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { BoundTenantContext } from '../../binding/bound-tenant-context';
import { StoreHandle } from '../../switchboard/store-handle';
import '../interfaces/tenant-context.interface';

function boundContextOf(ctx: ExecutionContext): BoundTenantContext {
  const request = ctx.switchToHttp().getRequest<FastifyRequest>();
  if (!request.tenancy) {
    throw new InternalServerErrorException(
      'Tenant context not found. Ensure TenantBindingInterceptor is applied to this route.',
    );
  }
  return request.tenancy;
}

export const BoundTenant = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): BoundTenantContext => boundContextOf(ctx),
);

/**
 * The request's store handle. The only way handlers reach tenant data.
 */
export const TenantStore = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): StoreHandle => boundContextOf(ctx).store,
);
