import { BoundTenantContext } from '../../binding/bound-tenant-context';

/**
 * Internal header carrying the host the client addressed. TenantMiddleware
 * always overwrites it, so a client-supplied value never reaches the resolver.
 */
export const TENANT_HOST_HEADER = 'x-tenant-host';

export const REQUEST_ID_HEADER = 'x-request-id';

declare module 'fastify' {
  interface FastifyRequest {
    tenancy?: BoundTenantContext;
  }
}
