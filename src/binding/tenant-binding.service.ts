import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { abortError } from '../common/errors/tenancy.errors';
import { TenantResolverService } from '../resolver/tenant-resolver.service';
import { StoreSwitchboardService } from '../switchboard/store-switchboard.service';
import { BoundTenantContext } from './bound-tenant-context';

export interface BindOptions {
  /** Mutation-class requests revalidate aging cache entries before trusting them. */
  mutation?: boolean;
  /** Fires when the caller goes away; binding stops and nothing stays checked out. */
  signal?: AbortSignal;
}

/**
 * Single entry point of the tenancy core: resolve the host, then bind a store
 * handle for that tenant. Resolution always completes before any store access.
 */
@Injectable()
export class TenantBindingService {
  constructor(
    private readonly resolver: TenantResolverService,
    private readonly switchboard: StoreSwitchboardService,
    @InjectPinoLogger(TenantBindingService.name)
    private readonly logger: PinoLogger,
  ) {}

  async bind(rawHost: string, options: BindOptions = {}): Promise<BoundTenantContext> {
    const { signal } = options;
    throwIfAborted(signal);

    const { tenant, host } = await this.resolver.resolve(rawHost, { mutation: options.mutation });
    throwIfAborted(signal);

    const store = await this.switchboard.acquire(tenant, signal);
    const context = new BoundTenantContext(tenant, host, store);
    if (signal?.aborted) {
      context.release();
      throw abortError(signal);
    }

    this.logger.debug({ tenantId: tenant.id, routingKey: host.routingKey }, 'Tenant bound');
    return context;
  }

  /**
   * Binds, runs `work` against the bound context, and releases on every exit path.
   */
  async run<T>(
    rawHost: string,
    options: BindOptions,
    work: (context: BoundTenantContext) => Promise<T>,
  ): Promise<T> {
    const context = await this.bind(rawHost, options);
    try {
      return await work(context);
    } finally {
      context.release();
    }
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortError(signal);
  }
}
