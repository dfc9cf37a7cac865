import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { Subscription } from 'rxjs';
import {
  TenancyError,
  TenantNotReadyError,
  TenantRetiredError,
  TenantSuspendedError,
  UnknownTenantError,
} from '../common/errors/tenancy.errors';
import { CacheKeys } from '../cache/cache-keys';
import { RedisCacheService } from '../cache/redis-cache.service';
import { tenancyConfig } from '../config/tenancy.config';
import { MetricsService } from '../metrics/metrics.service';
import { TENANT_REGISTRY, TenantRegistry } from '../registry/tenant-registry.interface';
import { TenantEventBus, TenantStatusChangedEvent } from '../registry/tenant.events';
import { Tenant, TenantStatus } from '../registry/tenant.types';
import { extractRoutingKey, ParsedHost } from './host-parser';
import { parseCachedTenant } from './tenant-cache';

export interface ResolveOptions {
  /** Mutation-class requests never trust a cache entry older than the revalidation window */
  mutation?: boolean;
}

export interface ResolvedTenant {
  tenant: Tenant;
  host: ParsedHost;
}

/**
 * Resolves a request host to an ACTIVE tenant, or fails with the
 * caller-visible reason. Read-only against the registry; failures are
 * reported immediately and never retried here.
 *
 * Resolved tenants are cached in Redis for `resolver.cacheTtlMs`. Registry
 * writes delete the entry (see TenantsService); concurrent misses for one
 * routing key share a single registry read per process.
 */
@Injectable()
export class TenantResolverService implements OnModuleInit, OnModuleDestroy {
  private readonly inflight = new Map<string, Promise<Tenant | null>>();
  private subscriptions: Subscription[] = [];

  constructor(
    @Inject(TENANT_REGISTRY) private readonly registry: TenantRegistry,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    private readonly cache: RedisCacheService,
    private readonly eventBus: TenantEventBus,
    private readonly metrics: MetricsService,
    @InjectPinoLogger(TenantResolverService.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit(): void {
    this.subscriptions = [
      this.eventBus.ofType(TenantStatusChangedEvent).subscribe(event => this.invalidate(event.tenant)),
    ];
  }

  onModuleDestroy(): void {
    this.subscriptions.forEach(subscription => subscription.unsubscribe());
    this.subscriptions = [];
  }

  async resolve(rawHost: string, options: ResolveOptions = {}): Promise<ResolvedTenant> {
    try {
      const host = extractRoutingKey(rawHost, this.config.baseDomains);
      if (!host) {
        throw new UnknownTenantError(rawHost);
      }

      const tenant = await this.lookup(host.routingKey, options.mutation ?? false);
      if (!tenant) {
        throw new UnknownTenantError(host.routingKey);
      }

      this.assertRoutable(tenant);
      this.metrics.recordResolution('resolved');
      return { tenant, host };
    } catch (error) {
      if (error instanceof TenancyError) {
        this.metrics.recordResolution(error.code);
        this.logger.debug({ host: rawHost, code: error.code }, 'Tenant resolution rejected');
      }
      throw error;
    }
  }

  /**
   * Forgets an in-flight registry read so its result is not cached over a
   * newer write.
   */
  invalidate(tenant: Pick<Tenant, 'routingKey'>): void {
    this.inflight.delete(tenant.routingKey);
  }

  private assertRoutable(tenant: Tenant): void {
    switch (tenant.status) {
      case TenantStatus.ACTIVE:
        return;
      case TenantStatus.PENDING:
      case TenantStatus.PROVISIONING:
        throw new TenantNotReadyError(tenant.id);
      case TenantStatus.SUSPENDED:
        throw new TenantSuspendedError(tenant.id);
      case TenantStatus.RETIRED:
        throw new TenantRetiredError(tenant.id);
    }
  }

  private async lookup(routingKey: string, mutation: boolean): Promise<Tenant | null> {
    const key = CacheKeys.tenantByRoutingKey(routingKey);
    const cached = parseCachedTenant(await this.cache.get(key));
    if (cached && (!mutation || Date.now() - cached.cachedAt < this.config.resolver.revalidateMs)) {
      return cached.tenant;
    }

    const pending = this.inflight.get(routingKey);
    if (pending) {
      return pending;
    }

    const read = this.registry.findByRoutingKey(routingKey);
    this.inflight.set(routingKey, read);
    try {
      const tenant = await read;
      // An invalidation while the read was in flight means a newer write exists.
      if (tenant && this.inflight.get(routingKey) === read) {
        await this.cache.set(key, { tenant, cachedAt: Date.now() }, { px: this.config.resolver.cacheTtlMs });
      }
      return tenant;
    } finally {
      if (this.inflight.get(routingKey) === read) {
        this.inflight.delete(routingKey);
      }
    }
  }
}
