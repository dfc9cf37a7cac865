import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import pRetry from 'p-retry';
import { abortError, PoolExhaustedError, StoreUnavailableError } from '../common/errors/tenancy.errors';
import { errorMessage, raiseAlert } from '../common/utils/alert';
import { tenancyConfig } from '../config/tenancy.config';
import { AcquireOutcome, MetricsService } from '../metrics/metrics.service';
import { Tenant } from '../registry/tenant.types';
import { STORE_BACKEND, StoreBackend, StoreSession } from './store-backend.interface';
import { StoreHandle } from './store-handle';
import { TenantPool, TenantPoolStats } from './tenant-pool';

export interface SwitchboardStats {
  pools: number;
  draining: number;
  maxPools: number;
  tenants: TenantPoolStats[];
}

/**
 * Hands out store handles scoped to one tenant's physical store. Keeps one
 * bounded pool per tenant; pools beyond `maxTenantPools` are evicted least
 * recently used first, and only once idle.
 */
@Injectable()
export class StoreSwitchboardService implements OnModuleInit, OnModuleDestroy {
  // Map iteration order doubles as the LRU order: a pool is re-inserted on every use.
  private readonly pools = new Map<string, TenantPool>();
  private readonly draining = new Set<TenantPool>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    @Inject(STORE_BACKEND) private readonly backend: StoreBackend,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    private readonly metrics: MetricsService,
    @InjectPinoLogger(StoreSwitchboardService.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit(): void {
    const interval = Math.max(1_000, Math.floor(this.config.pool.idleEvictMs / 2));
    this.sweeper = setInterval(() => {
      this.evictIdle().catch((error: unknown) =>
        this.logger.error({ error: errorMessage(error) }, 'Idle pool sweep failed'),
      );
    }, interval);
    this.sweeper.unref();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    const pools = [...this.pools.values()];
    await Promise.all(pools.map(pool => this.detach(pool, 'shutdown')));
  }

  /**
   * Checks out a session on the tenant's own store. The caller owns the
   * returned handle and must release it on every exit path.
   */
  async acquire(tenant: Tenant, signal?: AbortSignal): Promise<StoreHandle> {
    const startedAt = Date.now();
    try {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      const pool = this.poolFor(tenant);
      const session = await pool.acquire(this.config.pool.acquireTimeoutMs, signal);

      this.metrics.recordAcquire('acquired', Date.now() - startedAt);
      this.metrics.setHandlesInUse(tenant.id, pool.inUse);
      return new StoreHandle(
        tenant.id,
        tenant.storeLocation,
        session,
        released => this.release(pool, released),
        lost => this.alertUnreachable(tenant, lost),
      );
    } catch (error) {
      this.metrics.recordAcquire(acquireOutcome(error), Date.now() - startedAt);
      if (error instanceof StoreUnavailableError) {
        this.alertUnreachable(tenant, error);
      } else if (error instanceof PoolExhaustedError) {
        this.logger.warn(
          { tenantId: tenant.id, waitedMs: error.waitedMs },
          'Tenant pool exhausted',
        );
      }
      throw error;
    }
  }

  /**
   * True while any handle from this tenant's pools, live or draining, is still
   * checked out or about to be handed out by an open in flight.
   */
  hasCheckedOutHandles(tenantId: string): boolean {
    const live = this.pools.get(tenantId);
    if (live && live.busy > 0) {
      return true;
    }
    return [...this.draining].some(pool => pool.tenantId === tenantId && pool.busy > 0);
  }

  /**
   * Detaches the tenant's pool and waits until its sessions are back and closed.
   */
  async closeTenantPool(tenantId: string): Promise<void> {
    const pool = this.pools.get(tenantId);
    if (pool) {
      await this.detach(pool, 'closed');
    }
  }

  async evictIdle(now = Date.now()): Promise<number> {
    const stale = [...this.pools.values()].filter(
      pool => pool.isIdle() && now - pool.lastUsedAt >= this.config.pool.idleEvictMs,
    );
    await Promise.all(stale.map(pool => this.detach(pool, 'idle')));
    return stale.length;
  }

  stats(): SwitchboardStats {
    return {
      pools: this.pools.size,
      draining: this.draining.size,
      maxPools: this.config.pool.maxTenantPools,
      tenants: [...this.pools.values()].map(pool => pool.stats()),
    };
  }

  private poolFor(tenant: Tenant): TenantPool {
    const existing = this.pools.get(tenant.id);
    if (existing && existing.location === tenant.storeLocation) {
      this.pools.delete(tenant.id);
      this.pools.set(tenant.id, existing);
      return existing;
    }
    if (existing) {
      this.logger.warn(
        { tenantId: tenant.id, from: existing.location, to: tenant.storeLocation },
        'Tenant store location changed, replacing pool',
      );
      void this.detach(existing, 'relocated');
    }

    const pool = new TenantPool(tenant.id, tenant.storeLocation, {
      maxSessions: this.config.pool.maxSessions,
      openSession: signal => this.openSession(tenant, signal),
      onCloseError: error =>
        this.logger.warn({ tenantId: tenant.id, error: errorMessage(error) }, 'Failed to close store session'),
    });
    this.pools.set(tenant.id, pool);
    this.enforcePoolLimit(pool);
    return pool;
  }

  private enforcePoolLimit(keep: TenantPool): void {
    let excess = this.pools.size - this.config.pool.maxTenantPools;
    if (excess <= 0) {
      return;
    }
    for (const pool of this.pools.values()) {
      if (excess === 0) {
        break;
      }
      if (pool !== keep && pool.isIdle()) {
        void this.detach(pool, 'lru');
        excess--;
      }
    }
    if (excess > 0) {
      this.logger.warn(
        { pools: this.pools.size, maxPools: this.config.pool.maxTenantPools },
        'Tenant pool limit exceeded; no idle pool to evict',
      );
    }
  }

  /**
   * Opens a session with exponential backoff between attempts. An abort stops
   * the retries at once; a session that still arrives afterwards is closed.
   */
  private async openSession(tenant: Tenant, signal?: AbortSignal): Promise<StoreSession> {
    const attempts = pRetry(
      () => {
        if (signal?.aborted) {
          throw new pRetry.AbortError(abortError(signal));
        }
        return this.backend.openSession(tenant.storeLocation);
      },
      {
        retries: Math.max(1, this.config.store.openRetries) - 1,
        factor: 2,
        minTimeout: this.config.store.retryBaseMs,
        maxTimeout: 30_000,
        onFailedAttempt: error => {
          if (error.retriesLeft > 0) {
            this.logger.warn(
              { tenantId: tenant.id, attempt: error.attemptNumber, error: error.message },
              'Opening tenant store session failed, retrying',
            );
          }
        },
      },
    );

    try {
      return await this.abortable(tenant, attempts, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      throw error instanceof StoreUnavailableError ? error : new StoreUnavailableError(tenant.id, error);
    }
  }

  private abortable(tenant: Tenant, opening: Promise<StoreSession>, signal?: AbortSignal): Promise<StoreSession> {
    if (!signal) {
      return opening;
    }
    return new Promise<StoreSession>((resolve, reject) => {
      const onAbort = () => reject(abortError(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      opening.then(
        session => {
          signal.removeEventListener('abort', onAbort);
          if (signal.aborted) {
            this.discardSession(tenant, session);
            return;
          }
          resolve(session);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private discardSession(tenant: Tenant, session: StoreSession): void {
    session.close().catch((error: unknown) =>
      this.logger.warn({ tenantId: tenant.id, error: errorMessage(error) }, 'Failed to close store session'),
    );
  }

  private release(pool: TenantPool, session: StoreSession): void {
    pool.release(session);
    this.metrics.setHandlesInUse(pool.tenantId, pool.inUse);
  }

  private detach(pool: TenantPool, reason: string): Promise<void> {
    if (this.pools.get(pool.tenantId) === pool) {
      this.pools.delete(pool.tenantId);
    }
    this.draining.add(pool);
    this.metrics.recordPoolEviction();
    this.logger.info({ tenantId: pool.tenantId, reason, inUse: pool.inUse }, 'Closing tenant pool');

    return pool.drain().finally(() => {
      this.draining.delete(pool);
      this.metrics.setHandlesInUse(pool.tenantId, this.pools.get(pool.tenantId)?.inUse ?? 0);
    });
  }

  private alertUnreachable(tenant: Tenant, error: StoreUnavailableError): void {
    raiseAlert(this.logger, 'Tenant store unreachable', error, {
      tenantId: tenant.id,
      location: tenant.storeLocation,
    });
  }
}

function acquireOutcome(error: unknown): AcquireOutcome {
  if (error instanceof PoolExhaustedError) {
    return 'pool_exhausted';
  }
  if (error instanceof StoreUnavailableError) {
    return 'store_unavailable';
  }
  return 'aborted';
}
