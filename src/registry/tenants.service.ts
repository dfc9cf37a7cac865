import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { CacheKeys } from '../cache/cache-keys';
import { RedisCacheService } from '../cache/redis-cache.service';
import { InvalidStatusTransitionError, StatusConflictError } from '../common/errors/tenancy.errors';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { canTransition } from './tenant-lifecycle';
import { TENANT_REGISTRY, TenantRegistry } from './tenant-registry.interface';
import {
  ProvisioningRequestedEvent,
  TenantCreatedEvent,
  TenantEventBus,
  TenantStatusChangedEvent,
} from './tenant.events';
import { StatusChangeFields, Tenant, TenantStatus } from './tenant.types';

const UNIQUE_VIOLATION = '23505';

/**
 * Registry writes. Every status change goes through `transition`, which
 * validates it against the lifecycle, commits it with compare-and-set and
 * drops the tenant's resolver cache entry.
 */
@Injectable()
export class TenantsService {
  constructor(
    @Inject(TENANT_REGISTRY) private readonly registry: TenantRegistry,
    private readonly eventBus: TenantEventBus,
    private readonly cache: RedisCacheService,
    @InjectPinoLogger(TenantsService.name)
    private readonly logger: PinoLogger,
  ) {}

  async create(dto: CreateTenantDto): Promise<Tenant> {
    const routingKey = dto.routingKey.toLowerCase();
    const storeLocation = dto.storeLocation ?? defaultStoreLocation(routingKey);

    if (await this.registry.findByRoutingKey(routingKey)) {
      throw new ConflictException(`Routing key "${routingKey}" is already registered`);
    }

    let tenant: Tenant;
    try {
      tenant = await this.registry.create({ name: dto.name, routingKey, storeLocation });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException('Routing key or store location is already registered');
      }
      throw error;
    }

    this.logger.info({ tenantId: tenant.id, routingKey, storeLocation }, 'Tenant registered');
    this.eventBus.publish(new TenantCreatedEvent(tenant));
    this.eventBus.publish(new ProvisioningRequestedEvent(tenant));
    return tenant;
  }

  list(options: { take?: number; skip?: number } = {}): Promise<Tenant[]> {
    return this.registry.list(options);
  }

  async findOne(id: string): Promise<Tenant> {
    const tenant = await this.registry.findById(id);
    if (!tenant) {
      throw new NotFoundException(`Tenant ${id} not found`);
    }
    return tenant;
  }

  suspend(id: string): Promise<Tenant> {
    return this.changeStatus(id, TenantStatus.SUSPENDED, { suspendedAt: new Date() });
  }

  reactivate(id: string): Promise<Tenant> {
    return this.changeStatus(id, TenantStatus.ACTIVE, { suspendedAt: null });
  }

  retire(id: string): Promise<Tenant> {
    return this.changeStatus(id, TenantStatus.RETIRED, { retiredAt: new Date() });
  }

  /**
   * Re-emits the provisioning intent for a tenant still waiting in PENDING.
   */
  async requestProvisioning(id: string): Promise<Tenant> {
    const tenant = await this.findOne(id);
    if (tenant.status !== TenantStatus.PENDING) {
      throw new InvalidStatusTransitionError(tenant.id, tenant.status, TenantStatus.PROVISIONING);
    }
    this.eventBus.publish(new ProvisioningRequestedEvent(tenant));
    return tenant;
  }

  async changeStatus(id: string, next: TenantStatus, fields: StatusChangeFields = {}): Promise<Tenant> {
    const tenant = await this.findOne(id);
    return this.transition(tenant, next, fields);
  }

  /**
   * Moves `tenant` from the status it was read with to `next`. Fails with
   * StatusConflictError when another writer changed the status in between.
   */
  async transition(tenant: Tenant, next: TenantStatus, fields: StatusChangeFields = {}): Promise<Tenant> {
    if (!canTransition(tenant.status, next)) {
      throw new InvalidStatusTransitionError(tenant.id, tenant.status, next);
    }

    const updated = await this.registry.compareAndSetStatus(tenant.id, tenant.status, next, fields);
    if (!updated) {
      throw new StatusConflictError(tenant.id, tenant.status);
    }

    this.logger.info({ tenantId: tenant.id, from: tenant.status, to: next }, 'Tenant status changed');
    this.eventBus.publish(new TenantStatusChangedEvent(updated, tenant.status, next));
    // After the event, so a resolver read already in flight cannot re-cache the old status.
    await this.cache.del(CacheKeys.tenantByRoutingKey(updated.routingKey));
    return updated;
  }
}

function defaultStoreLocation(routingKey: string): string {
  return `tenant_${routingKey.replace(/[^a-z0-9]/g, '_')}`.slice(0, 63);
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}
