import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NonRetriableError } from 'inngest';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { Subscription } from 'rxjs';
import { ProvisioningFailedError, StatusConflictError } from '../common/errors/tenancy.errors';
import { errorMessage, raiseAlert } from '../common/utils/alert';
import { tenancyConfig } from '../config/tenancy.config';
import { MetricsService } from '../metrics/metrics.service';
import { TENANT_REGISTRY, TenantRegistry } from '../registry/tenant-registry.interface';
import {
  ProvisioningCompletedEvent,
  ProvisioningEscalatedEvent,
  ProvisioningFailedEvent,
  ProvisioningRequestedEvent,
  StoreDestroyedEvent,
  StoreDestructionFailedEvent,
  TenantEventBus,
} from '../registry/tenant.events';
import { Tenant, TenantStatus } from '../registry/tenant.types';
import { TenantsService } from '../registry/tenants.service';
import { StoreSwitchboardService } from '../switchboard/store-switchboard.service';
import {
  INNGEST_CLIENT,
  PROVISION_REQUESTED,
  STORE_DESTRUCTION_REQUESTED,
  TenantJobsClient,
} from './inngest/inngest.client';
import { PROVISIONING_EXECUTOR, ProvisioningExecutor } from './provisioning-executor.interface';

/** A PROVISIONING tenant untouched for this long is assumed abandoned by a crashed worker. */
export const STALE_PROVISIONING_MS = 10 * 60_000;

export type ProvisionOutcome = 'provisioned' | 'skipped';

export type DestroyOutcome = 'destroyed' | 'deferred' | 'skipped';

/**
 * Drives tenants from PENDING to ACTIVE and destroys retired stores once
 * their retention window has passed.
 *
 * Each unit of work runs inside an Inngest function (see `inngest/`); this
 * service owns what one attempt does and dispatches the job events. Every
 * attempt ends in a ProvisioningCompleted, ProvisioningFailed or
 * ProvisioningEscalated event.
 */
@Injectable()
export class ProvisioningService implements OnModuleInit, OnModuleDestroy {
  private subscription: Subscription | null = null;

  constructor(
    @Inject(TENANT_REGISTRY) private readonly registry: TenantRegistry,
    @Inject(PROVISIONING_EXECUTOR) private readonly executor: ProvisioningExecutor,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    @Inject(INNGEST_CLIENT) private readonly inngest: TenantJobsClient,
    private readonly tenantsService: TenantsService,
    private readonly switchboard: StoreSwitchboardService,
    private readonly eventBus: TenantEventBus,
    private readonly metrics: MetricsService,
    @InjectPinoLogger(ProvisioningService.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit(): void {
    this.subscription = this.eventBus.ofType(ProvisioningRequestedEvent).subscribe(event => {
      this.requestProvisioning(event.tenant).catch((error: unknown) =>
        // The reconcile sweep picks the tenant up from PENDING later.
        this.logger.error(
          { tenantId: event.tenant.id, error: errorMessage(error) },
          'Failed to dispatch provisioning request',
        ),
      );
    });
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  /**
   * Sends the provisioning job event. The event id carries the attempt count
   * so repeated requests for the same attempt are deduplicated.
   */
  async requestProvisioning(tenant: Tenant): Promise<void> {
    await this.inngest.send({
      name: PROVISION_REQUESTED,
      id: `provision-${tenant.id}-${tenant.provisioningAttempts}`,
      data: { tenantId: tenant.id },
    });
    this.logger.debug({ tenantId: tenant.id }, 'Provisioning requested');
  }

  /**
   * One provisioning attempt: claim PENDING → PROVISIONING, create the store,
   * apply the schema, activate. A failed attempt puts the tenant back to
   * PENDING and rethrows; when no attempt is left the error is non-retriable.
   */
  async provisionAttempt(tenantId: string, lastAttempt: boolean): Promise<ProvisionOutcome> {
    const tenant = await this.registry.findById(tenantId);
    if (!tenant || tenant.status !== TenantStatus.PENDING) {
      this.logger.debug({ tenantId, status: tenant?.status }, 'Nothing to provision');
      return 'skipped';
    }

    let claimed: Tenant;
    try {
      claimed = await this.tenantsService.transition(tenant, TenantStatus.PROVISIONING);
    } catch (error) {
      if (error instanceof StatusConflictError) {
        this.logger.debug({ tenantId }, 'Provisioning claimed by another worker');
        return 'skipped';
      }
      throw error;
    }

    const { maxAttempts, schemaVersion } = this.config.provisioning;
    const total = claimed.provisioningAttempts + 1;
    try {
      const active = await this.runAttempt(claimed, schemaVersion);
      await this.registry.recordProvisioningAttempt(tenantId, { attempts: total, lastError: null });
      this.metrics.recordProvisioningAttempt('succeeded');
      this.eventBus.publish(new ProvisioningCompletedEvent(active, total));
      this.logger.info({ tenantId, attempts: total, schemaVersion }, 'Tenant provisioned');
      return 'provisioned';
    } catch (error) {
      const message = errorMessage(error);
      await this.registry.recordProvisioningAttempt(tenantId, { attempts: total, lastError: message });
      const pending = await this.tenantsService.transition(claimed, TenantStatus.PENDING);

      const willRetry = !lastAttempt && total < maxAttempts;
      this.metrics.recordProvisioningAttempt('failed');
      this.eventBus.publish(new ProvisioningFailedEvent(pending, total, message, willRetry));

      if (!willRetry) {
        throw new NonRetriableError(message, { cause: error });
      }
      this.logger.warn({ tenantId, attempt: total, error: message }, 'Provisioning attempt failed, retrying');
      throw error;
    }
  }

  /**
   * Final failure of a provisioning job: the tenant stays PENDING and an
   * operator is alerted.
   */
  async escalate(tenantId: string, cause: unknown): Promise<void> {
    const tenant = await this.registry.findById(tenantId);
    if (!tenant) {
      this.logger.warn({ tenantId }, 'Escalation for unknown tenant dropped');
      return;
    }
    const attempts = tenant.provisioningAttempts;
    this.metrics.recordProvisioningAttempt('escalated');
    this.eventBus.publish(new ProvisioningEscalatedEvent(tenant, attempts, errorMessage(cause)));
    raiseAlert(this.logger, 'Tenant provisioning escalated', new ProvisioningFailedError(tenant.id, attempts, cause), {
      tenantId: tenant.id,
      routingKey: tenant.routingKey,
      attempts,
    });
  }

  /**
   * Re-requests tenants left in PENDING with attempts to spare, and reclaims
   * PROVISIONING tenants abandoned by a previous process.
   */
  async reconcilePending(now = new Date()): Promise<number> {
    const staleBefore = new Date(now.getTime() - STALE_PROVISIONING_MS);
    const candidates = await this.registry.listNeedingProvisioning(staleBefore);
    const { maxAttempts } = this.config.provisioning;
    let scheduled = 0;

    for (const candidate of candidates) {
      if (candidate.provisioningAttempts >= maxAttempts) {
        continue;
      }
      let pending = candidate;
      if (candidate.status === TenantStatus.PROVISIONING) {
        try {
          pending = await this.tenantsService.transition(candidate, TenantStatus.PENDING);
        } catch (error) {
          if (error instanceof StatusConflictError) {
            continue;
          }
          throw error;
        }
        this.logger.warn({ tenantId: candidate.id }, 'Reclaimed stale provisioning tenant');
      }
      await this.requestProvisioning(pending);
      scheduled++;
    }
    return scheduled;
  }

  /**
   * Sends a destruction job for every tenant retired longer ago than the
   * retention window whose store still exists.
   */
  async requestStoreDestruction(now = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.provisioning.retentionMs);
    const due = await this.registry.listRetiredBefore(cutoff);
    if (due.length === 0) {
      return 0;
    }
    await this.inngest.send(
      due.map(tenant => ({ name: STORE_DESTRUCTION_REQUESTED, data: { tenantId: tenant.id } })),
    );
    return due.length;
  }

  /**
   * Destroys one retired tenant's store. A tenant with handles still checked
   * out, or opening, is left for the next sweep.
   */
  async destroyRetiredStore(tenantId: string, now = new Date()): Promise<DestroyOutcome> {
    const tenant = await this.registry.findById(tenantId);
    const cutoff = new Date(now.getTime() - this.config.provisioning.retentionMs);
    if (
      !tenant ||
      tenant.status !== TenantStatus.RETIRED ||
      tenant.storeDestroyedAt ||
      !tenant.retiredAt ||
      tenant.retiredAt > cutoff
    ) {
      return 'skipped';
    }

    if (this.switchboard.hasCheckedOutHandles(tenant.id)) {
      this.metrics.recordStoreDestruction('deferred');
      this.logger.info({ tenantId: tenant.id }, 'Store destruction deferred, handles still checked out');
      return 'deferred';
    }

    await this.switchboard.closeTenantPool(tenant.id);
    await this.executor.destroyStore(tenant);
    await this.registry.markStoreDestroyed(tenant.id, now);

    this.metrics.recordStoreDestruction('destroyed');
    this.eventBus.publish(new StoreDestroyedEvent({ ...tenant, storeDestroyedAt: now }));
    this.logger.info({ tenantId: tenant.id, location: tenant.storeLocation }, 'Retired tenant store destroyed');
    return 'destroyed';
  }

  /**
   * Final failure of a destruction job; the tenant stays listed for the next sweep.
   */
  async destructionFailed(tenantId: string, cause: unknown): Promise<void> {
    const tenant = await this.registry.findById(tenantId);
    if (!tenant) {
      return;
    }
    this.metrics.recordStoreDestruction('failed');
    this.eventBus.publish(new StoreDestructionFailedEvent(tenant, errorMessage(cause)));
    raiseAlert(this.logger, 'Retired tenant store destruction failed', cause, {
      tenantId: tenant.id,
      location: tenant.storeLocation,
    });
  }

  private async runAttempt(tenant: Tenant, schemaVersion: number): Promise<Tenant> {
    await this.executor.createStore(tenant);
    const applied = await this.executor.applySchema(tenant, schemaVersion);
    if (applied !== schemaVersion) {
      throw new Error(`Store reports schema version ${applied}, expected ${schemaVersion}`);
    }
    return this.tenantsService.transition(tenant, TenantStatus.ACTIVE, { schemaVersion: applied });
  }
}
