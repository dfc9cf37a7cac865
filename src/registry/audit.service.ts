import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { Subscription } from 'rxjs';
import { TENANT_REGISTRY, TenantRegistry } from './tenant-registry.interface';
import {
  ProvisioningCompletedEvent,
  ProvisioningEscalatedEvent,
  ProvisioningFailedEvent,
  StoreDestroyedEvent,
  StoreDestructionFailedEvent,
  TenantCreatedEvent,
  TenantEventBus,
  TenantStatusChangedEvent,
} from './tenant.events';
import { AuditEntry, NewAuditEntry, TenantStatus } from './tenant.types';

/**
 * Writes one audit row per tenant lifecycle event. A failed write is logged
 * and never reaches the code that published the event.
 */
@Injectable()
export class AuditService implements OnModuleInit, OnModuleDestroy {
  private subscriptions: Subscription[] = [];

  constructor(
    @Inject(TENANT_REGISTRY) private readonly registry: TenantRegistry,
    private readonly eventBus: TenantEventBus,
    @InjectPinoLogger(AuditService.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit(): void {
    this.subscriptions = [
      this.eventBus.ofType(TenantCreatedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'TENANT_CREATED',
          severity: 'INFO',
          metadata: { name: event.tenant.name, routingKey: event.tenant.routingKey },
        }),
      ),
      this.eventBus.ofType(TenantStatusChangedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'TENANT_STATUS_CHANGED',
          severity:
            event.toStatus === TenantStatus.SUSPENDED || event.toStatus === TenantStatus.RETIRED ? 'WARN' : 'INFO',
          metadata: { from: event.fromStatus, to: event.toStatus },
        }),
      ),
      this.eventBus.ofType(ProvisioningCompletedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'PROVISIONING_COMPLETED',
          severity: 'INFO',
          metadata: { attempts: event.attempts, schemaVersion: event.tenant.schemaVersion },
        }),
      ),
      this.eventBus.ofType(ProvisioningFailedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'PROVISIONING_FAILED',
          severity: 'WARN',
          metadata: { attempt: event.attempt, error: event.error, willRetry: event.willRetry },
        }),
      ),
      this.eventBus.ofType(ProvisioningEscalatedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'PROVISIONING_ESCALATED',
          severity: 'CRITICAL',
          metadata: { attempts: event.attempts, error: event.error },
        }),
      ),
      this.eventBus.ofType(StoreDestroyedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'STORE_DESTROYED',
          severity: 'INFO',
          metadata: { storeLocation: event.tenant.storeLocation },
        }),
      ),
      this.eventBus.ofType(StoreDestructionFailedEvent).subscribe(event =>
        this.record({
          tenantId: event.tenant.id,
          action: 'STORE_DESTRUCTION_FAILED',
          severity: 'CRITICAL',
          metadata: { storeLocation: event.tenant.storeLocation, error: event.error },
        }),
      ),
    ];
  }

  onModuleDestroy(): void {
    this.subscriptions.forEach(subscription => subscription.unsubscribe());
    this.subscriptions = [];
  }

  findForTenant(tenantId: string, take?: number): Promise<AuditEntry[]> {
    return this.registry.listAudit(tenantId, { take });
  }

  private record(entry: NewAuditEntry): void {
    void this.registry.appendAudit(entry).then(
      () => this.logger.debug({ tenantId: entry.tenantId, action: entry.action }, 'Audit entry recorded'),
      (error: unknown) =>
        this.logger.error(
          {
            tenantId: entry.tenantId,
            action: entry.action,
            error: error instanceof Error ? error.message : String(error),
          },
          'Failed to record audit entry',
        ),
    );
  }
}
