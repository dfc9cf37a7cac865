import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject, filter } from 'rxjs';
import { Tenant, TenantStatus } from './tenant.types';

export abstract class TenantEvent {
  readonly occurredAt = new Date();

  constructor(public readonly tenant: Tenant) {}
}

/**
 * Emitted when a tenant has been registered (status PENDING).
 */
export class TenantCreatedEvent extends TenantEvent {}

/**
 * Emitted after every committed status change.
 */
export class TenantStatusChangedEvent extends TenantEvent {
  constructor(
    tenant: Tenant,
    public readonly fromStatus: TenantStatus,
    public readonly toStatus: TenantStatus,
  ) {
    super(tenant);
  }
}

/**
 * Intent: create the tenant's store and apply its schema.
 */
export class ProvisioningRequestedEvent extends TenantEvent {}

export class ProvisioningCompletedEvent extends TenantEvent {
  constructor(
    tenant: Tenant,
    public readonly attempts: number,
  ) {
    super(tenant);
  }
}

export class ProvisioningFailedEvent extends TenantEvent {
  constructor(
    tenant: Tenant,
    public readonly attempt: number,
    public readonly error: string,
    public readonly willRetry: boolean,
  ) {
    super(tenant);
  }
}

/**
 * Emitted once the attempt cap is reached; needs an operator.
 */
export class ProvisioningEscalatedEvent extends TenantEvent {
  constructor(
    tenant: Tenant,
    public readonly attempts: number,
    public readonly error: string,
  ) {
    super(tenant);
  }
}

export class StoreDestroyedEvent extends TenantEvent {}

export class StoreDestructionFailedEvent extends TenantEvent {
  constructor(
    tenant: Tenant,
    public readonly error: string,
  ) {
    super(tenant);
  }
}

type EventClass<T extends TenantEvent> = abstract new (...args: never[]) => T;

@Injectable()
export class TenantEventBus implements OnModuleDestroy {
  private readonly events$ = new Subject<TenantEvent>();

  publish(event: TenantEvent): void {
    this.events$.next(event);
  }

  ofType<T extends TenantEvent>(type: EventClass<T>): Observable<T> {
    return this.events$.pipe(filter((event): event is T => event instanceof type));
  }

  onModuleDestroy(): void {
    this.events$.complete();
  }
}
