import {
  AuditEntry,
  NewAuditEntry,
  NewTenant,
  ProvisioningAttempt,
  StatusChangeFields,
  Tenant,
  TenantStatus,
} from './tenant.types';

export const TENANT_REGISTRY = Symbol('TENANT_REGISTRY');

/**
 * Persistence contract of the shared tenant registry. The registry is never
 * tenant-scoped; it is the single source of truth for routing key → store.
 */
export interface TenantRegistry {
  findByRoutingKey(routingKey: string): Promise<Tenant | null>;
  findById(id: string): Promise<Tenant | null>;
  list(options?: { take?: number; skip?: number }): Promise<Tenant[]>;
  /** Inserts a tenant in PENDING. Rejects when the routing key or store location is taken. */
  create(input: NewTenant): Promise<Tenant>;
  /**
   * Atomically moves a tenant from `expected` to `next`. Resolves to null when
   * the stored status was no longer `expected` (a concurrent writer won).
   */
  compareAndSetStatus(
    id: string,
    expected: TenantStatus,
    next: TenantStatus,
    fields?: StatusChangeFields,
  ): Promise<Tenant | null>;
  recordProvisioningAttempt(id: string, attempt: ProvisioningAttempt): Promise<void>;
  /** PENDING tenants, plus PROVISIONING tenants whose last update is older than `staleBefore`. */
  listNeedingProvisioning(staleBefore: Date): Promise<Tenant[]>;
  /** RETIRED tenants retired before `cutoff` whose store still exists. */
  listRetiredBefore(cutoff: Date): Promise<Tenant[]>;
  markStoreDestroyed(id: string, at: Date): Promise<void>;
  appendAudit(entry: NewAuditEntry): Promise<AuditEntry>;
  listAudit(tenantId: string, options?: { take?: number }): Promise<AuditEntry[]>;
  ping(): Promise<void>;
}
