export enum TenantStatus {
  /** Registered; the physical store has not been created yet (or the last attempt failed) */
  PENDING = 'PENDING',
  /** Store creation and schema application are in progress */
  PROVISIONING = 'PROVISIONING',
  ACTIVE = 'ACTIVE',
  /** Blocked by billing or abuse policy, data preserved */
  SUSPENDED = 'SUSPENDED',
  /** Offboarded; terminal. The store is destroyed once the retention window has elapsed */
  RETIRED = 'RETIRED',
}

export interface Tenant {
  id: string;
  name: string;
  /** Subdomain label (`acme`) or a full custom host (`shop.acme.io`) */
  routingKey: string;
  /** Name of the physical database owned by this tenant */
  storeLocation: string;
  status: TenantStatus;
  /** Schema version applied to the store, null until provisioning completes */
  schemaVersion: number | null;
  provisioningAttempts: number;
  lastProvisioningError: string | null;
  createdAt: Date;
  updatedAt: Date;
  suspendedAt: Date | null;
  retiredAt: Date | null;
  storeDestroyedAt: Date | null;
}

export interface NewTenant {
  name: string;
  routingKey: string;
  storeLocation: string;
}

/**
 * Fields written together with a status change. Applied in the same
 * compare-and-set statement as the status itself.
 */
export interface StatusChangeFields {
  schemaVersion?: number | null;
  suspendedAt?: Date | null;
  retiredAt?: Date | null;
}

export interface ProvisioningAttempt {
  attempts: number;
  lastError: string | null;
}

export type AuditSeverity = 'INFO' | 'WARN' | 'CRITICAL';

export interface AuditEntry {
  id: string;
  tenantId: string;
  action: string;
  severity: AuditSeverity;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface NewAuditEntry {
  tenantId: string;
  action: string;
  severity: AuditSeverity;
  metadata?: Record<string, unknown>;
}
