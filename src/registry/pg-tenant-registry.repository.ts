import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { REGISTRY_POOL } from '../database/database.module';
import { TenantRegistry } from './tenant-registry.interface';
import {
  AuditEntry,
  AuditSeverity,
  NewAuditEntry,
  NewTenant,
  ProvisioningAttempt,
  StatusChangeFields,
  Tenant,
  TenantStatus,
} from './tenant.types';

// pg row types must be type aliases to satisfy QueryResultRow.
type TenantRow = {
  id: string;
  name: string;
  routing_key: string;
  store_location: string;
  status: TenantStatus;
  schema_version: number | null;
  provisioning_attempts: number;
  last_provisioning_error: string | null;
  created_at: Date;
  updated_at: Date;
  suspended_at: Date | null;
  retired_at: Date | null;
  store_destroyed_at: Date | null;
};

type AuditRow = {
  id: string;
  tenant_id: string;
  action: string;
  severity: AuditSeverity;
  metadata: Record<string, unknown>;
  created_at: Date;
};

const TENANT_COLUMNS = `id, name, routing_key, store_location, status, schema_version,
  provisioning_attempts, last_provisioning_error, created_at, updated_at,
  suspended_at, retired_at, store_destroyed_at`;

function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    routingKey: row.routing_key,
    storeLocation: row.store_location,
    status: row.status,
    schemaVersion: row.schema_version,
    provisioningAttempts: row.provisioning_attempts,
    lastProvisioningError: row.last_provisioning_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    suspendedAt: row.suspended_at,
    retiredAt: row.retired_at,
    storeDestroyedAt: row.store_destroyed_at,
  };
}

function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    action: row.action,
    severity: row.severity,
    metadata: row.metadata,
    createdAt: row.created_at,
  };
}

/**
 * Registry persistence on Postgres. Every status write is a single
 * compare-and-set statement so concurrent transitions cannot interleave.
 */
@Injectable()
export class PgTenantRegistryRepository implements TenantRegistry {
  constructor(@Inject(REGISTRY_POOL) private readonly pool: Pool) {}

  async findByRoutingKey(routingKey: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants WHERE routing_key = $1`,
      [routingKey],
    );
    return result.rows.length > 0 ? toTenant(result.rows[0]) : null;
  }

  async findById(id: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants WHERE id = $1`,
      [id],
    );
    return result.rows.length > 0 ? toTenant(result.rows[0]) : null;
  }

  async list(options?: { take?: number; skip?: number }): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants ORDER BY created_at DESC LIMIT $1 OFFSET $2`,
      [options?.take ?? 100, options?.skip ?? 0],
    );
    return result.rows.map(toTenant);
  }

  async create(input: NewTenant): Promise<Tenant> {
    const result = await this.pool.query<TenantRow>(
      `INSERT INTO tenants (name, routing_key, store_location, status)
       VALUES ($1, $2, $3, $4)
       RETURNING ${TENANT_COLUMNS}`,
      [input.name, input.routingKey, input.storeLocation, TenantStatus.PENDING],
    );
    return toTenant(result.rows[0]);
  }

  async compareAndSetStatus(
    id: string,
    expected: TenantStatus,
    next: TenantStatus,
    fields: StatusChangeFields = {},
  ): Promise<Tenant | null> {
    const assignments = ['status = $3', 'updated_at = now()'];
    const values: unknown[] = [id, expected, next];

    if (fields.schemaVersion !== undefined) {
      values.push(fields.schemaVersion);
      assignments.push(`schema_version = $${values.length}`);
    }
    if (fields.suspendedAt !== undefined) {
      values.push(fields.suspendedAt);
      assignments.push(`suspended_at = $${values.length}`);
    }
    if (fields.retiredAt !== undefined) {
      values.push(fields.retiredAt);
      assignments.push(`retired_at = $${values.length}`);
    }

    const result = await this.pool.query<TenantRow>(
      `UPDATE tenants SET ${assignments.join(', ')}
       WHERE id = $1 AND status = $2
       RETURNING ${TENANT_COLUMNS}`,
      values,
    );
    return result.rows.length > 0 ? toTenant(result.rows[0]) : null;
  }

  async recordProvisioningAttempt(id: string, attempt: ProvisioningAttempt): Promise<void> {
    await this.pool.query(
      `UPDATE tenants
       SET provisioning_attempts = $2, last_provisioning_error = $3, updated_at = now()
       WHERE id = $1`,
      [id, attempt.attempts, attempt.lastError],
    );
  }

  async listNeedingProvisioning(staleBefore: Date): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants
       WHERE status = $1 OR (status = $2 AND updated_at < $3)
       ORDER BY created_at ASC`,
      [TenantStatus.PENDING, TenantStatus.PROVISIONING, staleBefore],
    );
    return result.rows.map(toTenant);
  }

  async listRetiredBefore(cutoff: Date): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants
       WHERE status = $1 AND retired_at < $2 AND store_destroyed_at IS NULL
       ORDER BY retired_at ASC`,
      [TenantStatus.RETIRED, cutoff],
    );
    return result.rows.map(toTenant);
  }

  async markStoreDestroyed(id: string, at: Date): Promise<void> {
    await this.pool.query(
      'UPDATE tenants SET store_destroyed_at = $2, updated_at = now() WHERE id = $1',
      [id, at],
    );
  }

  async appendAudit(entry: NewAuditEntry): Promise<AuditEntry> {
    const result = await this.pool.query<AuditRow>(
      `INSERT INTO tenant_audit_log (tenant_id, action, severity, metadata)
       VALUES ($1, $2, $3, $4)
       RETURNING id, tenant_id, action, severity, metadata, created_at`,
      [entry.tenantId, entry.action, entry.severity, JSON.stringify(entry.metadata ?? {})],
    );
    return toAuditEntry(result.rows[0]);
  }

  async listAudit(tenantId: string, options?: { take?: number }): Promise<AuditEntry[]> {
    const result = await this.pool.query<AuditRow>(
      `SELECT id, tenant_id, action, severity, metadata, created_at
       FROM tenant_audit_log WHERE tenant_id = $1
       ORDER BY created_at DESC LIMIT $2`,
      [tenantId, options?.take ?? 50],
    );
    return result.rows.map(toAuditEntry);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
