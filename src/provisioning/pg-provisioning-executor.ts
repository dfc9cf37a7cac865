import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { join } from 'path';
import { Client } from 'pg';
import { tenancyConfig } from '../config/tenancy.config';
import { Tenant } from '../registry/tenant.types';
import { STORE_BACKEND, StoreBackend } from '../switchboard/store-backend.interface';
import { assertStoreLocation } from '../switchboard/store-location';
import { ProvisioningExecutor } from './provisioning-executor.interface';

export const TENANT_SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'tenant-schema.sql');

// pg row types must be type aliases to satisfy QueryResultRow.
type SchemaVersionRow = { version: number | null };

function quoteIdentifier(location: string): string {
  return `"${assertStoreLocation(location)}"`;
}

/**
 * Creates and drops tenant databases on the tenant server and applies the
 * tenant schema through a short-lived store session.
 */
@Injectable()
export class PgProvisioningExecutor implements ProvisioningExecutor {
  private schemaSql: Promise<string> | null = null;

  constructor(
    @Inject(STORE_BACKEND) private readonly backend: StoreBackend,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    @InjectPinoLogger(PgProvisioningExecutor.name)
    private readonly logger: PinoLogger,
  ) {}

  async createStore(tenant: Tenant): Promise<void> {
    await this.withServerClient(async client => {
      const existing = await client.query('SELECT 1 FROM pg_database WHERE datname = $1', [tenant.storeLocation]);
      if (existing.rowCount) {
        this.logger.info({ tenantId: tenant.id, location: tenant.storeLocation }, 'Tenant database already exists');
        return;
      }
      // CREATE DATABASE takes no bind parameters; the location is validated before quoting.
      await client.query(`CREATE DATABASE ${quoteIdentifier(tenant.storeLocation)}`);
      this.logger.info({ tenantId: tenant.id, location: tenant.storeLocation }, 'Tenant database created');
    });
  }

  async applySchema(tenant: Tenant, targetVersion: number): Promise<number> {
    const sql = await this.loadSchema();
    const session = await this.backend.openSession(tenant.storeLocation);
    try {
      await session.query(sql);
      await session.query(
        'INSERT INTO schema_info (version) SELECT $1::integer WHERE NOT EXISTS (SELECT 1 FROM schema_info WHERE version >= $1::integer)',
        [targetVersion],
      );
      const { rows } = await session.query<SchemaVersionRow>('SELECT max(version) AS version FROM schema_info');
      return rows[0]?.version ?? 0;
    } finally {
      await session.close();
    }
  }

  async destroyStore(tenant: Tenant): Promise<void> {
    await this.withServerClient(async client => {
      await client.query(`DROP DATABASE IF EXISTS ${quoteIdentifier(tenant.storeLocation)}`);
    });
    this.logger.info({ tenantId: tenant.id, location: tenant.storeLocation }, 'Tenant database dropped');
  }

  private loadSchema(): Promise<string> {
    if (!this.schemaSql) {
      this.schemaSql = readFile(TENANT_SCHEMA_PATH, 'utf8').catch((error: unknown) => {
        this.schemaSql = null;
        throw error;
      });
    }
    return this.schemaSql;
  }

  private async withServerClient<T>(work: (client: Client) => Promise<T>): Promise<T> {
    const client = new Client({ connectionString: this.config.tenantDatabaseUrl });
    await client.connect();
    try {
      return await work(client);
    } finally {
      await client.end();
    }
  }
}
