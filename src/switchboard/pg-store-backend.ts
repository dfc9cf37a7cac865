import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { Client } from 'pg';
import { tenancyConfig } from '../config/tenancy.config';
import { StoreBackend, StoreQueryResult, StoreRow, StoreSession } from './store-backend.interface';
import { connectionStringFor } from './store-location';

// Socket-level failures and SQLSTATE 57P0x (server shutting down); class 08 is matched by prefix.
const CONNECTION_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ETIMEDOUT', '57P01', '57P02', '57P03']);

export function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    return CONNECTION_ERROR_CODES.has(error.code) || error.code.startsWith('08');
  }
  return /connection terminated|not queryable/i.test(error.message);
}

class PgStoreSession implements StoreSession {
  private failed = false;

  constructor(
    readonly location: string,
    private readonly client: Client,
    onError: (error: Error) => void,
  ) {
    client.on('error', error => {
      this.failed = true;
      onError(error);
    });
  }

  get healthy(): boolean {
    return !this.failed;
  }

  async query<R extends StoreRow = StoreRow>(text: string, params?: readonly unknown[]): Promise<StoreQueryResult<R>> {
    try {
      const result = await this.client.query<R>(text, params ? [...params] : undefined);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (error) {
      if (isConnectionFailure(error)) {
        this.failed = true;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * One `pg.Client` per session, connected to the tenant's own database on the
 * tenant server. Pooling is left to the switchboard.
 */
@Injectable()
export class PgStoreBackend implements StoreBackend {
  constructor(
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    @InjectPinoLogger(PgStoreBackend.name)
    private readonly logger: PinoLogger,
  ) {}

  async openSession(location: string): Promise<StoreSession> {
    const client = new Client({
      connectionString: connectionStringFor(this.config.tenantDatabaseUrl, location),
      connectionTimeoutMillis: this.config.pool.acquireTimeoutMs,
    });

    await client.connect();
    return new PgStoreSession(location, client, error =>
      this.logger.warn({ location, error: error.message }, 'Tenant store connection lost'),
    );
  }
}
