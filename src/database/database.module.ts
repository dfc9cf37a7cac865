import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Pool } from 'pg';
import { tenancyConfig } from '../config/tenancy.config';

export const REGISTRY_POOL = Symbol('REGISTRY_POOL');

/**
 * Connection pool to the shared registry database. Tenant stores are never
 * reached through this pool.
 */
@Global()
@Module({
  providers: [
    {
      provide: REGISTRY_POOL,
      inject: [tenancyConfig.KEY],
      useFactory: (config: ConfigType<typeof tenancyConfig>) =>
        new Pool({
          connectionString: config.registryDatabaseUrl,
          max: 10,
          idleTimeoutMillis: 30_000,
          connectionTimeoutMillis: 10_000,
        }),
    },
  ],
  exports: [REGISTRY_POOL],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(REGISTRY_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
