import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { tenancyConfig } from '../../config/tenancy.config';
import { DESTROY_STORE_RETRIES, DestroyRetiredStoreHandler } from './destroy-retired-store.handler';
import {
  INNGEST_CLIENT,
  PROVISION_REQUESTED,
  retriesFor,
  STORE_DESTRUCTION_REQUESTED,
  TenantJobsClient,
} from './inngest.client';
import { ProvisionTenantHandler } from './provision-tenant.handler';
import { ReconcileTenantsHandler } from './reconcile-tenants.handler';

/**
 * Binds the handlers to their Inngest functions. The result is what the
 * serve endpoint registers.
 */
@Injectable()
export class ProvisioningFunctions {
  constructor(
    @Inject(INNGEST_CLIENT) readonly client: TenantJobsClient,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    private readonly provisionTenant: ProvisionTenantHandler,
    private readonly reconcileTenants: ReconcileTenantsHandler,
    private readonly destroyRetiredStore: DestroyRetiredStoreHandler,
  ) {}

  all() {
    const perTenant = { key: 'event.data.tenantId', limit: 1 };

    return [
      this.client.createFunction(
        {
          id: 'provision-tenant',
          name: 'Provision Tenant',
          retries: retriesFor(this.config.provisioning.maxAttempts),
          concurrency: perTenant,
          onFailure: ({ event, error, step }) => this.provisionTenant.onFailure({ event, error, step }),
        },
        { event: PROVISION_REQUESTED },
        ({ event, step, attempt }) => this.provisionTenant.handler({ event, step, attempt }),
      ),
      this.client.createFunction(
        { id: 'reconcile-tenants', name: 'Reconcile Tenants', concurrency: 1 },
        { cron: this.config.provisioning.sweepCron },
        ({ step }) => this.reconcileTenants.handler({ step }),
      ),
      this.client.createFunction(
        {
          id: 'destroy-retired-store',
          name: 'Destroy Retired Store',
          retries: DESTROY_STORE_RETRIES,
          concurrency: perTenant,
          onFailure: ({ event, error, step }) => this.destroyRetiredStore.onFailure({ event, error, step }),
        },
        { event: STORE_DESTRUCTION_REQUESTED },
        ({ event, step, attempt }) => this.destroyRetiredStore.handler({ event, step, attempt }),
      ),
    ];
  }
}
