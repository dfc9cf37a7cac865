import { Module } from '@nestjs/common';
import { SwitchboardModule } from '../switchboard/switchboard.module';
import { DestroyRetiredStoreHandler } from './inngest/destroy-retired-store.handler';
import { INNGEST_CLIENT, inngest } from './inngest/inngest.client';
import { ProvisionTenantHandler } from './inngest/provision-tenant.handler';
import { ProvisioningFunctions } from './inngest/provisioning.functions';
import { ReconcileTenantsHandler } from './inngest/reconcile-tenants.handler';
import { PgProvisioningExecutor } from './pg-provisioning-executor';
import { PROVISIONING_EXECUTOR } from './provisioning-executor.interface';
import { ProvisioningService } from './provisioning.service';

@Module({
  imports: [SwitchboardModule],
  providers: [
    { provide: PROVISIONING_EXECUTOR, useClass: PgProvisioningExecutor },
    { provide: INNGEST_CLIENT, useValue: inngest },
    ProvisioningService,
    ProvisionTenantHandler,
    ReconcileTenantsHandler,
    DestroyRetiredStoreHandler,
    ProvisioningFunctions,
  ],
  exports: [ProvisioningService, ProvisioningFunctions],
})
export class ProvisioningModule {}
