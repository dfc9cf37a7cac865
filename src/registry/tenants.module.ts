import { Global, Module } from '@nestjs/common';
import { AuditService } from './audit.service';
import { PgTenantRegistryRepository } from './pg-tenant-registry.repository';
import { TENANT_REGISTRY } from './tenant-registry.interface';
import { TenantEventBus } from './tenant.events';
import { TenantsController } from './tenants.controller';
import { TenantsService } from './tenants.service';

/**
 * Tenant registry: persistence, lifecycle writes, the lifecycle event stream
 * and the operator API. Global, since the resolver and provisioning read from it.
 */
@Global()
@Module({
  controllers: [TenantsController],
  providers: [
    { provide: TENANT_REGISTRY, useClass: PgTenantRegistryRepository },
    TenantEventBus,
    TenantsService,
    AuditService,
  ],
  exports: [TENANT_REGISTRY, TenantEventBus, TenantsService],
})
export class TenantsModule {}
