import { Tenant } from '../registry/tenant.types';

export const PROVISIONING_EXECUTOR = Symbol('PROVISIONING_EXECUTOR');

/**
 * Performs the physical steps of the tenant lifecycle. Every step is
 * idempotent so an interrupted attempt can simply be run again.
 */
export interface ProvisioningExecutor {
  createStore(tenant: Tenant): Promise<void>;
  /** Brings the store schema up to `targetVersion`; resolves to the version the store now reports. */
  applySchema(tenant: Tenant, targetVersion: number): Promise<number>;
  destroyStore(tenant: Tenant): Promise<void>;
}
