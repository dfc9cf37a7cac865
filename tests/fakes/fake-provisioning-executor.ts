import { ProvisioningExecutor } from '../../src/provisioning/provisioning-executor.interface';
import { Tenant } from '../../src/registry/tenant.types';
import { InMemoryStoreBackend } from './in-memory-store-backend';

/**
 * Records the steps it is asked to perform and creates or drops stores on an
 * in-memory backend. Failures are queued per step.
 */
export class FakeProvisioningExecutor implements ProvisioningExecutor {
  readonly calls: string[] = [];
  readonly createFailures: Error[] = [];
  readonly destroyFailures: Error[] = [];
  /** Version reported by applySchema; defaults to the requested one. */
  reportedVersion: number | null = null;

  constructor(private readonly stores?: InMemoryStoreBackend) {}

  async createStore(tenant: Tenant): Promise<void> {
    this.calls.push(`create:${tenant.storeLocation}`);
    const failure = this.createFailures.shift();
    if (failure) {
      throw failure;
    }
    this.stores?.createStore(tenant.storeLocation);
  }

  async applySchema(tenant: Tenant, targetVersion: number): Promise<number> {
    this.calls.push(`schema:${tenant.storeLocation}`);
    return this.reportedVersion ?? targetVersion;
  }

  async destroyStore(tenant: Tenant): Promise<void> {
    this.calls.push(`destroy:${tenant.storeLocation}`);
    const failure = this.destroyFailures.shift();
    if (failure) {
      throw failure;
    }
    this.stores?.dropStore(tenant.storeLocation);
  }
}
