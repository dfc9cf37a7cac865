import { ParsedHost } from '../resolver/host-parser';
import { Tenant } from '../registry/tenant.types';
import { StoreHandle } from '../switchboard/store-handle';

/**
 * Everything a request needs to touch tenant data: the tenant it was resolved
 * to and the one store handle bound for it. Fixed at construction; a context
 * never switches tenants.
 */
export class BoundTenantContext {
  constructor(
    readonly tenant: Tenant,
    readonly host: ParsedHost,
    readonly store: StoreHandle,
  ) {}

  get tenantId(): string {
    return this.tenant.id;
  }

  get isReleased(): boolean {
    return this.store.isReleased;
  }

  /** Returns the store handle to its pool. Safe to call more than once. */
  release(): void {
    this.store.release();
  }
}
