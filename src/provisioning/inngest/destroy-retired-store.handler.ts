import { Injectable } from '@nestjs/common';
import { ProvisioningService } from '../provisioning.service';
import { TenantJobContext, TenantJobFailureContext } from './inngest.client';

export const DESTROY_STORE_RETRIES = 3;

@Injectable()
export class DestroyRetiredStoreHandler {
  constructor(private readonly provisioning: ProvisioningService) {}

  async handler({ event, step }: TenantJobContext) {
    const { tenantId } = event.data;

    const outcome = await step.run('destroy-store', () => this.provisioning.destroyRetiredStore(tenantId));

    return { tenantId, outcome };
  }

  async onFailure({ event, error, step }: TenantJobFailureContext) {
    const { tenantId } = event.data.event.data;

    await step.run('report-failure', () => this.provisioning.destructionFailed(tenantId, error));
  }
}
