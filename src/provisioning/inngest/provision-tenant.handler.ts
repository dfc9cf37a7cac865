import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { tenancyConfig } from '../../config/tenancy.config';
import { ProvisioningService } from '../provisioning.service';
import { retriesFor, TenantJobContext, TenantJobFailureContext } from './inngest.client';

/**
 * `provision-tenant`: one run per provisioning request, at most one at a time
 * per tenant. Each retry of the step is a fresh attempt with the runner's
 * backoff in between; the last failure escalates to an operator.
 */
@Injectable()
export class ProvisionTenantHandler {
  constructor(
    private readonly provisioning: ProvisioningService,
    @Inject(tenancyConfig.KEY) private readonly config: ConfigType<typeof tenancyConfig>,
    @InjectPinoLogger(ProvisionTenantHandler.name)
    private readonly logger: PinoLogger,
  ) {}

  get retries(): number {
    return retriesFor(this.config.provisioning.maxAttempts);
  }

  async handler({ event, step, attempt }: TenantJobContext) {
    const { tenantId } = event.data;
    this.logger.info({ tenantId, attempt }, 'Processing provisioning request');

    const outcome = await step.run('provision-store', () =>
      this.provisioning.provisionAttempt(tenantId, attempt >= this.retries),
    );

    return { tenantId, outcome };
  }

  async onFailure({ event, error, step }: TenantJobFailureContext) {
    const { tenantId } = event.data.event.data;

    await step.run('escalate', () => this.provisioning.escalate(tenantId, error));
  }
}
