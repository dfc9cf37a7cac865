import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { ProvisioningService } from '../provisioning.service';
import { InngestStepContext } from './inngest.client';

/**
 * Scheduled sweep: re-requests provisioning for tenants left behind and
 * requests destruction of retired stores past their retention window.
 */
@Injectable()
export class ReconcileTenantsHandler {
  constructor(
    private readonly provisioning: ProvisioningService,
    @InjectPinoLogger(ReconcileTenantsHandler.name)
    private readonly logger: PinoLogger,
  ) {}

  async handler({ step }: { step: InngestStepContext }) {
    const rescheduled = await step.run('reschedule-pending', () => this.provisioning.reconcilePending());
    const destructionRequested = await step.run('request-store-destruction', () =>
      this.provisioning.requestStoreDestruction(),
    );

    this.logger.info({ rescheduled, destructionRequested }, 'Tenant reconciliation completed');
    return { rescheduled, destructionRequested };
  }
}
