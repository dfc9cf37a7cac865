import { asPinoLogger, createMockLogger, MockLogger } from '../../../tests/fakes/tenant.fixtures';
import { ProvisioningService } from '../provisioning.service';
import { ReconcileTenantsHandler } from './reconcile-tenants.handler';

describe('ReconcileTenantsHandler', () => {
  let handler: ReconcileTenantsHandler;
  let logger: MockLogger;
  let provisioning: { reconcilePending: jest.Mock; requestStoreDestruction: jest.Mock };

  const mockStep = {
    run: jest.fn().mockImplementation(async (_name: string, fn: () => Promise<unknown>) => fn()),
  };

  beforeEach(() => {
    jest.clearAllMocks();
    logger = createMockLogger();
    provisioning = {
      reconcilePending: jest.fn().mockResolvedValue(2),
      requestStoreDestruction: jest.fn().mockResolvedValue(1),
    };
    handler = new ReconcileTenantsHandler(provisioning as unknown as ProvisioningService, asPinoLogger(logger));
  });

  it('should reschedule pending tenants before requesting store destruction', async () => {
    const result = await handler.handler({ step: mockStep });

    expect(mockStep.run.mock.calls.map(call => call[0])).toEqual(['reschedule-pending', 'request-store-destruction']);
    expect(result).toEqual({ rescheduled: 2, destructionRequested: 1 });
    expect(logger.info).toHaveBeenCalledWith(
      { rescheduled: 2, destructionRequested: 1 },
      'Tenant reconciliation completed',
    );
  });

  it('should not request destruction when rescheduling fails', async () => {
    provisioning.reconcilePending.mockRejectedValue(new Error('registry unavailable'));

    await expect(handler.handler({ step: mockStep })).rejects.toThrow('registry unavailable');
    expect(provisioning.requestStoreDestruction).not.toHaveBeenCalled();
  });
});
