import { PinoLogger } from 'nestjs-pino';
import { Tenant, TenantStatus } from '../../src/registry/tenant.types';

export function buildTenant(overrides: Partial<Tenant> = {}): Tenant {
  const createdAt = new Date('2026-01-01T00:00:00Z');
  return {
    id: 'tenant-acme',
    name: 'Acme',
    routingKey: 'acme',
    storeLocation: 'db_acme',
    status: TenantStatus.ACTIVE,
    schemaVersion: 1,
    provisioningAttempts: 1,
    lastProvisioningError: null,
    createdAt,
    updatedAt: createdAt,
    suspendedAt: null,
    retiredAt: null,
    storeDestroyedAt: null,
    ...overrides,
  };
}

export type MockLogger = {
  [K in 'info' | 'warn' | 'error' | 'debug']: jest.Mock;
};

export function createMockLogger(): MockLogger {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

export function asPinoLogger(logger: MockLogger): PinoLogger {
  return logger as unknown as PinoLogger;
}
