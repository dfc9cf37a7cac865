import { Test, TestingModule } from '@nestjs/testing';
import * as Sentry from '@sentry/nestjs';
import { register } from 'prom-client';
import { PoolExhaustedError, RequestAbortedError, StoreUnavailableError } from '../common/errors/tenancy.errors';
import { tenancyConfig } from '../config/tenancy.config';
import { MetricsService } from '../metrics/metrics.service';
import { InMemoryStoreBackend } from '../../tests/fakes/in-memory-store-backend';
import { asPinoLogger, buildTenant, createMockLogger, MockLogger } from '../../tests/fakes/tenant.fixtures';
import { buildTenancyConfig } from '../../tests/fakes/tenancy-config';
import { STORE_BACKEND } from './store-backend.interface';
import { StoreSwitchboardService } from './store-switchboard.service';

const mockScope = { setTag: jest.fn(), setExtras: jest.fn() };

jest.mock('@sentry/nestjs', () => ({
  withScope: jest.fn((callback: (scope: unknown) => void) => callback(mockScope)),
  captureException: jest.fn(),
}));

describe('StoreSwitchboardService', () => {
  let module: TestingModule;
  let switchboard: StoreSwitchboardService;
  let backend: InMemoryStoreBackend;
  let logger: MockLogger;

  const tenantA = buildTenant({ id: 'A', routingKey: 'alpha', storeLocation: 'db_a' });
  const tenantB = buildTenant({ id: 'B', routingKey: 'beta', storeLocation: 'db_b' });
  const tenantC = buildTenant({ id: 'C', routingKey: 'gamma', storeLocation: 'db_c' });

  const flush = () => new Promise<void>(resolve => setImmediate(resolve));

  beforeEach(async () => {
    jest.clearAllMocks();
    register.clear();
    backend = new InMemoryStoreBackend(['db_a', 'db_b', 'db_c']);
    logger = createMockLogger();

    module = await Test.createTestingModule({
      providers: [
        StoreSwitchboardService,
        MetricsService,
        { provide: STORE_BACKEND, useValue: backend },
        {
          provide: tenancyConfig.KEY,
          useValue: buildTenancyConfig({ pool: { maxSessions: 2, acquireTimeoutMs: 50, maxTenantPools: 2 } }),
        },
        { provide: `PinoLogger:${StoreSwitchboardService.name}`, useValue: logger },
      ],
    }).compile();
    await module.init();

    switchboard = module.get(StoreSwitchboardService);
  });

  afterEach(async () => {
    await module.close();
    register.clear();
  });

  it('should bind a handle to the tenant store and return the session on release', async () => {
    const handle = await switchboard.acquire(tenantA);

    expect(handle.tenantId).toBe('A');
    expect(handle.location).toBe('db_a');
    await handle.query('SELECT 1');
    expect(backend.sessions[0].location).toBe('db_a');

    handle.release();

    expect(switchboard.stats().tenants).toEqual([
      expect.objectContaining({ tenantId: 'A', location: 'db_a', inUse: 0, idle: 1 }),
    ]);
  });

  it('should keep data written through one tenant invisible to another', async () => {
    const a = await switchboard.acquire(tenantA);
    const b = await switchboard.acquire(tenantB);

    await a.query('INSERT INTO notes (body) VALUES ($1) RETURNING id, body, created_at', ['alpha secret']);
    const fromB = await b.query('SELECT id, body, created_at FROM notes ORDER BY id DESC LIMIT $1', [10]);
    const fromA = await a.query('SELECT id, body, created_at FROM notes ORDER BY id DESC LIMIT $1', [10]);

    expect(fromB.rows).toEqual([]);
    expect(fromA.rows).toEqual([expect.objectContaining({ body: 'alpha secret' })]);
    a.release();
    b.release();
  });

  it('should release a handle only once', async () => {
    const handle = await switchboard.acquire(tenantA);

    expect(handle.release()).toBe(true);
    expect(handle.release()).toBe(false);
    expect(switchboard.hasCheckedOutHandles('A')).toBe(false);
    await expect(handle.query('SELECT 1')).rejects.toThrow('already been released');
  });

  it('should retry opening a session before succeeding', async () => {
    backend.failNextOpens = 2;

    const handle = await switchboard.acquire(tenantA);

    expect(backend.sessions).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ tenantId: 'A', attempt: 1 }),
      'Opening tenant store session failed, retrying',
    );
    handle.release();
  });

  it('should surface an unreachable store as StoreUnavailable with an operator alert', async () => {
    backend.unreachable.add('db_a');

    const error = await switchboard.acquire(tenantA).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ code: 'store_unavailable', tenantId: 'A' });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        alert: true,
        tenantId: 'A',
        location: 'db_a',
        cause: 'connect ECONNREFUSED for db_a',
      }),
      'Tenant store unreachable',
    );
    expect(Sentry.captureException).toHaveBeenCalledWith(error);
    expect(mockScope.setTag).toHaveBeenCalledWith('tenantId', 'A');
  });

  it('should not let one unreachable store affect another tenant', async () => {
    backend.unreachable.add('db_a');
    await expect(switchboard.acquire(tenantA)).rejects.toBeInstanceOf(StoreUnavailableError);

    const handle = await switchboard.acquire(tenantB);

    await expect(handle.query('SELECT 1')).resolves.toEqual({ rows: [{ '?column?': 1 }], rowCount: 1 });
    handle.release();
  });

  it('should fail with PoolExhausted when every session is checked out', async () => {
    const tenantT3 = buildTenant({ id: 'T3', routingKey: 'busy', storeLocation: 'db_c' });
    const first = await switchboard.acquire(tenantT3);
    const second = await switchboard.acquire(tenantT3);

    const error = await switchboard.acquire(tenantT3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PoolExhaustedError);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ tenantId: 'T3' }),
      'Tenant pool exhausted',
    );
    expect(backend.sessions).toHaveLength(2);
    first.release();
    second.release();
  });

  it('should refuse to acquire for an already aborted request', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client disconnected'));

    await expect(switchboard.acquire(tenantA, controller.signal)).rejects.toThrow('client disconnected');
    expect(backend.sessions).toHaveLength(0);
  });

  it('should stop retrying a store open once the request is aborted', async () => {
    const patient = new StoreSwitchboardService(
      backend,
      buildTenancyConfig({ store: { openRetries: 5, retryBaseMs: 50 } }),
      module.get(MetricsService),
      asPinoLogger(logger),
    );
    backend.unreachable.add('db_a');
    const controller = new AbortController();

    const acquiring = patient.acquire(tenantA, controller.signal);
    await flush();
    controller.abort(new RequestAbortedError());

    await expect(acquiring).rejects.toBeInstanceOf(RequestAbortedError);
    await new Promise(resolve => setTimeout(resolve, 80));
    expect(backend.openAttempts).toBe(1);
    expect(logger.error).not.toHaveBeenCalled();
    expect(patient.hasCheckedOutHandles('A')).toBe(false);
  });

  it('should count a session still being opened as checked out', async () => {
    const acquiring = switchboard.acquire(tenantA);

    expect(switchboard.hasCheckedOutHandles('A')).toBe(true);
    (await acquiring).release();
    expect(switchboard.hasCheckedOutHandles('A')).toBe(false);
  });

  it('should alert when a checked-out session loses its connection', async () => {
    const handle = await switchboard.acquire(tenantA);
    backend.connectionLost = true;

    const error = await handle.query('SELECT 1').catch((e: unknown) => e);
    handle.release();

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ alert: true, tenantId: 'A', cause: 'Connection terminated unexpectedly' }),
      'Tenant store unreachable',
    );
    expect(backend.sessions[0].closed).toBe(true);
  });

  it('should pass statement errors through unchanged', async () => {
    const handle = await switchboard.acquire(tenantA);
    backend.queryFault = new Error('syntax error at or near "SELEC"');

    await expect(handle.query('SELEC 1')).rejects.toThrow('syntax error at or near "SELEC"');
    handle.release();

    expect(logger.error).not.toHaveBeenCalled();
    expect(backend.sessions[0].closed).toBe(false);
  });

  it('should evict the least recently used idle pool beyond the pool limit', async () => {
    (await switchboard.acquire(tenantA)).release();
    (await switchboard.acquire(tenantB)).release();
    (await switchboard.acquire(tenantC)).release();
    await flush();

    expect(switchboard.stats().tenants.map(t => t.tenantId)).toEqual(['B', 'C']);
    expect(backend.sessions.find(s => s.location === 'db_a')?.closed).toBe(true);
  });

  it('should never evict a pool with checked-out handles', async () => {
    const held = await switchboard.acquire(tenantA);
    (await switchboard.acquire(tenantB)).release();
    (await switchboard.acquire(tenantC)).release();
    await flush();

    expect(switchboard.stats().tenants.map(t => t.tenantId)).toEqual(['A', 'C']);
    expect(switchboard.hasCheckedOutHandles('A')).toBe(true);
    held.release();
  });

  it('should wait for checked-out handles before closing a tenant pool', async () => {
    const handle = await switchboard.acquire(tenantA);

    let closed = false;
    const closing = switchboard.closeTenantPool('A').then(() => {
      closed = true;
    });
    await flush();

    expect(closed).toBe(false);
    expect(switchboard.hasCheckedOutHandles('A')).toBe(true);
    expect(switchboard.stats().draining).toBe(1);

    handle.release();
    await closing;

    expect(switchboard.hasCheckedOutHandles('A')).toBe(false);
    expect(backend.openSessionCount).toBe(0);
  });

  it('should close pools that stayed idle past the eviction window', async () => {
    (await switchboard.acquire(tenantA)).release();

    await expect(switchboard.evictIdle(Date.now() - 1_000)).resolves.toBe(0);
    await expect(switchboard.evictIdle(Date.now() + 60_000)).resolves.toBe(1);

    expect(switchboard.stats().pools).toBe(0);
    expect(backend.openSessionCount).toBe(0);
  });
});
