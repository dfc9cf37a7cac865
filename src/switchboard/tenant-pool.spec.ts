import { PoolExhaustedError, StoreUnavailableError } from '../common/errors/tenancy.errors';
import { InMemoryStoreBackend } from '../../tests/fakes/in-memory-store-backend';
import { StoreSession } from './store-backend.interface';
import { TenantPool } from './tenant-pool';

function createGate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>(resolve => {
    open = resolve;
  });
  return { open: () => open(), wait: () => opened };
}

describe('TenantPool', () => {
  let backend: InMemoryStoreBackend;
  let onCloseError: jest.Mock;

  const createPool = (maxSessions: number) =>
    new TenantPool('T1', 'db_acme', {
      maxSessions,
      openSession: () => backend.openSession('db_acme'),
      onCloseError,
    });

  const flush = () => new Promise<void>(resolve => setImmediate(resolve));

  beforeEach(() => {
    backend = new InMemoryStoreBackend(['db_acme']);
    onCloseError = jest.fn();
  });

  it('should reuse a released session instead of opening another', async () => {
    const pool = createPool(2);

    const first = await pool.acquire(100);
    pool.release(first);
    const second = await pool.acquire(100);

    expect(second).toBe(first);
    expect(backend.sessions).toHaveLength(1);
    expect(pool.inUse).toBe(1);
  });

  it('should fail with PoolExhausted once the timeout elapses on a full pool', async () => {
    const pool = createPool(1);
    await pool.acquire(100);

    const error = await pool.acquire(20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PoolExhaustedError);
    expect(error).toMatchObject({ code: 'pool_exhausted', tenantId: 'T1', retryable: true });
    expect(pool.waiting).toBe(0);
    expect(backend.sessions).toHaveLength(1);
  });

  it('should hand released sessions to waiters in arrival order', async () => {
    const pool = createPool(1);
    const session = await pool.acquire(100);
    const served: string[] = [];

    const first = pool.acquire(1_000).then(s => {
      served.push('first');
      return s;
    });
    const second = pool.acquire(1_000).then(s => {
      served.push('second');
      return s;
    });
    expect(pool.waiting).toBe(2);

    pool.release(session);
    const firstSession = await first;
    expect(served).toEqual(['first']);

    pool.release(firstSession);
    await second;
    expect(served).toEqual(['first', 'second']);
    expect(pool.inUse).toBe(1);
  });

  it('should drop a waiter whose request is aborted', async () => {
    const pool = createPool(1);
    await pool.acquire(100);
    const controller = new AbortController();

    const waiting = pool.acquire(1_000, controller.signal);
    controller.abort(new Error('client disconnected'));

    await expect(waiting).rejects.toThrow('client disconnected');
    expect(pool.waiting).toBe(0);
  });

  it('should discard an unhealthy session and open a replacement for the next waiter', async () => {
    const pool = createPool(1);
    const broken = await pool.acquire(100);
    const waiting = pool.acquire(1_000);

    backend.sessions[0].healthy = false;
    pool.release(broken);
    const replacement = await waiting;

    expect(replacement).not.toBe(broken);
    expect(backend.sessions[0].closed).toBe(true);
    expect(backend.sessions).toHaveLength(2);
    expect(pool.inUse).toBe(1);
  });

  it('should not lose capacity when opening a session fails', async () => {
    const pool = createPool(1);
    backend.failNextOpens = 1;

    await expect(pool.acquire(100)).rejects.toThrow('ECONNREFUSED');
    expect(pool.size).toBe(0);

    await expect(pool.acquire(100)).resolves.toBeDefined();
  });

  it('should give a queued waiter its own open when the open ahead of it fails', async () => {
    const gate = createGate();
    let opens = 0;
    const pool = new TenantPool('T1', 'db_acme', {
      maxSessions: 1,
      openSession: async (): Promise<StoreSession> => {
        opens++;
        if (opens === 1) {
          await gate.wait();
          throw new Error('connect ECONNREFUSED');
        }
        return backend.openSession('db_acme');
      },
      onCloseError,
    });

    const first = pool.acquire(1_000).catch((e: unknown) => e);
    const second = pool.acquire(1_000);
    expect(pool.waiting).toBe(1);

    gate.open();

    expect(await first).toEqual(new Error('connect ECONNREFUSED'));
    const session = await second;
    expect(session).toBe(backend.sessions[0]);
    expect(pool.inUse).toBe(1);
    expect(pool.waiting).toBe(0);
  });

  it('should keep opening for the remaining waiters when a replacement open fails', async () => {
    const pool = createPool(1);
    const broken = await pool.acquire(100);
    const first = pool.acquire(1_000).catch((e: unknown) => e);
    const second = pool.acquire(1_000);

    backend.sessions[0].healthy = false;
    backend.failNextOpens = 1;
    pool.release(broken);

    expect(await first).toEqual(new Error('connect ECONNREFUSED for db_acme'));
    const replacement = await second;
    expect(replacement).toBe(backend.sessions[1]);
    expect(pool.inUse).toBe(1);
  });

  it('should close a session whose open completes after drain began', async () => {
    const gate = createGate();
    const pool = new TenantPool('T1', 'db_acme', {
      maxSessions: 1,
      openSession: async () => {
        await gate.wait();
        return backend.openSession('db_acme');
      },
      onCloseError,
    });

    const acquiring = pool.acquire(100).catch((e: unknown) => e);
    expect(pool.busy).toBe(1);

    let drained = false;
    const draining = pool.drain().then(() => {
      drained = true;
    });
    await flush();
    expect(drained).toBe(false);

    gate.open();

    expect(await acquiring).toBeInstanceOf(StoreUnavailableError);
    await draining;
    expect(backend.sessions).toHaveLength(1);
    expect(backend.openSessionCount).toBe(0);
    expect(pool.busy).toBe(0);
  });

  it('should wait for checked-out sessions before closing on drain', async () => {
    const pool = createPool(2);
    const inFlight = await pool.acquire(100);
    const idle = await pool.acquire(100);
    pool.release(idle);

    let drained = false;
    const draining = pool.drain().then(() => {
      drained = true;
    });
    await flush();
    expect(drained).toBe(false);

    pool.release(inFlight);
    await draining;

    expect(backend.openSessionCount).toBe(0);
    await expect(pool.acquire(100)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('should fail queued waiters when drained', async () => {
    const pool = createPool(1);
    const session = await pool.acquire(100);
    const waiting = pool.acquire(1_000);

    const draining = pool.drain();
    await expect(waiting).rejects.toBeInstanceOf(StoreUnavailableError);

    pool.release(session);
    await draining;
    expect(backend.openSessionCount).toBe(0);
  });

  it('should report close failures without throwing', async () => {
    const pool = createPool(1);
    const session = await pool.acquire(100);
    backend.sessions[0].close = () => Promise.reject(new Error('socket hang up'));

    pool.release(session);
    await pool.drain();

    expect(onCloseError).toHaveBeenCalledWith(new Error('socket hang up'));
  });
});
