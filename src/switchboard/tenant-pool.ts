import { abortError, PoolExhaustedError, StoreUnavailableError } from '../common/errors/tenancy.errors';
import { StoreSession } from './store-backend.interface';

export interface TenantPoolOptions {
  maxSessions: number;
  openSession: (signal?: AbortSignal) => Promise<StoreSession>;
  onCloseError?: (error: unknown) => void;
}

export interface TenantPoolStats {
  tenantId: string;
  location: string;
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  lastUsedAt: string;
}

interface Waiter {
  resolve: (session: StoreSession) => void;
  reject: (error: Error) => void;
}

/**
 * Bounded set of sessions to one tenant store. Waiters are served in FIFO
 * order; a closed pool hands out nothing and closes its sessions once every
 * checked-out one has come back.
 */
export class TenantPool {
  private readonly idle: StoreSession[] = [];
  private readonly waiters: Waiter[] = [];
  private checkedOut = 0;
  private opening = 0;
  private closed = false;
  private drained: Promise<void> | null = null;
  private onDrained: (() => void) | null = null;

  lastUsedAt = Date.now();

  constructor(
    readonly tenantId: string,
    readonly location: string,
    private readonly options: TenantPoolOptions,
  ) {}

  get inUse(): number {
    return this.checkedOut;
  }

  /** Sessions checked out or still being opened. */
  get busy(): number {
    return this.checkedOut + this.opening;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get size(): number {
    return this.idle.length + this.checkedOut + this.opening;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  isIdle(): boolean {
    return this.checkedOut === 0 && this.waiters.length === 0 && this.opening === 0;
  }

  async acquire(timeoutMs: number, signal?: AbortSignal): Promise<StoreSession> {
    if (this.closed) {
      throw new StoreUnavailableError(this.tenantId, new Error('Tenant pool is closed'));
    }
    if (signal?.aborted) {
      throw abortError(signal);
    }
    this.lastUsedAt = Date.now();

    const session = this.idle.pop();
    if (session) {
      this.checkedOut++;
      return session;
    }

    if (this.size < this.options.maxSessions) {
      this.opening++;
      let opened: StoreSession;
      try {
        opened = await this.options.openSession(signal);
      } catch (error) {
        this.opening--;
        // Waiters queued behind this open would otherwise sit until their timeout.
        this.openForWaiter();
        this.settleDrain();
        throw error;
      }
      this.opening--;

      if (this.closed) {
        await this.closeSessionAsync(opened);
        this.settleDrain();
        throw new StoreUnavailableError(this.tenantId, new Error('Tenant pool is closed'));
      }
      this.checkedOut++;
      return opened;
    }

    return this.enqueue(timeoutMs, signal);
  }

  release(session: StoreSession): void {
    this.checkedOut--;
    this.lastUsedAt = Date.now();

    if (this.closed || !session.healthy) {
      this.closeSession(session);
      if (!this.closed) {
        this.openForWaiter();
      }
      this.settleDrain();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.checkedOut++;
      waiter.resolve(session);
      return;
    }

    this.idle.push(session);
  }

  /**
   * Stops handing out sessions, fails queued waiters, and resolves once every
   * checked-out session has been released, every in-flight open has settled,
   * and all sessions are closed.
   */
  drain(): Promise<void> {
    if (this.drained) {
      return this.drained;
    }
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new StoreUnavailableError(this.tenantId, new Error('Tenant pool is closing')));
    }

    const released =
      this.busy === 0
        ? Promise.resolve()
        : new Promise<void>(resolve => {
            this.onDrained = resolve;
          });

    this.drained = released.then(async () => {
      const sessions = this.idle.splice(0);
      await Promise.all(sessions.map(session => this.closeSessionAsync(session)));
    });
    return this.drained;
  }

  stats(): TenantPoolStats {
    return {
      tenantId: this.tenantId,
      location: this.location,
      size: this.size,
      idle: this.idle.length,
      inUse: this.checkedOut,
      waiting: this.waiters.length,
      lastUsedAt: new Date(this.lastUsedAt).toISOString(),
    };
  }

  private enqueue(timeoutMs: number, signal?: AbortSignal): Promise<StoreSession> {
    const startedAt = Date.now();

    return new Promise<StoreSession>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
      };
      const waiter: Waiter = {
        resolve: session => {
          cleanup();
          resolve(session);
        },
        reject: error => {
          cleanup();
          reject(error);
        },
      };
      const onAbort = () => waiter.reject(signal ? abortError(signal) : new Error('The operation was aborted'));
      const timer = setTimeout(
        () => waiter.reject(new PoolExhaustedError(this.tenantId, Date.now() - startedAt)),
        timeoutMs,
      );

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private openForWaiter(): void {
    if (this.waiters.length === 0 || this.size >= this.options.maxSessions) {
      return;
    }

    this.opening++;
    this.options.openSession().then(
      session => {
        this.opening--;
        if (this.closed) {
          void this.closeSessionAsync(session).then(() => this.settleDrain());
          return;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
          this.checkedOut++;
          waiter.resolve(session);
        } else {
          this.idle.push(session);
        }
      },
      (error: unknown) => {
        this.opening--;
        if (this.closed) {
          this.settleDrain();
          return;
        }
        this.waiters[0]?.reject(
          error instanceof Error ? error : new StoreUnavailableError(this.tenantId, error),
        );
        this.openForWaiter();
      },
    );
  }

  private settleDrain(): void {
    if (this.closed && this.busy === 0 && this.onDrained) {
      const resolve = this.onDrained;
      this.onDrained = null;
      resolve();
    }
  }

  private closeSession(session: StoreSession): void {
    void this.closeSessionAsync(session);
  }

  private async closeSessionAsync(session: StoreSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.options.onCloseError?.(error);
    }
  }
}
