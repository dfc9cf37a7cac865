import { StoreUnavailableError } from '../common/errors/tenancy.errors';
import { StoreQueryResult, StoreRow, StoreSession } from './store-backend.interface';

/**
 * A checked-out session bound to exactly one tenant. Queries are refused once
 * the handle has been released; releasing twice is a no-op. A query that
 * fails because the connection itself broke surfaces as StoreUnavailable;
 * statement errors pass through unchanged.
 */
export class StoreHandle {
  private released = false;

  constructor(
    readonly tenantId: string,
    readonly location: string,
    private readonly session: StoreSession,
    private readonly onRelease: (session: StoreSession) => void,
    private readonly onUnavailable?: (error: StoreUnavailableError) => void,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  async query<R extends StoreRow = StoreRow>(text: string, params?: readonly unknown[]): Promise<StoreQueryResult<R>> {
    if (this.released) {
      throw new Error(`Store handle for tenant ${this.tenantId} has already been released`);
    }
    try {
      return await this.session.query<R>(text, params);
    } catch (error) {
      if (this.session.healthy) {
        throw error;
      }
      const unavailable = new StoreUnavailableError(this.tenantId, error);
      this.onUnavailable?.(unavailable);
      throw unavailable;
    }
  }

  /**
   * Returns the session to its pool. Returns false when already released.
   */
  release(): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    this.onRelease(this.session);
    return true;
  }
}
