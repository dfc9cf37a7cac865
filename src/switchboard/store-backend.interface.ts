export const STORE_BACKEND = Symbol('STORE_BACKEND');

export type StoreRow = Record<string, unknown>;

export interface StoreQueryResult<R extends StoreRow = StoreRow> {
  rows: R[];
  rowCount: number;
}

/**
 * One open session against a single tenant store.
 */
export interface StoreSession {
  readonly location: string;
  /** False once the underlying connection has failed; such a session is discarded on release. */
  readonly healthy: boolean;
  query<R extends StoreRow = StoreRow>(text: string, params?: readonly unknown[]): Promise<StoreQueryResult<R>>;
  close(): Promise<void>;
}

/**
 * Engine-specific capability the switchboard pools on top of.
 */
export interface StoreBackend {
  openSession(location: string): Promise<StoreSession>;
}
