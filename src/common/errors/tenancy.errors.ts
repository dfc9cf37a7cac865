export type TenancyErrorCode =
  | 'not_found'
  | 'not_ready'
  | 'suspended'
  | 'retired'
  | 'store_unavailable'
  | 'pool_exhausted'
  | 'provisioning_failed'
  | 'invalid_transition'
  | 'status_conflict'
  | 'request_aborted';

/**
 * Base class for every failure the tenancy core reports to its callers.
 * `code` is the stable, caller-visible outcome; `retryable` tells the
 * transport whether the same request may succeed later.
 */
export abstract class TenancyError extends Error {
  abstract readonly code: TenancyErrorCode;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly tenantId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownTenantError extends TenancyError {
  readonly code = 'not_found';
  readonly retryable = false;

  constructor(readonly routingKey: string) {
    super(`No tenant is registered for "${routingKey}"`);
  }
}

export class TenantNotReadyError extends TenancyError {
  readonly code = 'not_ready';
  readonly retryable = true;

  constructor(tenantId: string) {
    super('Tenant is not ready to serve requests yet', tenantId);
  }
}

export class TenantSuspendedError extends TenancyError {
  readonly code = 'suspended';
  readonly retryable = false;

  constructor(tenantId: string) {
    super('Tenant is suspended', tenantId);
  }
}

export class TenantRetiredError extends TenancyError {
  readonly code = 'retired';
  readonly retryable = false;

  constructor(tenantId: string) {
    super('Tenant has been retired', tenantId);
  }
}

export class StoreUnavailableError extends TenancyError {
  readonly code = 'store_unavailable';
  readonly retryable = true;

  constructor(tenantId: string, cause?: unknown) {
    super('Tenant data store is unavailable', tenantId, { cause });
  }
}

export class PoolExhaustedError extends TenancyError {
  readonly code = 'pool_exhausted';
  readonly retryable = true;

  constructor(
    tenantId: string,
    readonly waitedMs: number,
  ) {
    super(`No store session became free within ${waitedMs}ms`, tenantId);
  }
}

export class ProvisioningFailedError extends TenancyError {
  readonly code = 'provisioning_failed';
  readonly retryable = true;

  constructor(
    tenantId: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Provisioning failed after ${attempts} attempt(s)`, tenantId, { cause });
  }
}

export class InvalidStatusTransitionError extends TenancyError {
  readonly code = 'invalid_transition';
  readonly retryable = false;

  constructor(tenantId: string, from: string, to: string) {
    super(`Invalid status transition: ${from} → ${to}`, tenantId);
  }
}

export class StatusConflictError extends TenancyError {
  readonly code = 'status_conflict';
  readonly retryable = true;

  constructor(tenantId: string, expected: string) {
    super(`Tenant status changed concurrently (expected ${expected})`, tenantId);
  }
}

/** The caller went away before a store handle could be bound. */
export class RequestAbortedError extends TenancyError {
  readonly code = 'request_aborted';
  readonly retryable = false;

  constructor(tenantId?: string) {
    super('Request was aborted by the client', tenantId);
  }
}

/** The error to reject with once `signal` has fired. */
export function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new RequestAbortedError();
}

export function isTenancyError(error: unknown): error is TenancyError {
  return error instanceof TenancyError;
}
