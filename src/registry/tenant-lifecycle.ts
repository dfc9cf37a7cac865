import { TenantStatus } from './tenant.types';

/**
 * Allowed status transitions.
 *
 * PENDING → PROVISIONING
 * PROVISIONING → ACTIVE | PENDING (failed attempt, eligible for retry)
 * ACTIVE → SUSPENDED | RETIRED
 * SUSPENDED → ACTIVE | RETIRED
 * RETIRED → (terminal)
 */
const ALLOWED_TRANSITIONS: Record<TenantStatus, readonly TenantStatus[]> = {
  [TenantStatus.PENDING]: [TenantStatus.PROVISIONING],
  [TenantStatus.PROVISIONING]: [TenantStatus.ACTIVE, TenantStatus.PENDING],
  [TenantStatus.ACTIVE]: [TenantStatus.SUSPENDED, TenantStatus.RETIRED],
  [TenantStatus.SUSPENDED]: [TenantStatus.ACTIVE, TenantStatus.RETIRED],
  [TenantStatus.RETIRED]: [],
};

export function canTransition(from: TenantStatus, to: TenantStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function allowedTransitions(from: TenantStatus): readonly TenantStatus[] {
  return ALLOWED_TRANSITIONS[from];
}

export function isTerminal(status: TenantStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}
