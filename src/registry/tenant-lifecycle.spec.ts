import { allowedTransitions, canTransition, isTerminal } from './tenant-lifecycle';
import { TenantStatus } from './tenant.types';

describe('tenant lifecycle', () => {
  it('should only allow provisioning to start from PENDING', () => {
    expect(canTransition(TenantStatus.PENDING, TenantStatus.PROVISIONING)).toBe(true);
    expect(canTransition(TenantStatus.PENDING, TenantStatus.ACTIVE)).toBe(false);
    expect(canTransition(TenantStatus.SUSPENDED, TenantStatus.PROVISIONING)).toBe(false);
  });

  it('should let a failed provisioning attempt fall back to PENDING', () => {
    expect(allowedTransitions(TenantStatus.PROVISIONING)).toEqual([
      TenantStatus.ACTIVE,
      TenantStatus.PENDING,
    ]);
  });

  it('should allow suspend and reactivate in both directions', () => {
    expect(canTransition(TenantStatus.ACTIVE, TenantStatus.SUSPENDED)).toBe(true);
    expect(canTransition(TenantStatus.SUSPENDED, TenantStatus.ACTIVE)).toBe(true);
  });

  it('should allow retirement from ACTIVE and SUSPENDED only', () => {
    expect(canTransition(TenantStatus.ACTIVE, TenantStatus.RETIRED)).toBe(true);
    expect(canTransition(TenantStatus.SUSPENDED, TenantStatus.RETIRED)).toBe(true);
    expect(canTransition(TenantStatus.PENDING, TenantStatus.RETIRED)).toBe(false);
    expect(canTransition(TenantStatus.PROVISIONING, TenantStatus.RETIRED)).toBe(false);
  });

  it('should treat RETIRED as terminal', () => {
    expect(isTerminal(TenantStatus.RETIRED)).toBe(true);
    expect(isTerminal(TenantStatus.ACTIVE)).toBe(false);
    for (const status of Object.values(TenantStatus)) {
      expect(canTransition(TenantStatus.RETIRED, status)).toBe(false);
    }
  });
});
