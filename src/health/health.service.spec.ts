import { InMemoryStoreBackend } from '../../tests/fakes/in-memory-store-backend';
import { InMemoryTenantRegistry } from '../../tests/fakes/in-memory-tenant-registry';
import { RedisCacheService } from '../cache/redis-cache.service';
import { StoreSwitchboardService } from '../switchboard/store-switchboard.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let registry: InMemoryTenantRegistry;
  let switchboard: { stats: jest.Mock };
  let cache: { enabled: boolean; ping: jest.Mock };
  let service: HealthService;

  beforeEach(() => {
    registry = new InMemoryTenantRegistry();
    switchboard = {
      stats: jest.fn().mockReturnValue({ pools: 1, draining: 0, maxPools: 10, tenants: [] }),
    };
    cache = { enabled: true, ping: jest.fn().mockResolvedValue(undefined) };
    service = new HealthService(
      registry,
      switchboard as unknown as StoreSwitchboardService,
      cache as unknown as RedisCacheService,
    );
  });

  it('should report ok while the registry answers', async () => {
    const health = await service.getHealthStatus();

    expect(health.status).toBe('ok');
    expect(health.details).toBeUndefined();
  });

  it('should report unhealthy when the registry is unreachable', async () => {
    registry.available = false;

    const health = await service.getHealthStatus();

    expect(health).toMatchObject({
      status: 'unhealthy',
      message: 'Registry connection failed',
      details: { registry: { status: 'unhealthy', details: { error: 'registry unavailable' } } },
    });
  });

  it('should include pool statistics in the detailed status', async () => {
    const detailed = await service.getDetailedHealthStatus();

    expect(detailed.status).toBe('ok');
    expect(detailed.registry.status).toBe('healthy');
    expect(detailed.pools).toEqual({ pools: 1, draining: 0, maxPools: 10, tenants: [] });
  });

  it('should report a failing cache without marking the service unhealthy', async () => {
    cache.ping.mockRejectedValue(new Error('fetch failed'));

    const detailed = await service.getDetailedHealthStatus();

    expect(detailed.status).toBe('ok');
    expect(detailed.cache).toMatchObject({
      status: 'unhealthy',
      message: 'Cache connection failed',
      details: { error: 'fetch failed' },
    });
  });

  it('should report the cache as disabled without credentials', async () => {
    cache.enabled = false;

    const detailed = await service.getDetailedHealthStatus();

    expect(detailed.cache).toMatchObject({ status: 'ok', message: 'Cache disabled, tenants resolve from the registry' });
    expect(cache.ping).not.toHaveBeenCalled();
  });
});
