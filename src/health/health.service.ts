import { Inject, Injectable } from '@nestjs/common';
import { RedisCacheService } from '../cache/redis-cache.service';
import { TENANT_REGISTRY, TenantRegistry } from '../registry/tenant-registry.interface';
import { StoreSwitchboardService, SwitchboardStats } from '../switchboard/store-switchboard.service';

export interface HealthCheck {
  status: 'healthy' | 'unhealthy' | 'ok';
  message?: string;
  timestamp: string;
  uptime?: number;
  version?: string;
  details?: Record<string, unknown>;
}

export interface RegistryHealthCheck extends HealthCheck {
  connectionTime?: number;
}

export interface DetailedHealthStatus {
  status: 'ok' | 'unhealthy';
  registry: RegistryHealthCheck;
  cache: HealthCheck;
  pools: SwitchboardStats;
  environment: Record<string, unknown>;
}

@Injectable()
export class HealthService {
  constructor(
    @Inject(TENANT_REGISTRY) private readonly registry: TenantRegistry,
    private readonly switchboard: StoreSwitchboardService,
    private readonly cache: RedisCacheService,
  ) {}

  /**
   * Get basic health status
   * Only the registry decides liveness; tenant stores are checked per request.
   */
  async getHealthStatus(): Promise<HealthCheck> {
    const registryCheck = await this.checkRegistryConnection();

    if (registryCheck.status === 'unhealthy') {
      return {
        status: 'unhealthy',
        message: 'Registry connection failed',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        details: { registry: registryCheck },
      };
    }

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '1.0.0',
    };
  }

  /**
   * Get detailed health status including pool statistics and system information.
   * A failing cache is reported but does not make the service unhealthy.
   */
  async getDetailedHealthStatus(): Promise<DetailedHealthStatus> {
    const [registry, cache] = await Promise.all([this.checkRegistryConnection(), this.checkCacheConnection()]);

    return {
      status: registry.status === 'healthy' ? 'ok' : 'unhealthy',
      registry,
      cache,
      pools: this.switchboard.stats(),
      environment: this.getEnvironmentInfo(),
    };
  }

  /**
   * Check registry database connectivity and measure round-trip time
   */
  private async checkRegistryConnection(): Promise<RegistryHealthCheck> {
    const startTime = Date.now();

    try {
      await this.registry.ping();
      return {
        status: 'healthy',
        message: 'Registry connection successful',
        timestamp: new Date().toISOString(),
        connectionTime: Date.now() - startTime,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: 'Registry connection failed',
        timestamp: new Date().toISOString(),
        connectionTime: Date.now() - startTime,
        details: { error: error instanceof Error ? error.message : 'Unknown error' },
      };
    }
  }

  /**
   * Check the resolver cache; reports ok when Redis is not configured
   */
  private async checkCacheConnection(): Promise<HealthCheck> {
    if (!this.cache.enabled) {
      return {
        status: 'ok',
        message: 'Cache disabled, tenants resolve from the registry',
        timestamp: new Date().toISOString(),
      };
    }

    try {
      await this.cache.ping();
      return { status: 'healthy', message: 'Cache connection successful', timestamp: new Date().toISOString() };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: 'Cache connection failed',
        timestamp: new Date().toISOString(),
        details: { error: error instanceof Error ? error.message : 'Unknown error' },
      };
    }
  }

  /**
   * Get environment information
   */
  private getEnvironmentInfo(): Record<string, unknown> {
    return {
      nodeVersion: process.version,
      environment: process.env.NODE_ENV || 'development',
      platform: process.platform,
      uptime: process.uptime(),
      memoryUsage: process.memoryUsage(),
    };
  }
}
