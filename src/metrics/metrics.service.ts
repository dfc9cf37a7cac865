import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, register } from 'prom-client';
import { TenancyErrorCode } from '../common/errors/tenancy.errors';

export type ResolutionOutcome = 'resolved' | TenancyErrorCode;

export type AcquireOutcome = 'acquired' | 'pool_exhausted' | 'store_unavailable' | 'aborted';

export type ProvisioningOutcome = 'succeeded' | 'failed' | 'escalated';

export type DestructionOutcome = 'destroyed' | 'deferred' | 'failed';

@Injectable()
export class MetricsService {
  public readonly resolutionsCounter: Counter<'outcome'>;
  public readonly acquireHistogram: Histogram<'outcome'>;
  public readonly handlesInUseGauge: Gauge<'tenant'>;
  public readonly poolEvictionsCounter: Counter<string>;
  public readonly provisioningAttemptsCounter: Counter<'outcome'>;
  public readonly storeDestructionsCounter: Counter<'outcome'>;

  constructor() {
    this.resolutionsCounter = new Counter({
      name: 'tenant_resolutions_total',
      help: 'Tenant resolutions by outcome',
      labelNames: ['outcome'] as const,
      registers: [register],
    });

    this.acquireHistogram = new Histogram({
      name: 'store_acquire_seconds',
      help: 'Time spent acquiring a tenant store handle',
      labelNames: ['outcome'] as const,
      buckets: [0.005, 0.025, 0.1, 0.5, 1, 5],
      registers: [register],
    });

    this.handlesInUseGauge = new Gauge({
      name: 'store_handles_in_use',
      help: 'Store handles currently checked out, per tenant',
      labelNames: ['tenant'] as const,
      registers: [register],
    });

    this.poolEvictionsCounter = new Counter({
      name: 'tenant_pool_evictions_total',
      help: 'Tenant pools closed because they were idle or least recently used',
      registers: [register],
    });

    this.provisioningAttemptsCounter = new Counter({
      name: 'provisioning_attempts_total',
      help: 'Provisioning attempts by outcome',
      labelNames: ['outcome'] as const,
      registers: [register],
    });

    this.storeDestructionsCounter = new Counter({
      name: 'store_destructions_total',
      help: 'Retired tenant store destructions by outcome',
      labelNames: ['outcome'] as const,
      registers: [register],
    });
  }

  recordResolution(outcome: ResolutionOutcome): void {
    this.resolutionsCounter.labels({ outcome }).inc();
  }

  recordAcquire(outcome: AcquireOutcome, durationMs: number): void {
    this.acquireHistogram.labels({ outcome }).observe(durationMs / 1000);
  }

  setHandlesInUse(tenantId: string, inUse: number): void {
    this.handlesInUseGauge.labels({ tenant: tenantId }).set(inUse);
  }

  recordPoolEviction(): void {
    this.poolEvictionsCounter.inc();
  }

  recordProvisioningAttempt(outcome: ProvisioningOutcome): void {
    this.provisioningAttemptsCounter.labels({ outcome }).inc();
  }

  recordStoreDestruction(outcome: DestructionOutcome): void {
    this.storeDestructionsCounter.labels({ outcome }).inc();
  }
}
