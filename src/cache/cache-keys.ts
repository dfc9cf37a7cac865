/**
 * Centralized cache key patterns. Every key carries the service prefix so the
 * Redis database can be shared with other services.
 */
export class CacheKeys {
  private static readonly PREFIX = 'switchboard';

  /**
   * Generate cache key for a resolved tenant
   * @param routingKey Normalized routing key
   * @returns Cache key: switchboard:tenant:route:{routingKey}
   */
  static tenantByRoutingKey(routingKey: string): string {
    return `${CacheKeys.PREFIX}:tenant:route:${routingKey}`;
  }
}
