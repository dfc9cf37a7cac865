import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Redis } from '@upstash/redis';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { errorMessage } from '../common/utils/alert';
import { tenancyConfig } from '../config/tenancy.config';

export interface CacheSetOptions {
  px?: number; // TTL in milliseconds
}

/**
 * Shared Redis cache over the Upstash REST client. Reads and writes fail
 * open: a Redis error is logged and the caller carries on as on a miss.
 * Without credentials the service runs in fallback mode and caches nothing.
 */
@Injectable()
export class RedisCacheService {
  private readonly redis: Redis | null;

  constructor(
    @Inject(tenancyConfig.KEY) config: ConfigType<typeof tenancyConfig>,
    @InjectPinoLogger(RedisCacheService.name)
    private readonly logger: PinoLogger,
  ) {
    const { redisUrl, redisToken } = config.cache;
    if (redisUrl && redisToken) {
      this.redis = new Redis({ url: redisUrl, token: redisToken });
      this.logger.info('Redis cache service initialized');
    } else {
      this.redis = null;
      this.logger.warn('Redis credentials not configured - operating in fallback mode');
    }
  }

  get enabled(): boolean {
    return this.redis !== null;
  }

  /**
   * Get value from cache
   * @param key Cache key
   * @returns Deserialized value, or null if not found or on error
   */
  async get(key: string): Promise<unknown> {
    if (!this.redis) {
      return null;
    }

    try {
      const value = await this.redis.get<unknown>(key);
      this.logger.debug({ key, cached: value !== null }, value !== null ? 'Cache hit' : 'Cache miss');
      return value;
    } catch (error) {
      this.logger.error({ key, error: errorMessage(error) }, 'Redis GET error');
      return null;
    }
  }

  /**
   * Set value in cache
   * @param key Cache key
   * @param value JSON-serializable value
   */
  async set(key: string, value: unknown, options: CacheSetOptions = {}): Promise<void> {
    if (!this.redis) {
      return;
    }

    try {
      if (options.px) {
        await this.redis.set(key, value, { px: options.px });
      } else {
        await this.redis.set(key, value);
      }
      this.logger.debug({ key, ttl: options.px ? `${options.px}ms` : null }, 'Cache set');
    } catch (error) {
      this.logger.error({ key, error: errorMessage(error) }, 'Redis SET error');
    }
  }

  /**
   * Delete key from cache
   * @param key Cache key to delete
   */
  async del(key: string): Promise<void> {
    if (!this.redis) {
      return;
    }

    try {
      await this.redis.del(key);
      this.logger.debug({ key }, 'Cache key deleted');
    } catch (error) {
      this.logger.error({ key, error: errorMessage(error) }, 'Redis DEL error');
    }
  }

  /**
   * Round trip to Redis for health checks. Unlike the data operations this
   * rejects when Redis does not answer.
   */
  async ping(): Promise<void> {
    if (!this.redis) {
      throw new Error('Redis cache is not configured');
    }
    await this.redis.ping();
  }
}
