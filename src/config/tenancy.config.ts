import { registerAs } from '@nestjs/config';
import { plainToInstance, Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Matches, Max, Min, validateSync } from 'class-validator';

export interface TenancyConfig {
  registryDatabaseUrl: string;
  tenantDatabaseUrl: string;
  baseDomains: string[];
  adminApiKey: string;
  resolver: {
    cacheTtlMs: number;
    revalidateMs: number;
  };
  pool: {
    maxSessions: number;
    acquireTimeoutMs: number;
    maxTenantPools: number;
    idleEvictMs: number;
  };
  store: {
    openRetries: number;
    retryBaseMs: number;
  };
  provisioning: {
    maxAttempts: number;
    sweepCron: string;
    retentionMs: number;
    schemaVersion: number;
  };
  cache: {
    redisUrl: string | null;
    redisToken: string | null;
  };
}

const toInt = ({ value }: { value: unknown }) =>
  value === undefined || value === '' ? undefined : Number(value);

class TenancyEnvironment {
  @IsString()
  @IsNotEmpty()
  REGISTRY_DATABASE_URL!: string;

  @IsString()
  @IsNotEmpty()
  TENANT_DATABASE_URL!: string;

  @IsString()
  @IsNotEmpty()
  ADMIN_API_KEY!: string;

  @IsOptional()
  @IsString()
  TENANT_BASE_DOMAINS?: string;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(0)
  RESOLVER_CACHE_TTL_MS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(0)
  RESOLVER_REVALIDATE_MS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  POOL_MAX_SESSIONS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  POOL_ACQUIRE_TIMEOUT_MS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  POOL_MAX_TENANT_POOLS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1000)
  POOL_IDLE_EVICT_MS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  STORE_OPEN_RETRIES?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(0)
  STORE_RETRY_BASE_MS?: number;

  // The job runner accepts at most 20 retries after the first attempt.
  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(21)
  PROVISIONING_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsString()
  @Matches(/^\S+( \S+){4}$/, { message: 'PROVISIONING_SWEEP_CRON must be a five-field cron expression' })
  PROVISIONING_SWEEP_CRON?: string;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(0)
  RETIREMENT_RETENTION_MS?: number;

  @IsOptional()
  @Transform(toInt)
  @IsInt()
  @Min(1)
  SCHEMA_VERSION?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  UPSTASH_REDIS_REST_URL?: string;

  @IsOptional()
  @IsString()
  UPSTASH_REDIS_REST_TOKEN?: string;
}

/**
 * Builds the typed tenancy configuration from raw environment variables.
 * Throws with every offending variable listed when validation fails.
 */
export function loadTenancyConfig(env: Record<string, string | undefined>): TenancyConfig {
  const parsed = plainToInstance(TenancyEnvironment, env);
  const errors = validateSync(parsed, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid tenancy configuration: ${details}`);
  }

  const baseDomains = (parsed.TENANT_BASE_DOMAINS ?? 'localhost')
    .split(',')
    .map(domain => domain.trim().toLowerCase())
    .filter(domain => domain.length > 0);

  return {
    registryDatabaseUrl: parsed.REGISTRY_DATABASE_URL,
    tenantDatabaseUrl: parsed.TENANT_DATABASE_URL,
    adminApiKey: parsed.ADMIN_API_KEY,
    baseDomains,
    resolver: {
      cacheTtlMs: parsed.RESOLVER_CACHE_TTL_MS ?? 60_000,
      revalidateMs: parsed.RESOLVER_REVALIDATE_MS ?? 5_000,
    },
    pool: {
      maxSessions: parsed.POOL_MAX_SESSIONS ?? 10,
      acquireTimeoutMs: parsed.POOL_ACQUIRE_TIMEOUT_MS ?? 5_000,
      maxTenantPools: parsed.POOL_MAX_TENANT_POOLS ?? 100,
      idleEvictMs: parsed.POOL_IDLE_EVICT_MS ?? 5 * 60 * 1000,
    },
    store: {
      openRetries: parsed.STORE_OPEN_RETRIES ?? 3,
      retryBaseMs: parsed.STORE_RETRY_BASE_MS ?? 100,
    },
    provisioning: {
      maxAttempts: parsed.PROVISIONING_MAX_ATTEMPTS ?? 5,
      sweepCron: parsed.PROVISIONING_SWEEP_CRON ?? '* * * * *',
      retentionMs: parsed.RETIREMENT_RETENTION_MS ?? 30 * 24 * 60 * 60 * 1000,
      schemaVersion: parsed.SCHEMA_VERSION ?? 1,
    },
    cache: {
      redisUrl: parsed.UPSTASH_REDIS_REST_URL || null,
      redisToken: parsed.UPSTASH_REDIS_REST_TOKEN || null,
    },
  };
}

export const tenancyConfig = registerAs('tenancy', (): TenancyConfig => loadTenancyConfig(process.env));
