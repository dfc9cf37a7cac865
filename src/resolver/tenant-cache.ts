import { plainToInstance, Type } from 'class-transformer';
import {
  IsDate,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  validateSync,
  ValidateNested,
} from 'class-validator';
import { Tenant, TenantStatus } from '../registry/tenant.types';

export interface CachedTenant {
  tenant: Tenant;
  cachedAt: number;
}

class CachedTenantRecord implements Tenant {
  @IsString()
  id!: string;

  @IsString()
  name!: string;

  @IsString()
  routingKey!: string;

  @IsString()
  storeLocation!: string;

  @IsEnum(TenantStatus)
  status!: TenantStatus;

  @IsOptional()
  @IsInt()
  schemaVersion!: number | null;

  @IsInt()
  provisioningAttempts!: number;

  @IsOptional()
  @IsString()
  lastProvisioningError!: string | null;

  @Type(() => Date)
  @IsDate()
  createdAt!: Date;

  @Type(() => Date)
  @IsDate()
  updatedAt!: Date;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  suspendedAt!: Date | null;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  retiredAt!: Date | null;

  @IsOptional()
  @Type(() => Date)
  @IsDate()
  storeDestroyedAt!: Date | null;
}

class CachedTenantEntry implements CachedTenant {
  @ValidateNested()
  @Type(() => CachedTenantRecord)
  tenant!: CachedTenantRecord;

  @IsNumber()
  cachedAt!: number;
}

/**
 * Rebuilds a cache entry from its JSON form, dates included. Anything that
 * does not describe a whole tenant reads as a miss.
 */
export function parseCachedTenant(value: unknown): CachedTenant | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const entry = plainToInstance(CachedTenantEntry, value);
  if (!(entry.tenant instanceof CachedTenantRecord) || validateSync(entry).length > 0) {
    return null;
  }
  return entry;
}
