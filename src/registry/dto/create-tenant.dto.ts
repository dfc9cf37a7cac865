import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { STORE_LOCATION_PATTERN } from '../../switchboard/store-location';

const ROUTING_KEY_PATTERN =
  /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/;

const lowercase = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

export class CreateTenantDto {
  @ApiProperty({
    description: 'Display name of the customer organization',
    example: 'Acme Corp',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @ApiProperty({
    description: 'Subdomain label, or a full custom host',
    example: 'acme',
  })
  @Transform(lowercase)
  @IsString()
  @Matches(ROUTING_KEY_PATTERN, { message: 'routingKey must be a DNS label or host name' })
  routingKey!: string;

  @ApiPropertyOptional({
    description: 'Database name of the tenant store. Derived from the routing key when omitted.',
    example: 'tenant_acme',
  })
  @IsOptional()
  @Transform(lowercase)
  @IsString()
  @Matches(STORE_LOCATION_PATTERN, { message: 'storeLocation must be a lowercase database identifier' })
  storeLocation?: string;
}
