import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdminKeyGuard } from '../common/guards/admin-key.guard';
import { AuditService } from './audit.service';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { ListTenantsQueryDto } from './dto/list-tenants-query.dto';
import { AuditEntry, Tenant } from './tenant.types';
import { TenantsService } from './tenants.service';

const tenantSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', format: 'uuid' },
    name: { type: 'string', example: 'Acme Corp' },
    routingKey: { type: 'string', example: 'acme' },
    storeLocation: { type: 'string', example: 'tenant_acme' },
    status: { type: 'string', enum: ['PENDING', 'PROVISIONING', 'ACTIVE', 'SUSPENDED', 'RETIRED'] },
    schemaVersion: { type: 'integer', nullable: true, example: 1 },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time' },
  },
};

@ApiTags('Tenants')
@ApiHeader({ name: 'x-admin-key', required: true, description: 'Operator API key' })
@UseGuards(AdminKeyGuard)
@Controller('admin/tenants')
export class TenantsController {
  constructor(
    private readonly tenantsService: TenantsService,
    private readonly auditService: AuditService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Register Tenant',
    description: 'Register a tenant in PENDING and request provisioning of its store',
  })
  @ApiBody({ type: CreateTenantDto })
  @ApiResponse({ status: 201, description: 'Tenant registered', schema: tenantSchema })
  @ApiResponse({ status: 409, description: 'Routing key or store location already registered' })
  create(@Body() dto: CreateTenantDto): Promise<Tenant> {
    return this.tenantsService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List Tenants' })
  @ApiResponse({ status: 200, schema: { type: 'array', items: tenantSchema } })
  findAll(@Query() query: ListTenantsQueryDto): Promise<Tenant[]> {
    return this.tenantsService.list(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get Tenant' })
  @ApiParam({ name: 'id', description: 'Tenant ID' })
  @ApiResponse({ status: 200, schema: tenantSchema })
  @ApiResponse({ status: 404, description: 'Tenant not found' })
  findOne(@Param('id', ParseUUIDPipe) id: string): Promise<Tenant> {
    return this.tenantsService.findOne(id);
  }

  @Post(':id/suspend')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Suspend Tenant',
    description: 'Reject new requests for the tenant; requests already in flight finish normally',
  })
  @ApiResponse({ status: 200, schema: tenantSchema })
  @ApiResponse({ status: 409, description: 'Transition not allowed or status changed concurrently' })
  suspend(@Param('id', ParseUUIDPipe) id: string): Promise<Tenant> {
    return this.tenantsService.suspend(id);
  }

  @Post(':id/reactivate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reactivate Tenant' })
  @ApiResponse({ status: 200, schema: tenantSchema })
  @ApiResponse({ status: 409, description: 'Transition not allowed or status changed concurrently' })
  reactivate(@Param('id', ParseUUIDPipe) id: string): Promise<Tenant> {
    return this.tenantsService.reactivate(id);
  }

  @Post(':id/retire')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Retire Tenant',
    description: 'Offboard the tenant. Its store is destroyed once the retention window has elapsed.',
  })
  @ApiResponse({ status: 200, schema: tenantSchema })
  @ApiResponse({ status: 409, description: 'Transition not allowed or status changed concurrently' })
  retire(@Param('id', ParseUUIDPipe) id: string): Promise<Tenant> {
    return this.tenantsService.retire(id);
  }

  @Post(':id/provision')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Retry Provisioning',
    description: 'Request provisioning again for a tenant waiting in PENDING',
  })
  @ApiResponse({ status: 202, schema: tenantSchema })
  @ApiResponse({ status: 409, description: 'Tenant is not PENDING' })
  provision(@Param('id', ParseUUIDPipe) id: string): Promise<Tenant> {
    return this.tenantsService.requestProvisioning(id);
  }

  @Get(':id/audit')
  @ApiOperation({ summary: 'Tenant Audit Log', description: 'Most recent lifecycle events first' })
  audit(
    @Param('id', ParseUUIDPipe) id: string,
    @Query('take', new DefaultValuePipe(50), ParseIntPipe) take: number,
  ): Promise<AuditEntry[]> {
    return this.auditService.findForTenant(id, take);
  }
}
