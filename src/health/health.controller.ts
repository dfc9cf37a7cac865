import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DetailedHealthStatus, HealthCheck, HealthService } from './health.service';

@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  // Simple health endpoint for load balancers
  @Get('health')
  @ApiOperation({
    summary: 'Load Balancer Health Check',
    description: 'Simple health check endpoint for load balancers and monitoring systems',
  })
  @ApiResponse({
    status: 200,
    description: 'Application is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
      },
    },
  })
  async getSimpleHealth(): Promise<{ status: string }> {
    // Simple health check - just return ok if the service is running
    return { status: 'ok' };
  }

  @Get('status')
  @ApiOperation({
    summary: 'Health Check',
    description: 'Application status including registry reachability',
  })
  @ApiResponse({
    status: 200,
    description: 'Successfully retrieved health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        timestamp: { type: 'string', format: 'date-time' },
        uptime: { type: 'number', example: 12345.678 },
        version: { type: 'string', example: '1.0.0' },
      },
    },
  })
  async getHealth(): Promise<HealthCheck> {
    return this.healthService.getHealthStatus();
  }

  @Get('detailed')
  @ApiOperation({
    summary: 'Detailed Health Check',
    description: 'Registry reachability, tenant pool statistics and runtime information',
  })
  @ApiResponse({
    status: 200,
    description: 'Successfully retrieved detailed health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        registry: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'healthy' },
            connectionTime: { type: 'number', example: 3 },
          },
        },
        pools: {
          type: 'object',
          properties: {
            pools: { type: 'number', example: 12 },
            draining: { type: 'number', example: 0 },
            maxPools: { type: 'number', example: 100 },
            tenants: { type: 'array', items: { type: 'object' } },
          },
        },
        environment: {
          type: 'object',
          example: { nodeVersion: 'v20.11.0', environment: 'production' },
        },
      },
    },
  })
  async getDetailedHealth(): Promise<DetailedHealthStatus> {
    return this.healthService.getDetailedHealthStatus();
  }
}
