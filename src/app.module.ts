import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { SentryModule } from '@sentry/nestjs/setup';
import { TenancyExceptionFilter } from './common/filters/tenancy-exception.filter';
import { TenantMiddleware } from './common/middleware/tenant.middleware';
import { REQUEST_ID_HEADER, TENANT_HOST_HEADER } from './common/interfaces/tenant-context.interface';
import { tenancyConfig } from './config/tenancy.config';
import { CacheModule } from './cache/cache.module';
import { DatabaseModule } from './database/database.module';
import { MetricsModule } from './metrics/metrics.module';

// Feature Modules
import { TenantsModule } from './registry/tenants.module';
import { BindingModule } from './binding/binding.module';
import { ProvisioningModule } from './provisioning/provisioning.module';
import { NotesModule } from './notes/notes.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    SentryModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [tenancyConfig],
    }),
    LoggerModule.forRoot({
      pinoHttp: {
        level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
        transport:
          process.env.NODE_ENV === 'development'
            ? {
                target: 'pino-pretty',
                options: {
                  colorize: true,
                  translateTime: 'SYS:standard',
                  ignore: 'pid,hostname',
                },
              }
            : undefined,
        formatters: {
          level(level) {
            return { level };
          },
        },
        serializers: {
          req: (req: {
            id?: string;
            method: string;
            url: string;
            headers: Record<string, unknown>;
          }) => ({
            id: req.id,
            method: req.method,
            url: req.url,
            headers: {
              host: req.headers.host,
              [REQUEST_ID_HEADER]: req.headers[REQUEST_ID_HEADER],
            },
          }),
          res: (res: { statusCode: number }) => ({
            statusCode: res.statusCode,
          }),
        },
        customSuccessMessage: (
          req: IncomingMessage,
          _res: ServerResponse<IncomingMessage>,
          responseTime: number,
        ) => `${req.method || 'UNKNOWN'} ${req.url || 'unknown'} completed in ${responseTime}ms`,
        customErrorMessage: (
          req: IncomingMessage,
          _res: ServerResponse<IncomingMessage>,
          error: Error,
        ) => `Error on ${req.method || 'UNKNOWN'} ${req.url || 'unknown'}: ${error.message}`,
        customProps: (req: IncomingMessage) => ({
          tenantHost: req.headers[TENANT_HOST_HEADER],
          requestId: req.headers[REQUEST_ID_HEADER],
        }),
      },
    }),
    DatabaseModule,
    CacheModule,
    MetricsModule,
    HealthModule,
    TenantsModule,
    BindingModule,
    ProvisioningModule,
    NotesModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: TenancyExceptionFilter }],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(TenantMiddleware).forRoutes('*');
  }
}
