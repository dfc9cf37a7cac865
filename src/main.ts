import './instrument';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import fastifyHelmet from '@fastify/helmet';
import fastifyCors from '@fastify/cors';
import fastifyRateLimit from '@fastify/rate-limit';
import { serve } from 'inngest/fastify';
import { AppModule } from './app.module';
import { ADMIN_KEY_HEADER } from './common/guards/admin-key.guard';
import { REQUEST_ID_HEADER } from './common/interfaces/tenant-context.interface';
import { ProvisioningFunctions } from './provisioning/inngest/provisioning.functions';

const INNGEST_SERVE_PATH = '/api/inngest';

async function bootstrap() {
  const app: NestFastifyApplication = await NestFactory.create(
    AppModule,
    new FastifyAdapter({
      logger: false,
      trustProxy: true, // x-forwarded-host is only honoured behind a trusted proxy
    }),
    { bufferLogs: true },
  );

  // Use Pino logger globally
  app.useLogger(app.get(Logger));
  // Drain tenant pools on SIGTERM
  app.enableShutdownHooks();

  // Get configuration service
  const configService = app.get(ConfigService);
  const port = parseInt(configService.get('PORT', '3000'), 10);

  // Configure security headers with Helmet
  await app.register(fastifyHelmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
    crossOriginEmbedderPolicy: false, // Disable for API compatibility
  });

  // Tenants are addressed by host, so any origin may call in
  await app.register(fastifyCors, {
    origin: true,
    methods: ['GET', 'POST', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', REQUEST_ID_HEADER, ADMIN_KEY_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER, 'Retry-After'],
  });

  // Configure rate limiting
  await app.register(fastifyRateLimit, {
    max: parseInt(configService.get('RATE_LIMIT_MAX_REQUESTS', '1000'), 10),
    timeWindow: parseInt(configService.get('RATE_LIMIT_WINDOW_MS', '900000'), 10), // 15 minutes
    allowList: request => request.url.startsWith(INNGEST_SERVE_PATH),
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: 'Rate limit exceeded, please try again later.',
    }),
  });

  // Enable global validation
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Remove non-whitelisted properties
      forbidNonWhitelisted: true, // Throw error if non-whitelisted properties exist
      transform: true, // Transform plain objects to DTO classes
    }),
  );

  // Inngest calls back on this route to run the provisioning functions
  const functions = app.get(ProvisioningFunctions);
  app
    .getHttpAdapter()
    .getInstance()
    .route({
      method: ['GET', 'POST', 'PUT'],
      url: INNGEST_SERVE_PATH,
      handler: serve({ client: functions.client, functions: functions.all() }),
    });

  // Configure Swagger/OpenAPI
  const config = new DocumentBuilder()
    .setTitle('Tenant Switchboard')
    .setDescription('Host-routed tenant data access and the operator API that manages tenants')
    .setVersion(configService.get('APP_VERSION', '1.0.0'))
    .addApiKey({ type: 'apiKey', name: ADMIN_KEY_HEADER, in: 'header' }, ADMIN_KEY_HEADER)
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document, {
    jsonDocumentUrl: '/openapi.json',
    swaggerOptions: { persistAuthorization: true },
  });

  await app.listen(port, '0.0.0.0');

  const logger = app.get(Logger);
  logger.log(`Application is running on port ${port}`, 'Bootstrap');
  logger.log(`Environment: ${configService.get('NODE_ENV', 'development')}`, 'Bootstrap');
}

void bootstrap();
