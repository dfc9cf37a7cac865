import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import * as Sentry from '@sentry/nestjs';
import { TenancyErrorCode, isTenancyError } from '../errors/tenancy.errors';
import { REQUEST_ID_HEADER, TENANT_HOST_HEADER } from '../interfaces/tenant-context.interface';

/** Non-standard status for a client that hung up before the response was written. */
const CLIENT_CLOSED_REQUEST = 499;

const STATUS_BY_CODE: Record<TenancyErrorCode, number> = {
  not_found: HttpStatus.NOT_FOUND,
  not_ready: HttpStatus.SERVICE_UNAVAILABLE,
  suspended: HttpStatus.FORBIDDEN,
  retired: HttpStatus.GONE,
  store_unavailable: HttpStatus.SERVICE_UNAVAILABLE,
  pool_exhausted: HttpStatus.SERVICE_UNAVAILABLE,
  provisioning_failed: HttpStatus.SERVICE_UNAVAILABLE,
  invalid_transition: HttpStatus.CONFLICT,
  status_conflict: HttpStatus.CONFLICT,
  request_aborted: CLIENT_CLOSED_REQUEST,
};

/** Seconds a client should wait before retrying, for outcomes that clear up on their own. */
const RETRY_AFTER_SECONDS: Partial<Record<TenancyErrorCode, number>> = {
  not_ready: 5,
  pool_exhausted: 1,
};

interface ErrorDescription {
  status: number;
  code?: string;
  message: string;
  validationErrors?: unknown;
  retryAfter?: number;
}

@Catch()
export class TenancyExceptionFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(TenancyExceptionFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const { status, code, message, validationErrors, retryAfter } = this.describe(exception);
    const logContext = {
      status,
      code,
      url: request.url,
      method: request.method,
      tenantId: request.tenancy?.tenantId,
      host: request.headers[TENANT_HOST_HEADER],
      requestId: request.headers[REQUEST_ID_HEADER],
    };

    if (status >= 500 && !isTenancyError(exception)) {
      Sentry.withScope(scope => {
        scope.setContext('request', {
          url: request.url,
          method: request.method,
          query: request.query,
          ip: request.ip,
        });
        if (logContext.tenantId) {
          scope.setTag('tenantId', logContext.tenantId);
        }
        scope.setTag('httpStatus', status);
        scope.setLevel('error');
        Sentry.captureException(exception);
      });

      this.logger.error(
        {
          ...logContext,
          error: exception instanceof Error ? exception.message : String(exception),
          stack: exception instanceof Error ? exception.stack : undefined,
        },
        'Unhandled exception',
      );
    } else if (status >= 500) {
      this.logger.warn({ ...logContext, error: message }, 'Tenant request could not be served');
    } else {
      this.logger.debug({ ...logContext, error: message }, 'Client error');
    }

    const body: Record<string, unknown> = {
      statusCode: status,
      message,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    if (code) {
      body.code = code;
    }
    if (validationErrors) {
      body.errors = validationErrors;
    }

    if (retryAfter !== undefined) {
      reply.header('Retry-After', String(retryAfter));
    }
    reply.code(status).send(body);
  }

  private describe(exception: unknown): ErrorDescription {
    if (isTenancyError(exception)) {
      return {
        status: STATUS_BY_CODE[exception.code],
        code: exception.code,
        message: exception.message,
        retryAfter: RETRY_AFTER_SECONDS[exception.code],
      };
    }

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      if (typeof response === 'string') {
        return { status: exception.getStatus(), message: response };
      }
      const payload = this.readPayload(response);
      return {
        status: exception.getStatus(),
        message: payload.message ?? exception.message,
        code: payload.error,
        validationErrors: payload.details,
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    };
  }

  /**
   * Pulls the fields Nest puts on an exception response. ValidationPipe sends
   * an array of messages; it is returned as the error details.
   */
  private readPayload(response: object): { message?: string; error?: string; details?: unknown } {
    const message = 'message' in response ? response.message : undefined;
    const error = 'error' in response && typeof response.error === 'string' ? response.error : undefined;

    if (Array.isArray(message)) {
      return { message: 'Validation failed', error, details: message };
    }
    return { message: typeof message === 'string' ? message : undefined, error };
  }
}
