import { ArgumentsHost, BadRequestException, NotFoundException } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import * as Sentry from '@sentry/nestjs';
import { asPinoLogger, createMockLogger, MockLogger } from '../../../tests/fakes/tenant.fixtures';
import {
  InvalidStatusTransitionError,
  PoolExhaustedError,
  RequestAbortedError,
  StoreUnavailableError,
  TenantNotReadyError,
  TenantRetiredError,
  TenantSuspendedError,
  UnknownTenantError,
} from '../errors/tenancy.errors';
import { TenancyExceptionFilter } from './tenancy-exception.filter';

const mockScope = {
  setContext: jest.fn(),
  setTag: jest.fn(),
  setLevel: jest.fn(),
};

jest.mock('@sentry/nestjs', () => ({
  withScope: jest.fn((callback: (scope: typeof mockScope) => void) => callback(mockScope)),
  captureException: jest.fn(),
}));

describe('TenancyExceptionFilter', () => {
  let logger: MockLogger;
  let filter: TenancyExceptionFilter;
  let reply: { code: jest.Mock; send: jest.Mock; header: jest.Mock };
  let host: ArgumentsHost;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = createMockLogger();
    filter = new TenancyExceptionFilter(asPinoLogger(logger));

    const request = {
      url: '/notes',
      method: 'GET',
      headers: { 'x-tenant-host': 'acme.example.com', 'x-request-id': 'req-1' },
      query: {},
      ip: '127.0.0.1',
    } as unknown as FastifyRequest;
    reply = {
      code: jest.fn().mockReturnThis(),
      send: jest.fn().mockReturnThis(),
      header: jest.fn().mockReturnThis(),
    };
    host = {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => reply as unknown as FastifyReply,
      }),
    } as unknown as ArgumentsHost;
  });

  it.each([
    [new UnknownTenantError('ghost'), 404, 'not_found'],
    [new TenantSuspendedError('T2'), 403, 'suspended'],
    [new TenantRetiredError('T2'), 410, 'retired'],
    [new StoreUnavailableError('T1'), 503, 'store_unavailable'],
    [new InvalidStatusTransitionError('T1', 'RETIRED', 'ACTIVE'), 409, 'invalid_transition'],
  ])('should map %s to %i', (error, status, code) => {
    filter.catch(error, host);

    expect(reply.code).toHaveBeenCalledWith(status);
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: status, code, message: error.message, path: '/notes' }),
    );
  });

  it('should tell clients when to retry a tenant that is not ready', () => {
    filter.catch(new TenantNotReadyError('T1'), host);

    expect(reply.header).toHaveBeenCalledWith('Retry-After', '5');
    expect(reply.code).toHaveBeenCalledWith(503);
  });

  it('should tell clients when to retry an exhausted pool', () => {
    filter.catch(new PoolExhaustedError('T3', 50), host);

    expect(reply.header).toHaveBeenCalledWith('Retry-After', '1');
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 503, code: 'pool_exhausted' }),
    );
  });

  it('should not send Retry-After for terminal outcomes', () => {
    filter.catch(new TenantRetiredError('T2'), host);

    expect(reply.header).not.toHaveBeenCalled();
  });

  it('should log tenancy 5xx outcomes without reporting them to Sentry', () => {
    filter.catch(new StoreUnavailableError('T1'), host);

    expect(Sentry.captureException).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ status: 503, code: 'store_unavailable', host: 'acme.example.com' }),
      'Tenant request could not be served',
    );
  });

  it('should log a client disconnect at debug without reporting it', () => {
    filter.catch(new RequestAbortedError(), host);

    expect(reply.code).toHaveBeenCalledWith(499);
    expect(Sentry.captureException).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ status: 499, code: 'request_aborted' }),
      'Client error',
    );
  });

  it('should pass HTTP exceptions through with their own status', () => {
    filter.catch(new NotFoundException('Tenant x not found'), host);

    expect(reply.code).toHaveBeenCalledWith(404);
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 404, message: 'Tenant x not found', code: 'Not Found' }),
    );
    expect(logger.debug).toHaveBeenCalled();
  });

  it('should surface validation messages as error details', () => {
    filter.catch(new BadRequestException(['body should not be empty']), host);

    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 400,
        message: 'Validation failed',
        errors: ['body should not be empty'],
      }),
    );
  });

  it('should hide unexpected errors behind a 500 and report them', () => {
    const error = new Error('boom');

    filter.catch(error, host);

    expect(reply.code).toHaveBeenCalledWith(500);
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, message: 'Internal server error' }),
    );
    expect(Sentry.captureException).toHaveBeenCalledWith(error);
    expect(mockScope.setTag).toHaveBeenCalledWith('httpStatus', 500);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'boom', requestId: 'req-1' }),
      'Unhandled exception',
    );
  });
});
