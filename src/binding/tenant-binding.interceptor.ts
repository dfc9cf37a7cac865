import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { finalize, from, Observable, switchMap } from 'rxjs';
import { RequestAbortedError } from '../common/errors/tenancy.errors';
import { TENANT_HOST_HEADER } from '../common/interfaces/tenant-context.interface';
import { TenantBindingService } from './tenant-binding.service';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * Binds the request to its tenant before the handler runs and releases the
 * store handle when the handler completes, fails, or the client disconnects.
 */
@Injectable()
export class TenantBindingInterceptor implements NestInterceptor {
  constructor(private readonly binding: TenantBindingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const reply = http.getResponse<FastifyReply>();

    const host = request.headers[TENANT_HOST_HEADER];
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        controller.abort(new RequestAbortedError());
      }
    };
    reply.raw.once('close', onClose);

    const bound = this.binding.bind(typeof host === 'string' ? host : '', {
      mutation: !SAFE_METHODS.has(request.method),
      signal: controller.signal,
    });

    return from(bound).pipe(
      switchMap(tenancy => {
        request.tenancy = tenancy;
        return next.handle();
      }),
      finalize(() => {
        reply.raw.off('close', onClose);
        // A bind that settles after unsubscription is released here too;
        // its failure has already been delivered through the stream.
        void bound.then(
          tenancy => tenancy.release(),
          () => undefined,
        );
      }),
    );
  }
}
