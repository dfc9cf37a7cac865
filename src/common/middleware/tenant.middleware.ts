import { BadRequestException, Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { pickRequestHost } from '../../resolver/host-parser';
import { REQUEST_ID_HEADER, TENANT_HOST_HEADER } from '../interfaces/tenant-context.interface';

@Injectable()
export class TenantMiddleware implements NestMiddleware {
  use(req: IncomingMessage, res: ServerResponse, next: () => void): void {
    // Generate or use existing request ID for traceability
    const incomingId = req.headers[REQUEST_ID_HEADER];
    const requestId = typeof incomingId === 'string' && incomingId.length > 0 ? incomingId : randomUUID();
    req.headers[REQUEST_ID_HEADER] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const host = pickRequestHost(req.headers);
    if (!host) {
      throw new BadRequestException('Missing required Host header');
    }

    req.headers[TENANT_HOST_HEADER] = host;
    next();
  }
}
