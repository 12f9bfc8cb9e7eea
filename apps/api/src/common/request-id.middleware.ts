import type { NestMiddleware } from '@nestjs/common';
import { Inject, Injectable } from '@nestjs/common';
import type { IncomingHttpHeaders, ServerResponse } from 'node:http';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ensureRequestId } from '@seva/common';
import type { Logger } from '@seva/common';
import { APP_LOGGER } from '../tokens.js';

const headerValue = (headers: IncomingHttpHeaders, name: string): string | undefined => {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
};

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  constructor(@Inject(APP_LOGGER) private readonly logger: Logger) {}

  use(req: FastifyRequest & { requestId?: string }, res: FastifyReply | ServerResponse, next: () => void) {
    const requestId = ensureRequestId(headerValue(req.headers, 'x-request-id'));
    const response = 'raw' in res ? res.raw : res;

    req.requestId = requestId;
    response.setHeader('x-request-id', requestId);

    this.logger.info('request_received', {
      request_id: requestId,
      method: req.method,
      path: req.url
    });

    response.on('finish', () => {
      this.logger.info('request_completed', {
        request_id: requestId,
        method: req.method,
        path: req.url,
        status_code: response.statusCode
      });
    });

    next();
  }
}
