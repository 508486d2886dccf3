import { Injectable, NestMiddleware } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { LoggerService } from './logger.service';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Reuses an incoming x-request-id (or assigns one), echoes it on the response
 * and logs the request once it has finished.
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  constructor(private logger: LoggerService) {
    this.logger.setContext('HTTP');
  }

  use(req: Request, res: Response, next: NextFunction) {
    const incoming = req.headers[REQUEST_ID_HEADER];
    const requestId = (Array.isArray(incoming) ? incoming[0] : incoming) || randomUUID();
    const start = Date.now();

    req.headers[REQUEST_ID_HEADER] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on('finish', () => {
      this.logger.log(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
        requestId,
        durationMs: Date.now() - start,
      });
    });

    next();
  }
}
