import { EventEmitter } from 'events';
import type { NextFunction, Request, Response } from 'express';
import { RequestIdMiddleware } from './request-id.middleware';
import { LoggerService } from './logger.service';

describe('RequestIdMiddleware', () => {
  let logger: { setContext: jest.Mock; log: jest.Mock };
  let middleware: RequestIdMiddleware;

  const createResponse = () => {
    const emitter = new EventEmitter();
    const headers: Record<string, string> = {};
    const res = Object.assign(emitter, {
      statusCode: 200,
      setHeader: jest.fn((name: string, value: string) => {
        headers[name] = value;
      }),
    });
    return { res, headers };
  };

  beforeEach(() => {
    logger = {
      setContext: jest.fn(),
      log: jest.fn(),
    };
    middleware = new RequestIdMiddleware(logger as unknown as LoggerService);
  });

  it('should reuse an incoming request id and log on finish', () => {
    const req = { headers: { 'x-request-id': 'req-1' }, method: 'POST', originalUrl: '/api/dashboard' };
    const { res, headers } = createResponse();
    const next: NextFunction = jest.fn();

    middleware.use(req as unknown as Request, res as unknown as Response, next);
    res.emit('finish');

    expect(headers['x-request-id']).toBe('req-1');
    expect(next).toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith(
      'POST /api/dashboard 200',
      expect.objectContaining({ requestId: 'req-1' }),
    );
  });

  it('should assign a request id when none is sent', () => {
    const req: { headers: Record<string, string | undefined>; method: string; originalUrl: string } = {
      headers: {},
      method: 'GET',
      originalUrl: '/health',
    };
    const { res, headers } = createResponse();

    middleware.use(req as unknown as Request, res as unknown as Response, jest.fn());

    expect(headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    expect(req.headers['x-request-id']).toBe(headers['x-request-id']);
  });
});
