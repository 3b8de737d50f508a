import type { NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { createTimer } from '../../lib/logger';

declare global {
  namespace Express {
    interface Locals {
      requestId: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Assigns a request id and logs the request once the response is sent
 */
export function requestContext(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? nanoid(12);
    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const timer = createTimer(logger, 'http-request', {
      requestId,
      method: req.method,
      path: req.path,
    });
    res.on('finish', () => {
      timer.end({ status: res.statusCode });
    });
    next();
  };
}
