import type { NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';
import { ValidationError } from '../../lib/errors';

/**
 * body-parser marks unparseable JSON bodies this way
 */
function isBodyParseError(error: unknown): boolean {
  return error instanceof Error && 'type' in error && error.type === 'entity.parse.failed';
}

export function errorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = res.locals.requestId;

    if (error instanceof ValidationError || isBodyParseError(error)) {
      const details = error instanceof ValidationError ? error.issues : ['body: malformed JSON'];
      logger.warn({ requestId, path: req.path, details }, 'Request validation failed');
      res.status(422).json({ error: 'Validation failed', details, request_id: requestId });
      return;
    }

    logger.error(
      { requestId, method: req.method, path: req.path, err: error },
      'Unhandled error while serving request',
    );
    res.status(500).json({
      error: 'Internal server error',
      message: 'An unexpected error occurred. Please try again later.',
      request_id: requestId,
    });
  };
}
