import { Request, Response, NextFunction } from 'express';
import { ErrorFactory, ErrorHandler } from '../utils/error-handler';
import '../types/express';

export function notFoundHandler(req: Request, res: Response): void {
  const error = ErrorFactory.createNotFoundError(`No route for ${req.method} ${req.originalUrl}`);
  res.status(404).json(ErrorHandler.toUserResponse(error, req.id));
}

/**
 * Express error handler. Every failure is logged once here with the request's
 * correlation id; internals never reach the response body.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  // body-parser reports malformed JSON as a 400 with type entity.parse.failed
  const parseFailure = isBodyParserError(err)
    ? ErrorFactory.createValidationError(`Malformed request body: ${err.message}`)
    : undefined;
  const error = parseFailure ?? err;

  ErrorHandler.logAndMonitor(error, {
    requestId: req.id,
    correlationId: req.id,
    method: req.method,
    url: req.originalUrl,
  });

  res.status(ErrorHandler.statusCodeOf(error)).json(ErrorHandler.toUserResponse(error, req.id));
}

function isBodyParserError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}
