import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, LogMetadata } from '../utils/logger';
import '../types/express';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Assigns the correlation id (client supplied `x-request-id`, otherwise a
 * fresh UUID), echoes it back and logs the request/response pair.
 */
export function loggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get(REQUEST_ID_HEADER);
  req.id = incoming && incoming.trim() ? incoming.trim() : uuidv4();
  req.startTime = Date.now();

  res.setHeader('X-Request-ID', req.id);

  logger.info(`Request received: ${req.method} ${req.originalUrl}`, {
    requestId: req.id,
    action: 'request_received',
    userAgent: req.get('user-agent'),
    ip: getClientIp(req),
  });

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime ?? Date.now());
    const metadata: LogMetadata = {
      requestId: req.id,
      action: 'response_sent',
      duration,
      statusCode: res.statusCode,
    };

    if (res.statusCode >= 500) {
      logger.error(`Response sent (error): ${req.method} ${req.originalUrl} - ${res.statusCode}`, metadata);
    } else if (res.statusCode >= 400) {
      logger.warn(`Response sent (rejected): ${req.method} ${req.originalUrl} - ${res.statusCode}`, metadata);
    } else {
      logger.info(`Response sent: ${req.method} ${req.originalUrl} - ${res.statusCode}`, metadata);
    }
  });

  next();
}

export function getClientIp(req: Request): string {
  const forwarded = req.get('x-forwarded-for');
  if (forwarded) {
    return forwarded.split(',')[0].trim();
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
}

export function correlationIdOf(req: Request): string {
  return req.id ?? uuidv4();
}
