import { Request, Response, NextFunction } from 'express';
import { ErrorFactory } from '../utils/error-handler';
import '../types/express';

/**
 * Extracts the bearer access token. Validation of the token itself is left
 * to the session service so that every token failure maps to one code.
 */
export function requireBearerToken(req: Request, res: Response, next: NextFunction): void {
  const header = req.get('authorization');
  const match = header ? /^Bearer\s+(\S+)$/i.exec(header.trim()) : null;

  if (!match) {
    next(ErrorFactory.createInvalidTokenError('Missing or malformed Authorization header', {
      requestId: req.id,
    }));
    return;
  }

  req.accessToken = match[1];
  next();
}
