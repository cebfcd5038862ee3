import { Request, Response, NextFunction } from 'express';
import { SessionService } from '../services/session.service';
import { correlationIdOf } from '../middleware/logging.middleware';
import { ErrorFactory } from '../utils/error-handler';
import { logger } from '../utils/logger';
import '../types/express';

/**
 * Older clients wrap request bodies as `{ data: {...} }`; both shapes are
 * accepted.
 */
export function unwrapEnvelope(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
    const keys = Object.keys(body);
    if (keys.length === 1 && keys[0] === 'data' && 'data' in body) {
      return body.data;
    }
  }
  return body;
}

function refreshTokenOf(body: unknown): unknown {
  const payload = unwrapEnvelope(body);
  if (typeof payload === 'object' && payload !== null && 'refreshToken' in payload) {
    return payload.refreshToken;
  }
  return undefined;
}

export class PostloginController {
  constructor(private readonly sessionService: SessionService) {}

  async initiateSession(req: Request, res: Response, next: NextFunction): Promise<void> {
    const correlationId = correlationIdOf(req);
    logger.debug('Initializing post-login session', { correlationId });

    try {
      const result = await this.sessionService.initiate(unwrapEnvelope(req.body), correlationId);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  }

  async renewToken(req: Request, res: Response, next: NextFunction): Promise<void> {
    const correlationId = correlationIdOf(req);
    logger.debug('Renewing post-login token', { correlationId });

    try {
      const result = await this.sessionService.renew(refreshTokenOf(req.body), correlationId);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  }

  async logout(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.sessionService.invalidate(refreshTokenOf(req.body), correlationIdOf(req));
      res.status(200).json({ message: 'Session invalidated successfully' });
    } catch (error) {
      next(error);
    }
  }

  async getSession(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.accessToken) {
        throw ErrorFactory.createInvalidTokenError('Missing access token');
      }
      const session = await this.sessionService.describe(req.accessToken, correlationIdOf(req));
      res.status(200).json({ session });
    } catch (error) {
      next(error);
    }
  }
}
