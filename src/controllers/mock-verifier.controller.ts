import { Request, Response } from 'express';
import { ValidateSessionResponse } from '../services/verifier.service';
import { logger } from '../utils/logger';

/**
 * Local stand-in for the external authority's validate-session endpoint.
 * Session tokens starting with `expired` are reported expired, tokens
 * starting with `invalid` are rejected with 401, anything else is live.
 */
export class MockVerifierController {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  validateSession(req: Request, res: Response): void {
    const apiKey = req.get('apikey');
    const requestId = req.get('x-request-id');
    const sessionToken = req.get('x-session-token');
    const userId = req.get('x-user-id');

    logger.info('Mock validate-session called', { requestId, sessionToken, userId });

    if (!apiKey) {
      res.status(401).json({ detail: 'Missing Apikey header' });
      return;
    }
    if (!requestId) {
      res.status(400).json({ detail: 'Missing x-request-id header' });
      return;
    }
    if (!sessionToken) {
      res.status(400).json({ detail: 'Missing x-session-token header' });
      return;
    }
    if (!userId) {
      res.status(400).json({ detail: 'Missing x-user-id header' });
      return;
    }
    if (sessionToken.startsWith('invalid')) {
      res.status(401).json({ detail: 'Invalid session token' });
      return;
    }

    const body: ValidateSessionResponse = {
      status: 'success',
      data: {
        isExpire: sessionToken.startsWith('expired'),
        userId,
        sessionToken,
        validatedAt: this.clock().toISOString(),
      },
      message: 'Session validation completed',
    };

    res.status(200).json(body);
  }
}
