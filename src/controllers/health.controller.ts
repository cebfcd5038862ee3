import { Request, Response } from 'express';
import { SessionStore } from '../stores/session.store';
import { logger } from '../utils/logger';

export interface LivenessStatus {
  status: 'healthy';
  service: string;
}

export interface ReadinessStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  checks: {
    sessionStore: 'pass' | 'fail';
  };
  responseTime?: number;
}

export class HealthController {
  private readonly startTime = Date.now();

  constructor(private readonly store: SessionStore) {}

  /**
   * Static liveness answer; touches nothing.
   */
  checkLiveness(req: Request, res: Response): void {
    const body: LivenessStatus = { status: 'healthy', service: 'postlogin' };
    res.status(200).json(body);
  }

  async checkReadiness(req: Request, res: Response): Promise<void> {
    const requestStartTime = Date.now();
    let storeHealthy = false;

    try {
      storeHealthy = await this.store.ping();
    } catch (error) {
      logger.error('Readiness check failed', { error, action: 'health_check_error' });
    }

    const body: ReadinessStatus = {
      status: storeHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      checks: {
        sessionStore: storeHealthy ? 'pass' : 'fail',
      },
      responseTime: Date.now() - requestStartTime,
    };

    res.status(storeHealthy ? 200 : 503).json(body);
  }
}
