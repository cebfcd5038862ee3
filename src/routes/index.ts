import { Router } from 'express';
import { PostloginController } from '../controllers/postlogin.controller';
import { HealthController } from '../controllers/health.controller';
import { MockVerifierController } from '../controllers/mock-verifier.controller';
import { requireBearerToken } from '../middleware/auth.middleware';
import { SessionService } from '../services/session.service';
import { VALIDATE_SESSION_PATH } from '../services/verifier.service';
import { SessionStore } from '../stores/session.store';

export interface RouteDependencies {
  sessionService: SessionService;
  store: SessionStore;
  mockVerifierEnabled?: boolean;
}

export function createPostloginRoutes(sessionService: SessionService, healthController: HealthController): Router {
  const router = Router();
  const postloginController = new PostloginController(sessionService);

  router.post('/init-session', postloginController.initiateSession.bind(postloginController));
  router.post('/renew-token', postloginController.renewToken.bind(postloginController));
  router.post('/logout', postloginController.logout.bind(postloginController));
  router.get('/session', requireBearerToken, postloginController.getSession.bind(postloginController));
  router.get('/health', healthController.checkLiveness.bind(healthController));

  return router;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();
  const healthController = new HealthController(deps.store);

  router.get('/health', healthController.checkLiveness.bind(healthController));
  router.get('/health/ready', healthController.checkReadiness.bind(healthController));
  router.use('/postlogin', createPostloginRoutes(deps.sessionService, healthController));

  if (deps.mockVerifierEnabled) {
    const mockVerifierController = new MockVerifierController();
    router.post(VALIDATE_SESSION_PATH, mockVerifierController.validateSession.bind(mockVerifierController));
  }

  return router;
}
