import express, { Express } from 'express';
import { createRoutes, RouteDependencies } from './routes';
import { loggingMiddleware } from './middleware/logging.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export function createApp(deps: RouteDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(loggingMiddleware);
  app.use(express.json({ limit: '50kb' }));

  app.use('/api/v1', createRoutes(deps));
  app.use('/', createRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
