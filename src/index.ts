import { createApp } from './app';
import { loadConfig } from './config';
import { createContainer } from './container';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const config = loadConfig();
  const container = await createContainer(config);

  const app = createApp({
    sessionService: container.sessionService,
    store: container.store,
    mockVerifierEnabled: config.verifier.mockEnabled,
  });

  const server = app.listen(config.app.port, () => {
    logger.info(`Server is running on port ${config.app.port}`, {
      environment: config.app.environment,
      renewalMode: config.session.renewalMode,
      sessionStore: config.session.store,
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, closing server gracefully`);

    const forceExit = setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close(() => {
      container.shutdown()
        .then(() => {
          logger.info('Server closed successfully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { error: reason });
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
