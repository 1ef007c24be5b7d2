import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const SHUTDOWN_TIMEOUT_MS = 30_000;

const container = new AppContainer();
const { logger } = container;

await container.initialize();

const app = createApp(container);
const { port, host } = container.config.server;

const server = app.listen(port, host, () => {
  logger.info(
    {
      port,
      host,
      env: container.config.env,
      storage: container.config.storage.driver,
      endpoints: [
        'GET    /health',
        'POST   /accounts',
        'GET    /accounts/:accountId',
        'GET    /accounts/:accountId/transactions',
        'POST   /transactions',
        'GET    /transactions/:transactionId',
        'GET    /operation-types',
      ],
    },
    'Banking API listening',
  );
});

let shuttingDown = false;

const shutdown = (signal: NodeJS.Signals): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.info({ signal }, 'shutting down');

  const forceExit = setTimeout(() => {
    logger.error('graceful shutdown timed out');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server.close((closeError) => {
    container
      .close()
      .then(() => {
        if (closeError) {
          logger.error({ err: closeError }, 'http server closed with error');
          process.exit(1);
        }

        logger.info('server exited gracefully');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'failed to release resources');
        process.exit(1);
      });
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
