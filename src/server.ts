import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { createServiceLogger } from './observability';
import { Ledger } from './services/ledger';

const logger = createServiceLogger('server');

const startServer = (): void => {
  const ledger = new Ledger({
    initialBalance: config.ledger.initialBalance,
    initialBank: config.ledger.initialBank,
  });
  const app = createApp({ ledger });

  const server = app.listen(config.port, () => {
    logger.info(
      { ...getEnvironmentInfo(), initialBalance: config.ledger.initialBalance },
      `Server running on port ${config.port}`
    );
  });

  server.on('error', (error) => {
    logger.fatal({ error }, 'HTTP server error');
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
      logger.info('Graceful shutdown completed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer();
