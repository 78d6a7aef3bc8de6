import 'reflect-metadata';
import { Server } from 'http';
import { ServiceContainer } from './application/ServiceContainer';
import { ValidatedConfiguration as Configuration } from './config/validated';
import { createServer } from './interfaces/rest';
import { logger } from './lib/logger';

/**
 * Start the REST server with its own service container
 */
export function startServer(port: number = Configuration.server.port): Server {
  const container = ServiceContainer.create();
  const app = createServer(container);

  const server = app.listen(port, () => {
    logger.info(`Server listening on port ${port}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully...`);

    server.close(() => {
      logger.info('HTTP server closed');
    });

    await container.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(error => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  return server;
}

if (require.main === module) {
  startServer();
}
