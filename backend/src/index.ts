/**
 * Employee Directory API - Entry Point
 */

import { createServer } from './infrastructure/http/server.js';
import { createLogger } from './infrastructure/logging/logger.js';
import { loadConfig, validateConfig } from './config/index.js';

const logger = createLogger('main');

async function bootstrap(): Promise<void> {
  try {
    const config = loadConfig();
    const configErrors = validateConfig(config);

    if (configErrors.length > 0) {
      logger.fatal({ errors: configErrors }, 'Configuration errors');
      process.exit(1);
    }

    logger.info({
      env: config.env,
      host: config.server.host,
      port: config.server.port,
    }, 'Starting server');

    const server = await createServer(config);

    await server.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({
      url: `http://${config.server.host}:${config.server.port}`,
    }, 'Server listening');

    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutting down');

      try {
        await server.close();
        logger.info('Shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Shutdown error');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('uncaughtException', (error) => {
      logger.fatal({ err: error }, 'Uncaught exception');
      process.exit(1);
    });
    process.on('unhandledRejection', (reason) => {
      logger.fatal({ err: reason }, 'Unhandled rejection');
      process.exit(1);
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void bootstrap();
