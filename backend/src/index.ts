import * as dotenv from 'dotenv';
import { createApp } from './api/server';
import { initDatabase, healthCheck, closeDatabase } from './db/connection';
import { ensureSchema } from './db/init';
import { createEngineServices } from './services/EngineServices';
import { getConfig } from './utils/config';
import { configureLogger, logger } from './utils/logger';

dotenv.config();

const DEVELOPMENT_ENV = 'development';
const SHUTDOWN_TIMEOUT_MS = 10000;
const EXIT_SUCCESS = 0;
const EXIT_ERROR = 1;

function buildServerUrls(port: number): { base: string; api: string; health: string } {
  const base = `http://localhost:${port}`;
  return {
    base,
    api: `${base}/api`,
    health: `${base}/api/health`,
  };
}

async function start(): Promise<void> {
  try {
    const config = getConfig();
    configureLogger({ maskPii: config.maskPii });
    logger.info(`Starting server in ${config.nodeEnv} mode...`);

    await initDatabase({
      path: config.databasePath,
      verbose: config.nodeEnv === DEVELOPMENT_ENV,
    });

    const isHealthy = await healthCheck();
    if (!isHealthy) {
      throw new Error('Database health check failed');
    }
    await ensureSchema();

    const services = createEngineServices(config);
    const summary = await services.registry.reload();
    logger.info(`Template store version ${summary.version}: ${summary.template_count} templates, ${summary.errors.length} skipped`);

    const app = createApp(services);

    const server = app.listen(config.port, () => {
      const urls = buildServerUrls(config.port);
      logger.info(`Server running on ${urls.base}`);
      logger.info(`API available at ${urls.api}`);
      logger.info(`Health check: ${urls.health}`);
    });

    // SIGHUP reloads templates; a failed reload keeps the current store
    process.on('SIGHUP', () => {
      services.registry.reload().then(
        (result) => logger.info(`Templates reloaded: version ${result.version}, ${result.template_count} templates`),
        (err: unknown) => logger.error('Template reload failed:', err)
      );
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received. Shutting down gracefully...`);

      server.close(() => {
        logger.info('HTTP server closed');

        closeDatabase().then(
          () => process.exit(EXIT_SUCCESS),
          (err: unknown) => {
            logger.error('Error closing database:', err);
            process.exit(EXIT_ERROR);
          }
        );
      });

      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(EXIT_ERROR);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (err) {
    logger.error('Failed to start server:', err);
    process.exit(EXIT_ERROR);
  }
}

void start();
