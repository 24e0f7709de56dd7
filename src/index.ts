import { buildApp } from './api/app';
import { config } from './config';
import { checkDatabaseHealth, closeDatabase, db } from './infra/db/client';
import { logger } from './infra/logging/logger';
import {
  addEscalationJob,
  checkRedisHealth,
  closeRedis,
  getQueueStats,
} from './infra/queue/client';
import { createApiServices } from './services';

async function bootstrap() {
  logger.info('Starting check-in alerts API...');

  const services = createApiServices(db, config, addEscalationJob);

  const app = await buildApp({
    ...services,
    health: {
      database: checkDatabaseHealth,
      redis: checkRedisHealth,
      queue: getQueueStats,
    },
  });

  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await closeDatabase();
      await closeRedis();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Bootstrap failed');
  process.exit(1);
});
