import { Pool } from 'pg';
import { config } from '../../config';
import { logger } from '../logging/logger';

// Connection pool with production-ready settings
export const db = new Pool({
  connectionString: config.databaseUrl,
  max: 20,                          // Max connections per instance
  min: 5,                           // Keep warm connections
  idleTimeoutMillis: 30000,         // Close after 30s idle
  connectionTimeoutMillis: 5000,    // Fail fast on connection
  maxUses: 10000,                   // Refresh connections periodically
  allowExitOnIdle: false,           // Keep pool alive
});

// Connection monitoring
db.on('connect', () => {
  logger.debug('New database connection established');
});

db.on('error', (err) => {
  logger.error({ error: err.message }, 'Unexpected database pool error');
});

db.on('remove', () => {
  logger.debug('Database connection removed from pool');
});

// Health check
export async function checkDatabaseHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: {
    total: number;
    idle: number;
    waiting: number;
  };
}> {
  const start = Date.now();

  try {
    await db.query('SELECT 1');
    const latencyMs = Date.now() - start;

    return {
      healthy: true,
      latencyMs,
      connections: {
        total: db.totalCount,
        idle: db.idleCount,
        waiting: db.waitingCount,
      },
    };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Database health check failed');
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      connections: {
        total: db.totalCount,
        idle: db.idleCount,
        waiting: db.waitingCount,
      },
    };
  }
}

export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('Database pool closed');
}
