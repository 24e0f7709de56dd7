/**
 * Worker entry point: evaluates each submitted check-in for escalation,
 * one job per check-in.
 */

import { type Job, Worker } from 'bullmq';
import { config } from '../config';
import { closeDatabase, db } from '../infra/db/client';
import { logger } from '../infra/logging/logger';
import { ESCALATION_QUEUE_NAME, closeRedis, redis } from '../infra/queue/client';
import { createEscalationService } from '../services';
import type { EscalationJobData, EscalationOutcome } from '../shared/types';
import { createEscalationProcessor } from './processor';

const escalationService = createEscalationService(db, config, logger);

const worker = new Worker<EscalationJobData, EscalationOutcome>(
  ESCALATION_QUEUE_NAME,
  createEscalationProcessor(escalationService, logger),
  {
    connection: redis,
    concurrency: config.workerConcurrency,
    maxStalledCount: 1,
    stalledInterval: 30000,
    lockDuration: config.jobTimeoutMs,
  }
);

worker.on('ready', () => {
  logger.info({ queue: ESCALATION_QUEUE_NAME, concurrency: config.workerConcurrency }, 'Worker ready');
});

worker.on('completed', (job: Job<EscalationJobData, EscalationOutcome>) => {
  logger.info({
    jobId: job.id,
    subjectId: job.data.subjectId,
    status: job.returnvalue.status,
    duration: Date.now() - job.timestamp,
  }, 'Job completed');
});

worker.on('failed', (job: Job<EscalationJobData, EscalationOutcome> | undefined, err: Error) => {
  logger.error({
    jobId: job?.id,
    subjectId: job?.data.subjectId,
    error: err.message,
    stack: err.stack,
  }, 'Job failed');
});

worker.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Worker error');
});

worker.on('stalled', (jobId: string) => {
  logger.warn({ jobId }, 'Job stalled');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  const timeout = setTimeout(() => {
    logger.warn('Shutdown timeout, forcing close');
    process.exit(1);
  }, 30000);

  try {
    await worker.close();
    clearTimeout(timeout);

    await closeDatabase();
    await closeRedis();

    logger.info('Worker shut down gracefully');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during worker shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

logger.info({ queue: ESCALATION_QUEUE_NAME }, 'Worker starting...');
