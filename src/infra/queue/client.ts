import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { config } from '../../config';
import { logger } from '../logging/logger';
import type { EscalationJobData } from '../../shared/types';

// Redis connection with production settings
export const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: false,
  retryStrategy: (times: number) => {
    if (times > 20) {
      logger.error('Redis connection failed after 20 retries');
      return null; // Stop retrying
    }
    return Math.min(times * 100, 3000);
  },
  reconnectOnError: (err) => {
    const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
    return targetErrors.some((e) => err.message.includes(e));
  },
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

redis.on('error', (err) => {
  logger.error({ error: err.message }, 'Redis error');
});

redis.on('close', () => {
  logger.warn('Redis connection closed');
});

// ============================================================================
// Queue Definitions
// ============================================================================

export const ESCALATION_QUEUE_NAME = 'checkin-escalation';
export const ESCALATION_JOB_NAME = 'escalation';

export const escalationQueue = new Queue<EscalationJobData>(ESCALATION_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    // An alert that failed mid-way must not be sent twice
    attempts: 1,
    removeOnComplete: {
      count: 1000,
      age: 3600,
    },
    removeOnFail: {
      count: 5000,
      age: 86400,
    },
  },
});

// ============================================================================
// Queue Operations
// ============================================================================

export async function addEscalationJob(data: EscalationJobData): Promise<string> {
  const job = await escalationQueue.add(ESCALATION_JOB_NAME, data, {
    jobId: `escalation-${data.checkInId}`, // One evaluation per check-in
  });

  const jobId = job.id ?? `escalation-${data.checkInId}`;
  logger.info({ jobId, subjectId: data.subjectId, checkInId: data.checkInId }, 'Job added to queue');

  return jobId;
}

export async function getQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}> {
  const [waiting, active, completed, failed, delayed, paused] = await Promise.all([
    escalationQueue.getWaitingCount(),
    escalationQueue.getActiveCount(),
    escalationQueue.getCompletedCount(),
    escalationQueue.getFailedCount(),
    escalationQueue.getDelayedCount(),
    escalationQueue.isPaused(),
  ]);

  return { waiting, active, completed, failed, delayed, paused };
}

// ============================================================================
// Health Check
// ============================================================================

export async function checkRedisHealth(): Promise<{
  healthy: boolean;
  latencyMs: number;
}> {
  const start = Date.now();

  try {
    await redis.ping();
    return {
      healthy: true,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis ping failed');
    return {
      healthy: false,
      latencyMs: Date.now() - start,
    };
  }
}

// ============================================================================
// Cleanup
// ============================================================================

export async function closeRedis(): Promise<void> {
  await escalationQueue.close();
  await redis.quit();
  logger.info('Redis connections closed');
}
