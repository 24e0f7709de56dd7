import { randomUUID } from 'crypto';
import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import cors from '@fastify/cors';
import { config } from '../config';
import type { CheckinService } from '../domain/checkin/service';
import type { DigestService } from '../domain/digest/service';
import type { SubjectDirectory } from '../domain/subject/service';
import type { TrendService } from '../domain/trends/service';
import { logger } from '../infra/logging/logger';
import { NotFoundError, ValidationError } from '../shared/errors';
import { authMiddleware } from './middleware/auth';
import { correlationMiddleware } from './middleware/correlation';
import { digestRoutes } from './routes/digest';
import { type HealthChecks, healthRoutes } from './routes/health';
import { subjectRoutes } from './routes/checkins';

export interface AppDependencies {
  checkins: CheckinService;
  subjects: SubjectDirectory;
  trends: TrendService;
  digest: DigestService;
  health: HealthChecks;
  now?: () => Date;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const now = deps.now ?? (() => new Date());

  // Typed against the base logger so plugins and callers see a plain FastifyInstance
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression,
    RawReplyDefaultExpression,
    FastifyBaseLogger
  >({
    logger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  await app.register(cors, {
    origin: config.corsOrigins.includes('*') ? true : config.corsOrigins,
    credentials: true,
  });

  await app.register(correlationMiddleware);

  // Set before any encapsulated scope so every route inherits them
  app.setNotFoundHandler(async (request) => {
    throw new NotFoundError(`Route ${request.method} ${request.url} not found`);
  });

  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;

    const statusCode = error.statusCode ?? 500;
    const code = error.code;

    const logFields = { correlationId, error: error.message, code, statusCode };
    if (statusCode >= 500) {
      request.log.error({ ...logFields, stack: error.stack }, 'Request error');
    } else {
      request.log.warn(logFields, 'Request error');
    }

    // Don't expose internal errors
    const message =
      statusCode === 503
        ? 'Service unavailable'
        : statusCode >= 500
          ? 'Internal server error'
          : error.message;

    reply.status(statusCode).send({
      success: false,
      error: message,
      code,
      ...(error instanceof ValidationError ? { details: error.errors } : {}),
      correlationId,
    });
  });

  // Probes stay unauthenticated
  await app.register(healthRoutes, { checks: deps.health });

  await app.register(
    async (api) => {
      api.addHook('onRequest', authMiddleware);

      await api.register(subjectRoutes, {
        prefix: '/subjects',
        checkins: deps.checkins,
        trends: deps.trends,
        subjects: deps.subjects,
        now,
      });
      await api.register(digestRoutes, { prefix: '/digest', digest: deps.digest, now });
    },
    { prefix: '/api' }
  );

  return app;
}
