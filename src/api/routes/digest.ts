import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { DigestService } from '../../domain/digest/service';
import { digestQuerySchema, parseRequest } from '../schemas';

export interface DigestRouteOptions {
  digest: DigestService;
  now: () => Date;
}

export const digestRoutes: FastifyPluginAsync<DigestRouteOptions> = async (
  app: FastifyInstance,
  { digest, now }
) => {
  app.get('/', async (request) => {
    const query = parseRequest(digestQuerySchema, request.query);

    const result = await digest.buildDigest({
      overdueDays: query.overdueDays,
      maxPerSection: query.maxPerSection,
      timeZone: query.timeZone,
      now: now(),
    });

    return { success: true, data: result, correlationId: request.correlationId };
  });
};
