import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { CheckinService } from '../../domain/checkin/service';
import type { TrendService } from '../../domain/trends/service';
import type { SubjectDirectory } from '../../domain/subject/service';
import { BadRequestError, SubjectNotFoundError } from '../../shared/errors';
import {
  checkInBodySchema,
  historyQuerySchema,
  subjectParamsSchema,
  trendsQuerySchema,
  parseRequest,
} from '../schemas';

export interface SubjectRouteOptions {
  checkins: CheckinService;
  trends: TrendService;
  subjects: SubjectDirectory;
  now: () => Date;
}

export const subjectRoutes: FastifyPluginAsync<SubjectRouteOptions> = async (
  app: FastifyInstance,
  { checkins, trends, subjects, now }
) => {
  // ============================================================================
  // Check-ins
  // ============================================================================

  app.post('/:subjectId/checkins', async (request, reply) => {
    const { subjectId } = parseRequest(subjectParamsSchema, request.params);
    const body = parseRequest(checkInBodySchema, request.body);

    const record = await checkins.submitCheckin(subjectId, body, now());

    reply.status(201);
    return { success: true, data: record, correlationId: request.correlationId };
  });

  app.get('/:subjectId/checkins', async (request) => {
    const { subjectId } = parseRequest(subjectParamsSchema, request.params);
    const query = parseRequest(historyQuerySchema, request.query);

    if (query.from && query.to && query.from.getTime() > query.to.getTime()) {
      throw new BadRequestError('"from" must not be after "to"');
    }

    const records = await checkins.listHistory(subjectId, {
      startDate: query.from,
      endDate: query.to,
      keyword: query.keyword,
      limit: query.limit,
    });

    return { success: true, data: records, correlationId: request.correlationId };
  });

  app.get('/:subjectId/latest', async (request) => {
    const { subjectId } = parseRequest(subjectParamsSchema, request.params);

    const summary = await checkins.getLatestSummary(subjectId);

    return { success: true, data: summary, correlationId: request.correlationId };
  });

  // ============================================================================
  // Trends
  // ============================================================================

  app.get('/:subjectId/trends', async (request) => {
    const { subjectId } = parseRequest(subjectParamsSchema, request.params);
    const query = parseRequest(trendsQuerySchema, request.query);

    if (!(await subjects.findById(subjectId))) {
      throw new SubjectNotFoundError(subjectId);
    }

    const result = await trends.computeTrends(subjectId, query.windowDays, query.maxRecords, {
      now: now(),
      timeZone: query.timeZone,
    });

    return { success: true, data: result, correlationId: request.correlationId };
  });
};
