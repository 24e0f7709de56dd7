import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

const correlationPlugin: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.decorateRequest('correlationId', '');

  app.addHook('onRequest', async (request, reply) => {
    // Use existing correlation ID from header, or the request id
    const correlationId =
      firstHeader(request.headers['x-correlation-id']) ||
      firstHeader(request.headers['x-request-id']) ||
      request.id;

    request.correlationId = correlationId;

    reply.header('x-correlation-id', correlationId);

    request.log = request.log.child({ correlationId });
  });
};

export const correlationMiddleware = fp(correlationPlugin, {
  name: 'correlation-middleware',
});
