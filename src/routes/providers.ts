import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ErrorResponse, ModelListingSchema, ProviderSummarySchema } from '../schemas/index.js';
import type { RouteDeps } from './index.js';

export async function providerRoutes(app: FastifyInstance, { registry }: RouteDeps): Promise<void> {
  app.get('/providers', {
    schema: {
      tags: ['Providers'],
      summary: 'List providers',
      description: 'All providers with their default model and whether a credential is configured',
      response: {
        200: {
          type: 'object',
          properties: {
            providers: { type: 'array', items: ProviderSummarySchema },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({ providers: registry.describe() });
  });

  app.get('/providers/:id/models', {
    schema: {
      tags: ['Providers'],
      summary: 'List provider models',
      description: 'Model catalog of one provider, optionally restricted to free models',
      params: {
        type: 'object',
        properties: {
          id: { type: 'string', description: 'Provider ID' },
        },
        required: ['id'],
      },
      querystring: {
        type: 'object',
        properties: {
          free: { type: 'boolean', description: 'Only models usable without credits' },
        },
      },
      response: {
        200: ModelListingSchema,
        400: ErrorResponse,
      },
    },
  }, async (
    request: FastifyRequest<{ Params: { id: string }; Querystring: { free?: boolean } }>,
    reply: FastifyReply
  ) => {
    const listing = registry.models(request.params.id, { freeOnly: request.query.free === true });
    return reply.send(listing);
  });
}
