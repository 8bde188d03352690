import { FastifyInstance } from 'fastify';
import { HealthSchema } from '../schemas/index.js';
import type { RouteDeps } from './index.js';

export async function healthRoutes(app: FastifyInstance, { registry }: RouteDeps): Promise<void> {
  app.get('/', {
    schema: {
      tags: ['Health'],
      summary: 'Service banner',
      response: {
        200: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            docs: { type: 'string' },
            available_providers: { type: 'array', items: { type: 'string' } },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({
      message: 'Arduino Chatbot API is running!',
      docs: '/docs',
      available_providers: registry.ids,
    });
  });

  app.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Health check',
      description: 'Report which providers have a credential configured. No upstream call is made.',
      response: {
        200: HealthSchema,
      },
    },
  }, async (_request, reply) => {
    return reply.status(200).send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      providers: registry.credentialStatus(),
    });
  });
}
