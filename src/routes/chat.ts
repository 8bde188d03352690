import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ChatRequestBodySchema, type ChatResponse } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { ChatRequestBody, ChatResponseSchema, ErrorResponse } from '../schemas/index.js';
import type { RouteDeps } from './index.js';

const logger = createChildLogger('routes:chat');

export async function chatRoutes(
  app: FastifyInstance,
  { registry, orchestrator, defaultProvider }: RouteDeps
): Promise<void> {
  app.post('/chat', {
    schema: {
      tags: ['Chat'],
      summary: 'Ask the Arduino tutor',
      description: 'Send a student question to the selected provider. The Arduino system prompt is added and only the last 10 history turns are forwarded.',
      body: ChatRequestBody,
      response: {
        200: ChatResponseSchema,
        400: ErrorResponse,
        402: ErrorResponse,
        429: ErrorResponse,
        500: ErrorResponse,
        502: ErrorResponse,
        503: ErrorResponse,
        504: ErrorResponse,
      },
    },
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = ChatRequestBodySchema.safeParse(request.body);
    if (!body.success) {
      throw new ValidationError('Invalid request', { issues: body.error.issues });
    }

    const { message, conversation_history } = body.data;
    const model = body.data.model || undefined;
    const provider = body.data.provider ?? defaultProvider;

    // Abandon the upstream call if the client disconnects first
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        logger.info({ provider }, 'Client disconnected before reply');
        controller.abort();
      }
    });

    const result = await orchestrator.handle(
      { message, provider, model, history: conversation_history },
      controller.signal
    );

    const response: ChatResponse = {
      response: result.text,
      provider: registry.lookup(provider),
      model: result.modelUsed,
    };
    return reply.send(response);
  });
}
