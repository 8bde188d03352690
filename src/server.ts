import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { getConfig } from './config.js';
import { logger, createChildLogger } from './utils/logger.js';
import { registerRoutes } from './routes/index.js';
import { isAppError } from './utils/errors.js';
import { getChatProviderRegistry, type ChatProviderRegistry } from './providers/chat/index.js';
import { ChatOrchestrator } from './services/chat.js';
import type { ProviderId } from './types/index.js';

const serverLogger = createChildLogger('server');

export interface BuildAppOptions {
  registry?: ChatProviderRegistry;
  orchestrator?: ChatOrchestrator;
  defaultProvider?: ProviderId;
}

async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();
  const registry = options.registry ?? getChatProviderRegistry();
  const orchestrator = options.orchestrator ?? new ChatOrchestrator(registry);

  const app = Fastify({
    logger: false, // We use our own logger
  });

  // Register plugins
  await app.register(cors, {
    origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map((origin) => origin.trim()),
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Arduino Chatbot API',
        description: 'AI chatbot for teaching Arduino to students',
        version: '1.0.0',
      },
      servers: [],
      tags: [
        { name: 'Health', description: 'Service status and provider readiness' },
        { name: 'Providers', description: 'Provider and model catalogs' },
        { name: 'Chat', description: 'Ask the Arduino tutor' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    serverLogger.info({ method: request.method, url: request.url }, 'Request');
  });

  // Response logging
  app.addHook('onResponse', async (request, reply) => {
    serverLogger.info(
      { method: request.method, url: request.url, status: reply.statusCode },
      'Response'
    );
  });

  // Error handler
  app.setErrorHandler(async (error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    // Handle validation errors
    if (error.validation) {
      serverLogger.warn({ url: request.url, error: error.message }, 'Request validation failed');
      return reply.status(400).send({
        error: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: { issues: error.validation },
      });
    }

    // Handle custom app errors
    if (isAppError(error)) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      serverLogger[level]({ url: request.url, code: error.code, error: error.message }, 'Request error');
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
    }

    serverLogger.error({ error, url: request.url }, 'Request error');

    // Handle Fastify errors with statusCode
    if (error.statusCode) {
      return reply.status(error.statusCode).send({
        error: error.message,
      });
    }

    // Unknown errors
    return reply.status(500).send({
      error: 'Internal server error',
    });
  });

  // Register routes
  await registerRoutes(app, {
    registry,
    orchestrator,
    defaultProvider: options.defaultProvider ?? config.defaultProvider,
  });

  return app;
}

async function start(): Promise<void> {
  const config = getConfig();

  try {
    const app = await buildApp();

    await app.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(
      { port: config.port, host: config.host, defaultProvider: config.defaultProvider },
      'Server started'
    );

    // Graceful shutdown
    const signals = ['SIGINT', 'SIGTERM'] as const;
    for (const signal of signals) {
      process.once(signal, () => {
        logger.info({ signal }, 'Shutting down');
        app.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ error }, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    }
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }
}

// Export for testing
export { buildApp };

// Start server if not imported
if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  void start();
}
