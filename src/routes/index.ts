import { FastifyInstance } from 'fastify';
import type { ChatProviderRegistry } from '../providers/chat/index.js';
import type { ChatOrchestrator } from '../services/chat.js';
import type { ProviderId } from '../types/index.js';
import { healthRoutes } from './health.js';
import { providerRoutes } from './providers.js';
import { chatRoutes } from './chat.js';

export type RouteDeps = {
  registry: ChatProviderRegistry;
  orchestrator: ChatOrchestrator;
  defaultProvider: ProviderId;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  await app.register(healthRoutes, deps);
  await app.register(providerRoutes, deps);
  await app.register(chatRoutes, deps);
}
