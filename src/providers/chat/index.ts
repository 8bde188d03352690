import { getConfig, type Config } from '../../config.js';
import { createChildLogger } from '../../utils/logger.js';
import { MissingCredentialError, ProviderNotFoundError } from '../../utils/errors.js';
import { PROVIDER_IDS, type ModelCatalog, type ProviderId } from '../../types/index.js';
import type { IChatProvider } from './IChatProvider.js';
import { GroqChatProvider, GROQ_PROFILE } from './groq.js';
import { OpenRouterChatProvider, OPENROUTER_PROFILE } from './openrouter.js';
import { defaultModelFor, freeModelsOf, type FetchFn, type UpstreamProfile } from './openai-compatible.js';

const logger = createChildLogger('chat-provider');

export type ProviderSlot =
  | { status: 'ready'; profile: UpstreamProfile; provider: IChatProvider }
  | { status: 'missing_credential'; profile: UpstreamProfile; defaultModel: string; error: MissingCredentialError };

export interface ProviderSummary {
  name: ProviderId;
  description: string;
  default_model: string;
  requires_api_key: boolean;
  configured: boolean;
}

export interface ModelListing {
  provider: ProviderId;
  default_model: string;
  models: Array<{ id: string; description: string; free: boolean }>;
}

/**
 * Fixed set of providers, built once at startup. A provider whose
 * credential is missing stays listed but cannot serve chats.
 */
export class ChatProviderRegistry {
  private readonly slots: ReadonlyMap<ProviderId, ProviderSlot>;

  constructor(slots: Iterable<ProviderSlot>) {
    this.slots = new Map(Array.from(slots, (slot) => [slot.profile.name, slot] as const));
  }

  get ids(): ProviderId[] {
    return [...this.slots.keys()];
  }

  /**
   * Canonical id for a caller-supplied one, matched case-insensitively.
   * @throws ProviderNotFoundError listing the registered ids
   */
  lookup(requested: string): ProviderId {
    const normalized = requested.trim().toLowerCase();
    const id = this.ids.find((candidate) => candidate === normalized);
    if (!id) {
      throw new ProviderNotFoundError(requested, this.ids);
    }
    return id;
  }

  /**
   * @throws ProviderNotFoundError for unregistered ids
   * @throws MissingCredentialError when the provider has no credential
   */
  resolve(requested: string): { id: ProviderId; provider: IChatProvider } {
    const id = this.lookup(requested);
    const slot = this.slot(id);
    if (slot.status === 'missing_credential') {
      throw slot.error;
    }
    return { id, provider: slot.provider };
  }

  credentialStatus(): Record<ProviderId, boolean> {
    const status: Record<ProviderId, boolean> = { groq: false, openrouter: false };
    for (const [id, slot] of this.slots) {
      status[id] = slot.status === 'ready';
    }
    return status;
  }

  describe(): ProviderSummary[] {
    return [...this.slots.values()].map((slot) => ({
      name: slot.profile.name,
      description: slot.profile.description,
      default_model: defaultModelOf(slot),
      requires_api_key: true,
      configured: slot.status === 'ready',
    }));
  }

  models(requested: string, options: { freeOnly?: boolean } = {}): ModelListing {
    const slot = this.slot(this.lookup(requested));
    const free = freeModelsOf(slot.profile);
    const catalog: ModelCatalog = options.freeOnly ? free : slot.profile.catalog;

    return {
      provider: slot.profile.name,
      default_model: defaultModelOf(slot),
      models: Object.entries(catalog).map(([id, description]) => ({
        id,
        description,
        free: Object.hasOwn(free, id),
      })),
    };
  }

  private slot(id: ProviderId): ProviderSlot {
    const slot = this.slots.get(id);
    if (!slot) {
      throw new ProviderNotFoundError(id, this.ids);
    }
    return slot;
  }
}

function defaultModelOf(slot: ProviderSlot): string {
  return slot.status === 'ready' ? slot.provider.defaultModel : slot.defaultModel;
}

function buildSlot(
  profile: UpstreamProfile,
  configuredModel: string,
  create: () => IChatProvider
): ProviderSlot {
  try {
    return { status: 'ready', profile, provider: create() };
  } catch (error) {
    if (!(error instanceof MissingCredentialError)) {
      throw error;
    }
    logger.warn({ provider: profile.name, envVar: error.envVar }, 'Provider disabled: credential missing');
    return {
      status: 'missing_credential',
      profile,
      defaultModel: defaultModelFor(profile, configuredModel),
      error,
    };
  }
}

export function createChatProviderRegistry(
  config: Pick<
    Config,
    'groqApiKey' | 'groqModel' | 'openrouterApiKey' | 'openrouterModel' | 'siteUrl' | 'siteName'
  >,
  options: { fetch?: FetchFn } = {}
): ChatProviderRegistry {
  const slots: Record<ProviderId, ProviderSlot> = {
    groq: buildSlot(GROQ_PROFILE, config.groqModel, () =>
      new GroqChatProvider({
        apiKey: config.groqApiKey,
        defaultModel: config.groqModel,
        fetch: options.fetch,
      })
    ),
    openrouter: buildSlot(OPENROUTER_PROFILE, config.openrouterModel, () =>
      new OpenRouterChatProvider({
        apiKey: config.openrouterApiKey,
        defaultModel: config.openrouterModel,
        siteUrl: config.siteUrl,
        siteName: config.siteName,
        fetch: options.fetch,
      })
    ),
  };

  const registry = new ChatProviderRegistry(PROVIDER_IDS.map((id) => slots[id]));
  const ready = registry.ids.filter((id) => slots[id].status === 'ready');

  if (ready.length === 0) {
    logger.warn(
      { envVars: [GROQ_PROFILE.envVar, OPENROUTER_PROFILE.envVar] },
      'No AI providers configured! Add at least one API key to your .env file'
    );
  } else {
    logger.info({ ready }, 'Chat providers ready');
  }

  return registry;
}

let instance: ChatProviderRegistry | null = null;

export function getChatProviderRegistry(): ChatProviderRegistry {
  if (!instance) {
    instance = createChatProviderRegistry(getConfig());
  }
  return instance;
}

export type { IChatProvider } from './IChatProvider.js';
export type { FetchFn } from './openai-compatible.js';
