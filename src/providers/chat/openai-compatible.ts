import type { Logger } from 'pino';
import type { IChatProvider } from './IChatProvider.js';
import {
  ChatCompletionErrorSchema,
  ChatCompletionResponseSchema,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatTurn,
  type ModelCatalog,
  type NormalizedChatResult,
  type ProviderId,
} from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { MissingCredentialError, ProviderError } from '../../utils/errors.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

// Fixed for every upstream
export const SAMPLING_PARAMETERS = {
  temperature: 0.7,
  max_tokens: 1024,
  top_p: 1,
} as const;

const RETRY_REMEDY = 'Try again or switch provider.';

/**
 * Static description of one OpenAI-compatible upstream.
 */
export interface UpstreamProfile {
  name: ProviderId;
  label: string;
  description: string;
  /** Base URL without the `/chat/completions` suffix */
  baseUrl: string;
  envVar: string;
  keyUrl: string;
  timeoutMs: number;
  catalog: ModelCatalog;
  defaultModel: string;
  /** Pay-per-use upstreams report exhausted credits with HTTP 402 */
  metered: boolean;
  /** Whether a catalog entry can be used without paid credits */
  isFreeModel: (modelId: string) => boolean;
  timeoutHint?: string;
}

export function freeModelsOf(profile: UpstreamProfile): ModelCatalog {
  return Object.fromEntries(
    Object.entries(profile.catalog).filter(([id]) => profile.isFreeModel(id))
  );
}

/**
 * Default model for a profile given the configured one. A configured
 * default the catalog does not list is ignored.
 */
export function defaultModelFor(profile: UpstreamProfile, configured?: string): string {
  if (configured && Object.hasOwn(profile.catalog, configured)) {
    return configured;
  }
  return profile.defaultModel;
}

export interface ChatProviderOptions {
  apiKey?: string;
  /** Configured default; ignored when the catalog does not list it */
  defaultModel?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

interface UpstreamReply {
  status: number;
  ok: boolean;
  body: string;
}

export abstract class OpenAICompatibleChatProvider implements IChatProvider {
  readonly name: ProviderId;
  readonly defaultModel: string;
  protected readonly profile: UpstreamProfile;
  protected readonly logger: Logger;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  protected constructor(profile: UpstreamProfile, options: ChatProviderOptions) {
    this.name = profile.name;
    this.profile = profile;
    this.logger = createChildLogger(`${profile.name}-chat`);

    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new MissingCredentialError(profile.name, profile.envVar, profile.keyUrl);
    }
    this.apiKey = apiKey;
    this.defaultModel = defaultModelFor(profile, options.defaultModel);
    if (options.defaultModel && options.defaultModel !== this.defaultModel) {
      this.logger.warn(
        { configured: options.defaultModel, fallback: this.defaultModel },
        'Configured default model is not in the catalog, using built-in default'
      );
    }
    this.timeoutMs = options.timeoutMs ?? profile.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));

    this.logger.info({ model: this.defaultModel, timeoutMs: this.timeoutMs }, `${profile.label} chat provider initialized`);
  }

  async chat(turns: readonly ChatTurn[], modelHint?: string, signal?: AbortSignal): Promise<NormalizedChatResult> {
    const model = this.resolveModel(modelHint);
    const payload: ChatCompletionRequest = {
      model,
      messages: turns.map((turn) => ({ role: turn.role, content: turn.content })),
      ...SAMPLING_PARAMETERS,
      stream: false,
    };

    this.logger.debug({ model, turns: turns.length }, 'Sending chat completion');

    const reply = await this.post(payload, signal);
    if (!reply.ok) {
      throw this.classifyStatus(reply.status, reply.body);
    }

    const completion = this.parseCompletion(reply.status, reply.body);
    const text = completion.choices[0].message.content;

    this.logger.debug({ model, responseLength: text.length }, 'Generated response');
    return { text, modelUsed: model };
  }

  listModels(): ModelCatalog {
    return this.profile.catalog;
  }

  listFreeModels(): ModelCatalog {
    return freeModelsOf(this.profile);
  }

  /** Headers beyond authorization and content type */
  protected extraHeaders(): Record<string, string> {
    return {};
  }

  private resolveModel(modelHint?: string): string {
    if (!modelHint) {
      this.logger.debug({ model: this.defaultModel }, 'No model requested, using default');
      return this.defaultModel;
    }
    if (!Object.hasOwn(this.profile.catalog, modelHint)) {
      this.logger.warn(
        { requested: modelHint, substituted: this.defaultModel },
        'Unknown model requested, substituting default'
      );
      return this.defaultModel;
    }
    return modelHint;
  }

  private async post(payload: ChatCompletionRequest, signal?: AbortSignal): Promise<UpstreamReply> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const abandon = () => controller.abort();
    signal?.addEventListener('abort', abandon, { once: true });

    try {
      const response = await this.fetchImpl(`${this.profile.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          ...this.extraHeaders(),
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      // Body read stays inside the timeout budget
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      if (timedOut) {
        this.logger.error({ timeoutMs: this.timeoutMs }, 'Upstream call timed out');
        const seconds = this.timeoutMs / 1000;
        const hint = this.profile.timeoutHint ? ` ${this.profile.timeoutHint}` : '';
        throw new ProviderError(
          this.name,
          'timeout',
          `${this.profile.label} API timed out after ${seconds}s. ${RETRY_REMEDY}${hint}`,
          { cause: error }
        );
      }
      if (signal?.aborted) {
        this.logger.info('Caller went away, upstream call abandoned');
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: reason }, 'Upstream unreachable');
      throw new ProviderError(
        this.name,
        'service_unavailable',
        `Could not reach ${this.profile.label} API (${reason}). Check your connection or switch provider.`,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', abandon);
    }
  }

  private classifyStatus(status: number, body: string): ProviderError {
    const { label } = this.profile;
    this.logger.error({ status, error: body }, `${label} API error`);

    switch (status) {
      case 401:
        return new ProviderError(
          this.name,
          'authentication_failed',
          `Invalid ${this.profile.envVar}. Check the key in your .env file.`,
          { status, body }
        );
      case 402:
        if (this.profile.metered) {
          return new ProviderError(
            this.name,
            'quota_exceeded',
            `No credits left on ${label}. Switch to a free model (ids ending in ':free') or add credits.`,
            { status, body }
          );
        }
        break;
      case 429:
        return new ProviderError(
          this.name,
          'rate_limited',
          `${label} rate limit reached. Wait a moment and try again.`,
          { status, body }
        );
      case 503:
        return new ProviderError(
          this.name,
          'service_unavailable',
          `${label} service unavailable. Try a different model or switch provider.`,
          { status, body }
        );
    }

    return new ProviderError(this.name, 'upstream_error', `${label} API error ${status}: ${body}. ${RETRY_REMEDY}`, {
      status,
      body,
    });
  }

  private parseCompletion(status: number, body: string): ChatCompletionResponse {
    const { label } = this.profile;

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      this.logger.error({ status, body }, 'Upstream returned a non-JSON body');
      throw new ProviderError(this.name, 'upstream_error', `${label} returned a response that is not JSON. ${RETRY_REMEDY}`, {
        status,
        body,
        cause: error,
      });
    }

    // Some upstreams report failures inside a 200 response
    const embedded = ChatCompletionErrorSchema.safeParse(parsed);
    if (embedded.success) {
      const { error } = embedded.data;
      const message = typeof error === 'string' ? error : error.message ?? 'Unknown error';
      this.logger.error({ status, error: message }, `${label} returned an embedded error`);
      throw new ProviderError(this.name, 'upstream_error', `${label} error: ${message}. ${RETRY_REMEDY}`, { status, body });
    }

    const completion = ChatCompletionResponseSchema.safeParse(parsed);
    if (!completion.success) {
      this.logger.error({ status, body }, 'Upstream returned no completion');
      throw new ProviderError(this.name, 'upstream_error', `${label} returned no completion text. ${RETRY_REMEDY}`, { status, body });
    }

    return completion.data;
  }
}
