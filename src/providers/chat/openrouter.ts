import type { ModelCatalog } from '../../types/index.js';
import {
  OpenAICompatibleChatProvider,
  type ChatProviderOptions,
  type UpstreamProfile,
} from './openai-compatible.js';

const FREE_SUFFIX = ':free';

export const OPENROUTER_MODELS: ModelCatalog = Object.freeze({
  // Free models (no credits needed)
  'mistralai/mistral-7b-instruct:free': 'Mistral 7B - Fast & reliable (FREE)',
  'meta-llama/llama-3-8b-instruct:free': 'Llama 3 8B - Great for students (FREE)',
  'meta-llama/llama-3.1-8b-instruct:free': 'Llama 3.1 8B - Improved version (FREE)',
  'google/gemma-2-9b-it:free': 'Gemma 2 9B - Google model (FREE)',
  'microsoft/phi-3-mini-128k-instruct:free': 'Phi-3 Mini - Small but smart (FREE)',
  'qwen/qwen-2-7b-instruct:free': 'Qwen 2 7B - Multilingual (FREE)',
  // Paid models (use account credits)
  'mistralai/mixtral-8x7b-instruct': 'Mixtral 8x7B - Long context (Credits)',
  'openai/gpt-3.5-turbo': 'GPT-3.5 Turbo - OpenAI (Credits)',
});

export const OPENROUTER_DEFAULT_MODEL = 'mistralai/mistral-7b-instruct:free';

/**
 * OpenRouter gateway: many models behind one key, some of them free.
 * Free models can be slow, so calls get a longer timeout than Groq.
 */
export const OPENROUTER_PROFILE: UpstreamProfile = {
  name: 'openrouter',
  label: 'OpenRouter',
  description: 'Multiple free models available',
  baseUrl: 'https://openrouter.ai/api/v1',
  envVar: 'OPENROUTER_API_KEY',
  keyUrl: 'https://openrouter.ai/keys',
  timeoutMs: 60_000,
  catalog: OPENROUTER_MODELS,
  defaultModel: OPENROUTER_DEFAULT_MODEL,
  metered: true,
  isFreeModel: (modelId) => modelId.endsWith(FREE_SUFFIX),
  timeoutHint: 'Free models can be slow sometimes.',
};

export interface OpenRouterChatProviderOptions extends ChatProviderOptions {
  /** Shown on the OpenRouter dashboard */
  siteUrl: string;
  siteName: string;
}

export class OpenRouterChatProvider extends OpenAICompatibleChatProvider {
  private readonly siteUrl: string;
  private readonly siteName: string;

  constructor(options: OpenRouterChatProviderOptions) {
    super(OPENROUTER_PROFILE, options);
    this.siteUrl = options.siteUrl;
    this.siteName = options.siteName;
  }

  protected override extraHeaders(): Record<string, string> {
    return {
      'HTTP-Referer': this.siteUrl,
      'X-Title': this.siteName,
    };
  }
}
