import type { ModelCatalog } from '../../types/index.js';
import {
  OpenAICompatibleChatProvider,
  type ChatProviderOptions,
  type UpstreamProfile,
} from './openai-compatible.js';

// Every Groq model is free of charge
export const GROQ_MODELS: ModelCatalog = Object.freeze({
  'llama-3.1-8b-instant': 'Llama 3.1 8B - Fast & Free',
  'llama-3.3-70b-versatile': 'Llama 3.3 70B - Smarter',
  'gemma2-9b-it': 'Gemma 2 9B - Google model',
  'mixtral-8x7b-32768': 'Mixtral 8x7B - Long context',
});

export const GROQ_DEFAULT_MODEL = 'llama-3.1-8b-instant';

export const GROQ_PROFILE: UpstreamProfile = {
  name: 'groq',
  label: 'Groq',
  description: 'Fast & free - Best for students',
  baseUrl: 'https://api.groq.com/openai/v1',
  envVar: 'GROQ_API_KEY',
  keyUrl: 'https://console.groq.com/keys',
  timeoutMs: 30_000,
  catalog: GROQ_MODELS,
  defaultModel: GROQ_DEFAULT_MODEL,
  metered: false,
  isFreeModel: () => true,
};

export class GroqChatProvider extends OpenAICompatibleChatProvider {
  constructor(options: ChatProviderOptions) {
    super(GROQ_PROFILE, options);
  }
}
