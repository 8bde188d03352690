import { describe, it, expect } from 'vitest';
import { GroqChatProvider, GROQ_MODELS } from '../src/providers/chat/groq.js';
import { OpenRouterChatProvider } from '../src/providers/chat/openrouter.js';
import { MissingCredentialError, ProviderError } from '../src/utils/errors.js';
import type { ChatTurn } from '../src/types/index.js';
import type { FetchFn } from '../src/providers/chat/index.js';
import {
  completion,
  hangingUpstream,
  sentPayload,
  stubUpstream,
  unreachableUpstream,
} from './helpers/upstream.js';

const turns: ChatTurn[] = [
  { role: 'system', content: 'You teach Arduino.' },
  { role: 'user', content: 'What does pinMode do?' },
];

function groq(fetch: FetchFn, overrides: { defaultModel?: string; timeoutMs?: number } = {}) {
  return new GroqChatProvider({ apiKey: 'test-groq-key', fetch, ...overrides });
}

function openRouter(fetch: FetchFn) {
  return new OpenRouterChatProvider({
    apiKey: 'test-openrouter-key',
    siteUrl: 'http://localhost:8000',
    siteName: 'Arduino Chatbot',
    fetch,
  });
}

describe('Chat providers', () => {
  describe('construction', () => {
    it('should throw MissingCredentialError without an API key', () => {
      expect(() => new GroqChatProvider({})).toThrow(MissingCredentialError);
      expect(() => new GroqChatProvider({})).toThrow('GROQ_API_KEY');
    });

    it('should treat a blank API key as missing', () => {
      expect(
        () => new OpenRouterChatProvider({ apiKey: '   ', siteUrl: 'http://localhost:8000', siteName: 'x' })
      ).toThrow('OPENROUTER_API_KEY');
    });

    it('should have correct names', () => {
      const upstream = stubUpstream(200, completion('ok'));
      expect(groq(upstream).name).toBe('groq');
      expect(openRouter(upstream).name).toBe('openrouter');
    });

    it('should use a configured default that the catalog lists', () => {
      const provider = groq(stubUpstream(200, completion('ok')), { defaultModel: 'gemma2-9b-it' });
      expect(provider.defaultModel).toBe('gemma2-9b-it');
    });

    it('should ignore a configured default missing from the catalog', () => {
      const provider = groq(stubUpstream(200, completion('ok')), { defaultModel: 'llama3-8b-8192' });
      expect(provider.defaultModel).toBe('llama-3.1-8b-instant');
    });
  });

  describe('model resolution', () => {
    it('should use the default model when no model is requested', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      const result = await groq(upstream).chat(turns);

      expect(result.modelUsed).toBe('llama-3.1-8b-instant');
      expect(sentPayload(upstream)).toMatchObject({ model: 'llama-3.1-8b-instant' });
    });

    it('should substitute the default for an unknown model', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      const result = await groq(upstream).chat(turns, 'gpt-4o');

      expect(result.modelUsed).toBe('llama-3.1-8b-instant');
      expect(sentPayload(upstream)).toMatchObject({ model: 'llama-3.1-8b-instant' });
    });

    it('should honour a model from the catalog', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      const result = await groq(upstream).chat(turns, 'llama-3.3-70b-versatile');

      expect(result.modelUsed).toBe('llama-3.3-70b-versatile');
      expect(sentPayload(upstream)).toMatchObject({ model: 'llama-3.3-70b-versatile' });
    });

    it('should substitute the OpenRouter default for an unknown model', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      const result = await openRouter(upstream).chat(turns, 'anthropic/claude-3-opus');
      expect(result.modelUsed).toBe('mistralai/mistral-7b-instruct:free');
    });
  });

  describe('request shaping', () => {
    it('should post an OpenAI-compatible payload to Groq', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      await groq(upstream).chat(turns);

      expect(upstream).toHaveBeenCalledTimes(1);
      const [url, init] = upstream.mock.calls[0];
      expect(url).toBe('https://api.groq.com/openai/v1/chat/completions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        Authorization: 'Bearer test-groq-key',
        'Content-Type': 'application/json',
      });
      expect(sentPayload(upstream)).toEqual({
        model: 'llama-3.1-8b-instant',
        messages: [
          { role: 'system', content: 'You teach Arduino.' },
          { role: 'user', content: 'What does pinMode do?' },
        ],
        temperature: 0.7,
        max_tokens: 1024,
        top_p: 1,
        stream: false,
      });
    });

    it('should send the OpenRouter attribution headers', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      await openRouter(upstream).chat(turns);

      const [url, init] = upstream.mock.calls[0];
      expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
      expect(init.headers).toEqual({
        Authorization: 'Bearer test-openrouter-key',
        'Content-Type': 'application/json',
        'HTTP-Referer': 'http://localhost:8000',
        'X-Title': 'Arduino Chatbot',
      });
    });
  });

  describe('response normalization', () => {
    it('should return the completion text verbatim', async () => {
      const text = '  Use pinMode(13, OUTPUT);\n\n```cpp\ndigitalWrite(13, HIGH);\n```\n';
      const result = await groq(stubUpstream(200, completion(text))).chat(turns);
      expect(result.text).toBe(text);
    });
  });

  describe('failure classification', () => {
    it('should classify 401 as authentication_failed', async () => {
      const provider = groq(stubUpstream(401, { error: { message: 'Invalid API Key' } }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'authentication_failed',
        upstreamStatus: 401,
        message: 'groq: Invalid GROQ_API_KEY. Check the key in your .env file.',
      });
    });

    it('should classify 429 as rate_limited', async () => {
      const provider = groq(stubUpstream(429, { error: { message: 'slow down' } }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'rate_limited',
        message: 'groq: Groq rate limit reached. Wait a moment and try again.',
      });
    });

    it('should classify 503 as service_unavailable', async () => {
      const provider = openRouter(stubUpstream(503, 'overloaded'));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'service_unavailable',
        message: 'openrouter: OpenRouter service unavailable. Try a different model or switch provider.',
      });
    });

    it('should classify 402 as quota_exceeded on OpenRouter', async () => {
      const provider = openRouter(stubUpstream(402, { error: { message: 'Insufficient credits' } }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'quota_exceeded',
        message:
          "openrouter: No credits left on OpenRouter. Switch to a free model (ids ending in ':free') or add credits.",
      });
    });

    it('should classify 402 as upstream_error on Groq', async () => {
      const provider = groq(stubUpstream(402, 'payment required'));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        upstreamStatus: 402,
      });
    });

    it('should classify other statuses as upstream_error with status and body', async () => {
      const provider = groq(stubUpstream(500, 'boom'));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        upstreamStatus: 500,
        upstreamBody: 'boom',
        message: 'groq: Groq API error 500: boom. Try again or switch provider.',
      });
    });

    it('should reject an error embedded in a 200 response', async () => {
      const provider = openRouter(stubUpstream(200, { error: { message: 'no route' } }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        upstreamStatus: 200,
        message: 'openrouter: OpenRouter error: no route. Try again or switch provider.',
      });
    });

    it('should reject an embedded error from Groq as well', async () => {
      const provider = groq(stubUpstream(200, { error: 'model decommissioned' }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        message: 'groq: Groq error: model decommissioned. Try again or switch provider.',
      });
    });

    it('should reject a 200 response without choices', async () => {
      const provider = groq(stubUpstream(200, { choices: [] }));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        message: 'groq: Groq returned no completion text. Try again or switch provider.',
      });
    });

    it('should reject a 200 response that is not JSON', async () => {
      const provider = groq(stubUpstream(200, '<html>gateway</html>'));

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'upstream_error',
        upstreamBody: '<html>gateway</html>',
        message: 'groq: Groq returned a response that is not JSON. Try again or switch provider.',
      });
    });

    it('should classify a slow upstream as timeout', async () => {
      const provider = groq(hangingUpstream(), { timeoutMs: 10 });

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'timeout',
        message: 'groq: Groq API timed out after 0.01s. Try again or switch provider.',
      });
    });

    it('should classify an unreachable upstream as service_unavailable', async () => {
      const provider = groq(unreachableUpstream());

      await expect(provider.chat(turns)).rejects.toMatchObject({
        kind: 'service_unavailable',
        message: 'groq: Could not reach Groq API (fetch failed). Check your connection or switch provider.',
      });
    });

    it('should not retry a failed call', async () => {
      const upstream = stubUpstream(503, 'overloaded');
      await expect(groq(upstream).chat(turns)).rejects.toBeInstanceOf(ProviderError);
      expect(upstream).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancellation', () => {
    it('should not call the upstream when the caller already gave up', async () => {
      const upstream = stubUpstream(200, completion('ok'));
      const controller = new AbortController();
      controller.abort();

      await expect(groq(upstream).chat(turns, undefined, controller.signal)).rejects.toMatchObject({
        name: 'AbortError',
      });
      expect(upstream).not.toHaveBeenCalled();
    });

    it('should abandon an in-flight call without classifying it', async () => {
      const controller = new AbortController();
      const pending = groq(hangingUpstream()).chat(turns, undefined, controller.signal);
      controller.abort();

      const error = await pending.catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(Error);
      expect(error).not.toBeInstanceOf(ProviderError);
    });
  });

  describe('catalogs', () => {
    it('should list every Groq model as free', () => {
      const provider = groq(stubUpstream(200, completion('ok')));
      expect(provider.listModels()).toBe(GROQ_MODELS);
      expect(provider.listFreeModels()).toEqual(GROQ_MODELS);
    });

    it('should list only :free OpenRouter models as free', () => {
      const provider = openRouter(stubUpstream(200, completion('ok')));
      const free = Object.keys(provider.listFreeModels());

      expect(Object.keys(provider.listModels())).toHaveLength(8);
      expect(free).toHaveLength(6);
      expect(free.every((id) => id.endsWith(':free'))).toBe(true);
      expect(free).not.toContain('openai/gpt-3.5-turbo');
    });
  });
});
