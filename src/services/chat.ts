import type { ChatProviderRegistry } from '../providers/chat/index.js';
import type { ChatRequest, ChatTurn, NormalizedChatResult } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import { UpstreamFailureError } from '../utils/errors.js';
import { ARDUINO_SYSTEM_PROMPT, MAX_HISTORY } from './prompts.js';

const logger = createChildLogger('chat');

export interface ChatOrchestratorOptions {
  systemPrompt?: string;
  maxHistory?: number;
}

/**
 * System prompt first, then the trailing history window, then the new
 * user message.
 */
export function buildTurns(
  systemPrompt: string,
  history: readonly ChatTurn[],
  message: string,
  maxHistory: number = MAX_HISTORY
): ChatTurn[] {
  const window = maxHistory > 0 ? history.slice(-maxHistory) : [];
  return [
    { role: 'system', content: systemPrompt },
    ...window,
    { role: 'user', content: message },
  ];
}

export class ChatOrchestrator {
  private readonly systemPrompt: string;
  private readonly maxHistory: number;

  constructor(
    private readonly registry: ChatProviderRegistry,
    options: ChatOrchestratorOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? ARDUINO_SYSTEM_PROMPT;
    this.maxHistory = options.maxHistory ?? MAX_HISTORY;
  }

  /**
   * @throws ProviderNotFoundError before any provider is called
   * @throws MissingCredentialError when the provider is not configured
   * @throws UpstreamFailureError wrapping whatever the provider raised
   */
  async handle(request: ChatRequest, signal?: AbortSignal): Promise<NormalizedChatResult> {
    const { id, provider } = this.registry.resolve(request.provider);
    const turns = buildTurns(this.systemPrompt, request.history, request.message, this.maxHistory);

    logger.info(
      {
        provider: id,
        model: request.model,
        historyTurns: request.history.length,
        forwardedTurns: turns.length,
      },
      'Processing chat'
    );

    try {
      const result = await provider.chat(turns, request.model, signal);
      logger.info({ provider: id, model: result.modelUsed, responseLength: result.text.length }, 'Chat completed');
      return result;
    } catch (error) {
      const failure = new UpstreamFailureError(id, error);
      logger.error({ provider: id, kind: failure.kind, error: failure.message }, 'Chat failed');
      throw failure;
    }
  }
}

