import type { ChatTurn, ModelCatalog, NormalizedChatResult, ProviderId } from '../../types/index.js';

/**
 * Interface for chat/completion providers.
 * All providers must implement this interface to be interchangeable.
 */
export interface IChatProvider {
  /**
   * Send a conversation to the upstream model.
   * @param turns - Full conversation, system prompt first
   * @param modelHint - Requested model; unknown or absent ids fall back to the default
   * @param signal - Aborts the upstream call when the caller goes away
   * @throws ProviderError classified by failure kind
   */
  chat(turns: readonly ChatTurn[], modelHint?: string, signal?: AbortSignal): Promise<NormalizedChatResult>;

  /** Every model this provider accepts */
  listModels(): ModelCatalog;

  /** Models that can be used without paid credits */
  listFreeModels(): ModelCatalog;

  /**
   * Provider name for logging/debugging
   */
  readonly name: ProviderId;

  readonly defaultModel: string;
}
