import { z } from 'zod';

// Provider identifiers
export const PROVIDER_IDS = ['groq', 'openrouter'] as const;
export const ProviderIdSchema = z.enum(PROVIDER_IDS);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

// Conversation turns
export const ChatRoleSchema = z.enum(['system', 'user', 'assistant']);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

export interface ChatTurn {
  readonly role: ChatRole;
  readonly content: string;
}

// Caller-supplied history never carries system turns
export const HistoryTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

// POST /chat body
export const ChatRequestBodySchema = z.object({
  message: z.string().refine((value) => value.trim().length > 0, {
    message: 'Message must not be empty',
  }),
  provider: z.string().min(1).optional(),
  // Blank or null means the provider default
  model: z.string().nullish(),
  conversation_history: z.array(HistoryTurnSchema).optional().default([]),
});
export type ChatRequestBody = z.infer<typeof ChatRequestBodySchema>;

// Orchestrator input
export interface ChatRequest {
  message: string;
  provider: string;
  model?: string;
  history: readonly ChatTurn[];
}

// Adapter output
export interface NormalizedChatResult {
  text: string;
  /** The model actually invoked, after default substitution */
  modelUsed: string;
}

// Model id -> human-readable description
export type ModelCatalog = Readonly<Record<string, string>>;

// POST /chat response
export interface ChatResponse {
  response: string;
  provider: ProviderId;
  model: string;
}

// Wire format of OpenAI-compatible chat-completion upstreams
export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: ChatRole; content: string }>;
  temperature: number;
  max_tokens: number;
  top_p: number;
  stream: false;
}

export const ChatCompletionErrorSchema = z.object({
  error: z.union([
    z.string(),
    z.object({ message: z.string().optional() }).passthrough(),
  ]),
});

export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});
export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;
