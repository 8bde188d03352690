// Shared OpenAPI schemas for Fastify routes

// Common response schemas
export const ErrorResponse = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    code: { type: 'string' },
    details: { type: 'object', additionalProperties: true },
  },
  required: ['error'],
} as const;

// Chat schemas
export const ChatTurnSchema = {
  type: 'object',
  required: ['role', 'content'],
  properties: {
    role: { type: 'string', enum: ['user', 'assistant'] },
    content: { type: 'string' },
  },
} as const;

export const ChatRequestBody = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string', minLength: 1, description: 'Student question' },
    provider: { type: 'string', description: 'Provider id (groq | openrouter); defaults to DEFAULT_PROVIDER' },
    model: {
      type: ['string', 'null'],
      description: 'Model id; blank, null or unknown ids fall back to the provider default',
    },
    conversation_history: {
      type: 'array',
      items: ChatTurnSchema,
      description: 'Earlier turns, oldest first; only the last 10 are forwarded',
    },
  },
} as const;

export const ChatResponseSchema = {
  type: 'object',
  properties: {
    response: { type: 'string' },
    provider: { type: 'string' },
    model: { type: 'string' },
  },
} as const;

// Provider schemas
export const ProviderSummarySchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    description: { type: 'string' },
    default_model: { type: 'string' },
    requires_api_key: { type: 'boolean' },
    configured: { type: 'boolean' },
  },
} as const;

export const ModelListingSchema = {
  type: 'object',
  properties: {
    provider: { type: 'string' },
    default_model: { type: 'string' },
    models: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          description: { type: 'string' },
          free: { type: 'boolean' },
        },
      },
    },
  },
} as const;

export const HealthSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
    timestamp: { type: 'string', format: 'date-time' },
    providers: {
      type: 'object',
      additionalProperties: { type: 'boolean' },
    },
  },
} as const;
