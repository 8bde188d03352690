import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

// Blank env values (e.g. `GROQ_API_KEY=` in .env) count as unset
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const configSchema = z.object({
  // Server
  port: z.coerce.number().default(8000),
  host: z.string().default('0.0.0.0'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  corsOrigin: z.string().default('*'),

  // Provider Selection
  defaultProvider: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['groq', 'openrouter']).default('groq')
  ),

  // Groq
  groqApiKey: optionalSecret,
  groqModel: z.string().default('llama-3.1-8b-instant'),

  // OpenRouter
  openrouterApiKey: optionalSecret,
  openrouterModel: z.string().default('mistralai/mistral-7b-instruct:free'),
  siteUrl: z.string().url().default('http://localhost:8000'),
  siteName: z.string().default('Arduino Chatbot'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  const raw = {
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    corsOrigin: env.CORS_ORIGIN,
    defaultProvider: env.DEFAULT_PROVIDER,
    groqApiKey: env.GROQ_API_KEY,
    groqModel: env.GROQ_MODEL,
    openrouterApiKey: env.OPENROUTER_API_KEY,
    openrouterModel: env.OPENROUTER_MODEL,
    siteUrl: env.SITE_URL,
    siteName: env.SITE_NAME,
    logLevel: env.LOG_LEVEL,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Configuration validation failed: ${JSON.stringify(result.error.format())}`);
  }
  return result.data;
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    // In test environment, throw instead of exit
    if (process.env.NODE_ENV === 'test' || process.env.VITEST) {
      throw error;
    }
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Lazy load config to allow env vars to be set before validation
let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
