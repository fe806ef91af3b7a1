// src/config.ts
import { z } from 'zod';
import type { LLMProvider, ModelChoice } from './types/index.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Model used when a provider is chosen per request without naming a model
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
};

const configSchema = z.object({
  // Credentials are optional here: a missing key is reported by the rewrite stage
  openaiApiKey: z.string().min(1).optional(),
  anthropicApiKey: z.string().min(1).optional(),

  llmProvider: z.enum(['openai', 'anthropic']).default('openai'),
  llmModel: z.string().min(1).optional(),
  defaultLanguage: z.string().trim().min(1).default('english'),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  fetchTimeoutMs: z.number().int().positive('FETCH_TIMEOUT_MS must be a positive integer').default(30000),
  extraSkipTags: z.array(z.string()).default([]),

  // Token limits for LLM API calls
  maxContextTokens: z.number().int().positive('MAX_CONTEXT_TOKENS must be a positive integer').default(128000),
  maxOutputTokens: z.number().int().positive('MAX_OUTPUT_TOKENS must be a positive integer').default(8000),

  // HTTP API
  port: z.number().int().default(8080),
  maxBatchSize: z.number().int().positive('MAX_BATCH_SIZE must be a positive integer').default(10),
});

export type Config = Omit<z.infer<typeof configSchema>, 'llmModel'> & { llmModel: string };

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function parseEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    openaiApiKey: emptyToUndefined(env.OPENAI_API_KEY),
    anthropicApiKey: emptyToUndefined(env.ANTHROPIC_API_KEY),
    llmProvider: emptyToUndefined(env.LLM_PROVIDER),
    llmModel: emptyToUndefined(env.LLM_MODEL),
    defaultLanguage: emptyToUndefined(env.DEFAULT_LANGUAGE),
    userAgent: emptyToUndefined(env.USER_AGENT),
    fetchTimeoutMs: optionalInt(env.FETCH_TIMEOUT_MS),
    extraSkipTags: env.EXTRA_SKIP_TAGS?.split(',').map((t) => t.trim()).filter(Boolean),
    maxContextTokens: optionalInt(env.MAX_CONTEXT_TOKENS),
    maxOutputTokens: optionalInt(env.MAX_OUTPUT_TOKENS),
    port: optionalInt(env.PORT),
    maxBatchSize: optionalInt(env.MAX_BATCH_SIZE),
  };

  try {
    const parsed = configSchema.parse(raw);
    return { ...parsed, llmModel: parsed.llmModel ?? DEFAULT_MODELS[parsed.llmProvider] };
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => {
        const path = err.path.join('.');
        return `  - ${path}: ${err.message}`;
      });
      throw new Error(
        `Configuration validation failed:\n${messages.join('\n')}\n\nPlease check your environment variables and .env file.`
      );
    }
    throw error;
  }
}

/**
 * Builds the model for a per-request override. A provider given without a model
 * gets that provider's default model, unless it is the configured provider, whose
 * configured model is kept.
 */
export function resolveModelChoice(
  defaults: ModelChoice,
  provider?: LLMProvider,
  model?: string
): ModelChoice | undefined {
  if (provider === undefined && model === undefined) {
    return undefined;
  }
  const chosen = provider ?? defaults.provider;
  if (model !== undefined) {
    return { provider: chosen, model };
  }
  return { provider: chosen, model: chosen === defaults.provider ? defaults.model : DEFAULT_MODELS[chosen] };
}

export const config = parseEnv();
