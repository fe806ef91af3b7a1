// src/api/scrape.ts
import { z } from 'zod';
import type { ArticleRecord, ErrorCode, ModelChoice } from '../types/index.js';
import { resolveModelChoice } from '../config.js';
import type { ScrapePipeline } from '../processing/pipeline.js';

export class RequestError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'RequestError';
    this.code = code;
  }
}

function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const scrapeInputSchema = z.object({
  url: z.string().refine(isValidUrl, 'Invalid URL format'),
  language: z.string().optional(),
  provider: z.enum(['openai', 'anthropic']).optional(),
  model: z.string().min(1).optional(),
});

const batchInputSchema = z.object({
  urls: z.array(z.string().refine(isValidUrl, 'Invalid URL format')).min(1, 'urls must not be empty'),
  language: z.string().optional(),
  provider: z.enum(['openai', 'anthropic']).optional(),
  model: z.string().min(1).optional(),
});

export type ScrapeInput = z.infer<typeof scrapeInputSchema>;
export type BatchScrapeInput = z.infer<typeof batchInputSchema>;

export interface ScrapeHandlerConfig {
  defaultModel: ModelChoice;
  maxBatchSize: number;
}

export interface ScrapeHandlers {
  scrapeOne(body: unknown): Promise<ArticleRecord>;
  scrapeBatch(body: unknown): Promise<ArticleRecord[]>;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new RequestError(message, 'INVALID_REQUEST');
  }
  return result.data;
}

export function createScrapeHandlers(
  pipeline: ScrapePipeline,
  config: ScrapeHandlerConfig
): ScrapeHandlers {
  async function scrapeOne(body: unknown): Promise<ArticleRecord> {
    const input = parseBody(scrapeInputSchema, body);
    return pipeline.scrape(input.url, {
      language: input.language,
      modelChoice: resolveModelChoice(config.defaultModel, input.provider, input.model),
    });
  }

  // Invocations share no state, so the whole batch runs concurrently
  async function scrapeBatch(body: unknown): Promise<ArticleRecord[]> {
    const input = parseBody(batchInputSchema, body);
    if (input.urls.length > config.maxBatchSize) {
      throw new RequestError(
        `Batch of ${input.urls.length} URLs exceeds the limit of ${config.maxBatchSize}`,
        'BATCH_TOO_LARGE'
      );
    }

    const modelChoice = resolveModelChoice(config.defaultModel, input.provider, input.model);
    return Promise.all(
      input.urls.map((url) => pipeline.scrape(url, { language: input.language, modelChoice }))
    );
  }

  return { scrapeOne, scrapeBatch };
}
