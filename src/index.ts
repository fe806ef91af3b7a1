// src/index.ts
import { config as defaultConfig, type Config } from './config.js';
import { createAnthropicService } from './services/anthropic.js';
import { createOpenAIService } from './services/openai.js';
import { createFetcher } from './processing/fetcher.js';
import { extractArticle } from './processing/extractor.js';
import { createRewriter, type GeneratorRegistry } from './processing/rewriter.js';
import { createScrapePipeline, type ScrapePipeline } from './processing/pipeline.js';
import { createSkipSet } from './processing/tag-filter.js';
import type { ArticleRecord, ScrapeOptions } from './types/index.js';

export type * from './types/index.js';
export { DEFAULT_SKIP_TAGS, createSkipSet, type SkipSet } from './processing/tag-filter.js';
export { cleanElement } from './processing/cleaner.js';
export { locateContent } from './processing/locator.js';
export { extractMetadata } from './processing/metadata.js';
export { extractArticle, type ExtractionResult } from './processing/extractor.js';
export { createFetcher, type Fetcher, type FetcherOptions } from './processing/fetcher.js';
export { createRewriter, type Rewriter, type RewriterConfig } from './processing/rewriter.js';
export { createScrapePipeline, failedArticle, type ScrapePipeline } from './processing/pipeline.js';
export type { TextGenerator, GenerateRequest, GenerateResult } from './services/llm-common.js';
export { FetchError, ReadError, ExtractionError, RewriteError, ScrapeError } from './errors.js';
export { formatArticleText, formatArticleJson, toArticleJson, type ArticleJson } from './output.js';
export { DEFAULT_MODELS, resolveModelChoice, type Config } from './config.js';

export function createGenerators(config: Config): GeneratorRegistry {
  const generators: GeneratorRegistry = {};
  if (config.openaiApiKey) {
    generators.openai = createOpenAIService(config.openaiApiKey);
  }
  if (config.anthropicApiKey) {
    generators.anthropic = createAnthropicService(config.anthropicApiKey);
  }
  return generators;
}

export function createScraper(config: Config = defaultConfig): ScrapePipeline {
  const fetcher = createFetcher({
    userAgent: config.userAgent,
    timeoutMs: config.fetchTimeoutMs,
  });

  const rewriter = createRewriter(createGenerators(config), {
    defaultLanguage: config.defaultLanguage,
    defaultModel: { provider: config.llmProvider, model: config.llmModel },
    maxContextTokens: config.maxContextTokens,
    maxOutputTokens: config.maxOutputTokens,
  });

  return createScrapePipeline(fetcher.fetchHtml, extractArticle, rewriter, {
    skipSet: createSkipSet(config.extraSkipTags),
    defaultLanguage: config.defaultLanguage,
  });
}

/**
 * Scrapes one URL with the environment configuration. Resolves with a record whose
 * `error` is '' on success; it never rejects.
 */
export function scrapeArticle(url: string, options?: ScrapeOptions): Promise<ArticleRecord> {
  return createScraper().scrape(url, options);
}
