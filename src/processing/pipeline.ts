// src/processing/pipeline.ts
import type { ArticleRecord, ScrapeOptions } from '../types/index.js';
import { ExtractionError, getErrorMessage } from '../errors.js';
import type { ExtractionResult } from './extractor.js';
import type { Rewriter } from './rewriter.js';
import type { SkipSet } from './tag-filter.js';

export interface PipelineConfig {
  skipSet: SkipSet;
  defaultLanguage: string;
}

export interface ScrapePipeline {
  scrape(url: string, options?: ScrapeOptions): Promise<ArticleRecord>;
}

// Type definitions for processing modules
interface FetchHtmlFn {
  (url: string, signal?: AbortSignal): Promise<string>;
}

interface ExtractArticleFn {
  (html: string, skipSet: SkipSet, url?: string): ExtractionResult;
}

export function failedArticle(error: string): ArticleRecord {
  return {
    title: '',
    content: '',
    featuredImageUrl: '',
    publicationDate: null,
    author: null,
    error,
  };
}

/**
 * Fetch, locate/clean, metadata, rewrite. Each stage runs only after the previous
 * one succeeded; `scrape` resolves with a record on every path and never rejects.
 */
export function createScrapePipeline(
  fetchHtml: FetchHtmlFn,
  extractArticle: ExtractArticleFn,
  rewriter: Rewriter,
  config: PipelineConfig
): ScrapePipeline {
  async function scrape(url: string, options: ScrapeOptions = {}): Promise<ArticleRecord> {
    const language = options.language ?? config.defaultLanguage;

    try {
      // Step 1: Fetch HTML
      console.log(`[Scrape] ${url}: fetching`);
      const html = await fetchHtml(url, options.signal);

      // Step 2: Locate and clean content, read metadata
      const { content, metadata } = extractArticle(html, config.skipSet, url);
      if (!content.trim()) {
        throw new ExtractionError();
      }
      console.log(`[Scrape] ${url}: extracted ${content.length} chars of cleaned HTML`);

      const scraped: ArticleRecord = {
        title: metadata.title,
        content,
        featuredImageUrl: metadata.featuredImageUrl,
        publicationDate: metadata.publicationDate,
        author: metadata.author,
        error: '',
      };

      // Step 3: Rewrite to Markdown
      const outcome = await rewriter.rewrite(scraped, language, options.modelChoice, options.signal);
      if (!outcome.success) {
        console.error(`[Scrape] ${url}: rewrite failed: ${outcome.error}`);
        // Scraped metadata and HTML are kept for diagnostics; the error marks the record failed
        return { ...scraped, error: outcome.error };
      }

      console.log(`[Scrape] ${url}: done`);
      return outcome.article;
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[Scrape] ${url}: ${message}`);
      return failedArticle(message);
    }
  }

  return { scrape };
}
