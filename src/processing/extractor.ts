// src/processing/extractor.ts
import { JSDOM } from 'jsdom';
import type { ArticleMetadata } from '../types/index.js';
import { locateContent } from './locator.js';
import { extractMetadata } from './metadata.js';
import type { SkipSet } from './tag-filter.js';

export interface ExtractionResult {
  content: string;
  metadata: ArticleMetadata;
}

/**
 * Parses the page and runs content location and metadata extraction on the same
 * document. Content may be '' here; deciding what that means is the caller's job.
 */
export function extractArticle(html: string, skipSet: SkipSet, url?: string): ExtractionResult {
  const dom = new JSDOM(html, url ? { url } : undefined);
  try {
    const document = dom.window.document;
    return {
      content: locateContent(document, skipSet),
      metadata: extractMetadata(document),
    };
  } finally {
    dom.window.close();
  }
}
