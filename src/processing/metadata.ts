// src/processing/metadata.ts
import type { ArticleMetadata } from '../types/index.js';

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function metaContent(document: Document, selector: string): string | null {
  const meta = document.querySelector(selector);
  return meta?.getAttribute('content') ?? null;
}

function extractTitle(document: Document): string {
  const title = collapseWhitespace(document.querySelector('title')?.textContent ?? '');
  if (title) {
    return title;
  }
  return collapseWhitespace(metaContent(document, 'meta[property="og:title"]') ?? '');
}

/**
 * Reads title, featured image, publication date and author from the document head.
 * Missing values are '' for title and image, null for date and author.
 */
export function extractMetadata(document: Document): ArticleMetadata {
  return {
    title: extractTitle(document),
    featuredImageUrl: metaContent(document, 'meta[property="og:image"]') ?? '',
    publicationDate: metaContent(document, 'meta[property="article:published_time"]'),
    author: metaContent(document, 'meta[name="author"]'),
  };
}
