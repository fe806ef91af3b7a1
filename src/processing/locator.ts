// src/processing/locator.ts
import { cleanElement } from './cleaner.js';
import type { SkipSet } from './tag-filter.js';

/**
 * Picks the subtree holding the article and returns it cleaned. The first
 * `<article>` wins when it has any content; otherwise the whole `<body>` is used.
 */
export function locateContent(document: Document, skipSet: SkipSet): string {
  const article = document.querySelector('article');
  if (article) {
    const cleaned = cleanElement(article, skipSet);
    if (cleaned.trim()) {
      return cleaned;
    }
  }

  const body = document.querySelector('body');
  if (body) {
    return cleanElement(body, skipSet);
  }

  return '';
}
