// src/output.ts
import type { ArticleRecord } from './types/index.js';

/** JSON field names of a record as printed by the CLI and sent to the model. */
export interface ArticleJson {
  title: string;
  content: string;
  featured_image_url: string;
  publication_date: string | null;
  author: string | null;
  error: string;
}

export function toArticleJson(article: ArticleRecord): ArticleJson {
  return {
    title: article.title,
    content: article.content,
    featured_image_url: article.featuredImageUrl,
    publication_date: article.publicationDate,
    author: article.author,
    error: article.error,
  };
}

/** Title, blank line, content: the form printed for people. */
export function formatArticleText(article: ArticleRecord): string {
  return `${article.title}\n\n${article.content}`;
}

export function formatArticleJson(article: ArticleRecord): string {
  return JSON.stringify(toArticleJson(article), null, 2);
}
