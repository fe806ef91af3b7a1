// src/types/index.ts

export interface ArticleRecord {
  title: string;
  content: string;
  featuredImageUrl: string;
  publicationDate: string | null;
  author: string | null;
  error: string;
}

export interface ArticleMetadata {
  title: string;
  featuredImageUrl: string;
  publicationDate: string | null;
  author: string | null;
}

export type LLMProvider = 'openai' | 'anthropic';

export interface ModelChoice {
  provider: LLMProvider;
  model: string;
}

export type RewriteOutcome =
  | { success: true; article: ArticleRecord }
  | { success: false; error: string };

export interface ScrapeOptions {
  language?: string;
  modelChoice?: ModelChoice;
  signal?: AbortSignal;
}

export interface ApiError {
  error: string;
  message: string;
  code: string;
}

export type ErrorCode = 'INVALID_REQUEST' | 'BATCH_TOO_LARGE';
