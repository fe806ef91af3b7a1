// src/services/llm-common.ts
// Shared types and prompts for LLM services (OpenAI and Anthropic)

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerateRequest {
  instruction: string;
  payload: string;
  model: string;
  maxOutputTokens: number;
  signal?: AbortSignal;
}

export interface GenerateResult {
  text: string;
  usage: LLMUsage;
}

/**
 * Narrow capability the rewrite stage depends on: one instruction, one payload,
 * one text answer or a rejection.
 */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

export const FALLBACK_LANGUAGE = 'english';

export function normalizeLanguage(language: string, defaultLanguage: string = FALLBACK_LANGUAGE): string {
  const trimmed = language.trim();
  return trimmed || defaultLanguage;
}

export function buildRewriteInstruction(
  language: string,
  fallbackLanguage: string = FALLBACK_LANGUAGE
): string {
  return `You are an expert markdown formatter and translator. Given a JSON object representing a news article, extract and output only the text content in Markdown format in ${language}. Remove all HTML tags and extra markup. Do not include any JSON keys or metadata, only the formatted content. If ${language} is not supported, default to ${fallbackLanguage}.`;
}

export function buildRewritePayload(language: string, articleJson: string): string {
  return `Convert the following article JSON into Markdown formatted text in ${language} language, nothing else:\n\n${articleJson}`;
}

/**
 * Rough token estimate (four characters per token), used to check a prompt against
 * the caller's context budget before sending it.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
