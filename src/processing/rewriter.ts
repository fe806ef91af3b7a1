// src/processing/rewriter.ts
import type { ArticleRecord, LLMProvider, ModelChoice, RewriteOutcome } from '../types/index.js';
import { getErrorMessage, RewriteError } from '../errors.js';
import { toArticleJson } from '../output.js';
import {
  buildRewriteInstruction,
  buildRewritePayload,
  estimateTokens,
  normalizeLanguage,
  type TextGenerator,
} from '../services/llm-common.js';

export interface RewriterConfig {
  defaultLanguage: string;
  defaultModel: ModelChoice;
  maxContextTokens: number;
  maxOutputTokens: number;
}

export type GeneratorRegistry = Partial<Record<LLMProvider, TextGenerator>>;

export interface Rewriter {
  rewrite(
    article: ArticleRecord,
    language: string,
    modelChoice?: ModelChoice,
    signal?: AbortSignal
  ): Promise<RewriteOutcome>;
}

const CREDENTIAL_ENV_VARS: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

export function createRewriter(generators: GeneratorRegistry, config: RewriterConfig): Rewriter {
  function resolveGenerator(provider: LLMProvider): TextGenerator {
    const generator = generators[provider];
    if (!generator) {
      throw new RewriteError(`Please set the ${CREDENTIAL_ENV_VARS[provider]} environment variable.`);
    }
    return generator;
  }

  function serializeArticle(article: ArticleRecord): string {
    try {
      return JSON.stringify(toArticleJson(article));
    } catch (error) {
      throw new RewriteError(`Failed to serialize article to JSON: ${getErrorMessage(error)}`);
    }
  }

  async function requestMarkdown(
    article: ArticleRecord,
    language: string,
    modelChoice: ModelChoice,
    signal?: AbortSignal
  ): Promise<string> {
    const generator = resolveGenerator(modelChoice.provider);
    const lang = normalizeLanguage(language, config.defaultLanguage);

    const instruction = buildRewriteInstruction(lang, config.defaultLanguage);
    const payload = buildRewritePayload(lang, serializeArticle(article));

    const promptTokens = estimateTokens(instruction) + estimateTokens(payload);
    if (promptTokens > config.maxContextTokens) {
      throw new RewriteError(
        `Article is too large for the model context (${promptTokens} > ${config.maxContextTokens} tokens)`
      );
    }

    let text: string;
    try {
      const result = await generator.generate({
        instruction,
        payload,
        model: modelChoice.model,
        maxOutputTokens: config.maxOutputTokens,
        signal,
      });
      console.log(
        `[Rewrite] ${modelChoice.provider}/${modelChoice.model}: ${result.usage.inputTokens} input, ${result.usage.outputTokens} output tokens`
      );
      text = result.text;
    } catch (error) {
      throw new RewriteError(`LLM Error: ${getErrorMessage(error)}`, { cause: error });
    }

    if (!text.trim()) {
      throw new RewriteError('LLM Error: model returned an empty response');
    }
    return text;
  }

  /**
   * Sends the whole record to the model and returns a copy whose content is the
   * model's Markdown. The input record is left untouched on every path.
   */
  async function rewrite(
    article: ArticleRecord,
    language: string,
    modelChoice: ModelChoice = config.defaultModel,
    signal?: AbortSignal
  ): Promise<RewriteOutcome> {
    try {
      const markdown = await requestMarkdown(article, language, modelChoice, signal);
      return { success: true, article: { ...article, content: markdown } };
    } catch (error) {
      return { success: false, error: getErrorMessage(error) };
    }
  }

  return { rewrite };
}
