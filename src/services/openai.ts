// src/services/openai.ts
import OpenAI, { APIError, RateLimitError } from 'openai';
import type { GenerateRequest, GenerateResult, TextGenerator } from './llm-common.js';

export type OpenAIService = TextGenerator;

export function createOpenAIService(apiKey: string): OpenAIService {
  const client = new OpenAI({ apiKey });

  async function generate(request: GenerateRequest): Promise<GenerateResult> {
    try {
      const response = await client.chat.completions.create(
        {
          model: request.model,
          temperature: 0,
          max_tokens: request.maxOutputTokens,
          messages: [
            { role: 'system', content: request.instruction },
            { role: 'user', content: request.payload },
          ],
        },
        { signal: request.signal }
      );

      return {
        text: response.choices[0]?.message?.content ?? '',
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      // Detect specific error types
      if (error instanceof RateLimitError) {
        // Check message to differentiate quota vs rate limit
        if (error.message.includes('quota') || error.message.includes('insufficient_quota')) {
          throw new Error('OpenAI API quota exceeded - please add credits to your account');
        }
        throw new Error('OpenAI rate limit reached');
      } else if (error instanceof APIError) {
        throw new Error(`OpenAI API error (${error.status}): ${error.message}`);
      }
      throw error;
    }
  }

  return { generate };
}
