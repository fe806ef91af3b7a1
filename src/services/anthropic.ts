// src/services/anthropic.ts
import Anthropic from '@anthropic-ai/sdk';
import { APIError } from '@anthropic-ai/sdk';
import type { GenerateRequest, GenerateResult, TextGenerator } from './llm-common.js';

export type AnthropicService = TextGenerator;

export function createAnthropicService(apiKey: string): AnthropicService {
  const client = new Anthropic({ apiKey });

  async function generate(request: GenerateRequest): Promise<GenerateResult> {
    try {
      const response = await client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxOutputTokens,
          temperature: 0,
          system: request.instruction,
          messages: [{ role: 'user', content: request.payload }],
        },
        { signal: request.signal }
      );

      const textBlock = response.content.find((block) => block.type === 'text');
      const text = textBlock?.type === 'text' ? textBlock.text : '';

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof APIError && error.status === 429) {
        // Check message to differentiate quota vs rate limit
        if (error.message.includes('credit') || error.message.includes('quota')) {
          throw new Error('Anthropic API quota exceeded - please add credits');
        }
        throw new Error('Anthropic rate limit reached');
      } else if (error instanceof APIError) {
        throw new Error(`Anthropic API error (${error.status}): ${error.message}`);
      }
      throw error;
    }
  }

  return { generate };
}
