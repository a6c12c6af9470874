import Anthropic from '@anthropic-ai/sdk';
import type { LLMClient, LLMChatParams, LLMChatResponse } from '@persona-desk/persona-spec';

/**
 * Anthropic Claude クライアント
 */
export function createAnthropicClient(apiKey: string): LLMClient {
  const client = new Anthropic({ apiKey });

  return {
    provider: 'anthropic',

    async chat(params: LLMChatParams): Promise<LLMChatResponse> {
      const response = await client.messages.create({
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages: params.messages.map((msg) => ({
          role: msg.role,
          content: msg.content,
        })),
        temperature: params.temperature,
      });

      // テキストコンテンツを抽出
      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');

      return {
        content,
        tokens_used: {
          input: response.usage.input_tokens,
          output: response.usage.output_tokens,
        },
        model: response.model,
      };
    },
  };
}
