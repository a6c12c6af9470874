import OpenAI from 'openai';
import { isReasoningModel, type LLMClient, type LLMChatParams, type LLMChatResponse } from '@persona-desk/persona-spec';

/**
 * chat.completions のリクエストを組み立てる
 *
 * - 通常モデル: system をメッセージ列の先頭に置き、max_tokens と temperature を送る
 * - 推論モデル (o1/o3): temperature は送らず max_completion_tokens を使う。system は最初の user メッセージに前置する
 */
export function buildChatCompletionRequest(params: LLMChatParams): OpenAI.Chat.ChatCompletionCreateParamsNonStreaming {
  if (isReasoningModel(params.model)) {
    let pendingSystem = params.system;
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = params.messages.map((msg) => {
      if (msg.role === 'user' && pendingSystem) {
        const content = `${pendingSystem}\n\n${msg.content}`;
        pendingSystem = undefined;
        return { role: 'user', content };
      }
      return { role: msg.role, content: msg.content };
    });

    return {
      model: params.model,
      messages,
      max_completion_tokens: params.max_tokens,
    };
  }

  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
  if (params.system) {
    messages.push({ role: 'system', content: params.system });
  }
  for (const msg of params.messages) {
    messages.push({ role: msg.role, content: msg.content });
  }

  return {
    model: params.model,
    messages,
    max_tokens: params.max_tokens,
    temperature: params.temperature,
  };
}

/**
 * OpenAI クライアント
 */
export function createOpenAIClient(apiKey: string): LLMClient {
  const client = new OpenAI({ apiKey });

  return {
    provider: 'openai',

    async chat(params: LLMChatParams): Promise<LLMChatResponse> {
      const response = await client.chat.completions.create(buildChatCompletionRequest(params));

      return {
        content: response.choices[0]?.message.content ?? '',
        tokens_used: {
          input: response.usage?.prompt_tokens ?? 0,
          output: response.usage?.completion_tokens ?? 0,
        },
        model: response.model,
      };
    },
  };
}
