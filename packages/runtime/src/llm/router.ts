/**
 * LLM ルーター
 *
 * モデル名からプロバイダーを決め、APIキーがあれば実クライアント、
 * なければモッククライアントへ振り分ける
 */

import {
  resolveProvider,
  type AgentLogger,
  type AIModelConfig,
  type GenerateOptions,
  type LLMClient,
  type LLMProvider,
  type TextGenerator,
  type TokenUsage,
} from '@persona-desk/persona-spec';
import { LLMProviderError } from '../errors';
import { sanitizeErrorMessage } from '../redact';
import { createAnthropicClient } from './anthropic';
import { createOpenAIClient } from './openai';
import { createMockClient } from './mock';
import { buildStructuredPrompt, parseBracketSections } from './sections';

export interface LLMRouterDeps {
  config: AIModelConfig;
  /** ペルソナのシステムプロンプト */
  systemPrompt: string;
  personaName: string;
  logger: AgentLogger;
  /** テスト用の差し替え */
  clients?: Partial<Record<LLMProvider, LLMClient>>;
  now?: () => Date;
}

export class LLMRouter implements TextGenerator {
  private readonly config: AIModelConfig;
  private readonly systemPrompt: string;
  private readonly logger: AgentLogger;
  private readonly clients: Partial<Record<LLMProvider, LLMClient>>;
  private readonly mockClient: LLMClient;
  private readonly totalUsage: TokenUsage = { input: 0, output: 0 };
  private requestCount = 0;

  constructor(deps: LLMRouterDeps) {
    this.config = deps.config;
    this.systemPrompt = deps.systemPrompt;
    this.logger = deps.logger.child({ component: 'llm' });
    this.clients = deps.clients ?? createProviderClients(deps.config);
    this.mockClient = this.clients.mock ?? createMockClient({ personaName: deps.personaName, now: deps.now });
  }

  /**
   * 累積トークン使用量
   */
  get usage(): TokenUsage & { requests: number } {
    return { ...this.totalUsage, requests: this.requestCount };
  }

  /**
   * モデルに対応するクライアント（キー未設定ならモック）
   */
  clientFor(model: string): LLMClient {
    const provider = resolveProvider(model);
    if (provider === 'mock') {
      return this.mockClient;
    }
    return this.clients[provider] ?? this.mockClient;
  }

  async generateResponse(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.config.default_model;
    const temperature = options.temperature ?? this.config.temperature;
    const maxTokens = options.maxTokens ?? this.config.max_tokens;
    const client = this.clientFor(model);

    this.logger.debug('LLM request', { provider: client.provider, model, prompt_length: prompt.length });

    try {
      const response = await client.chat({
        model,
        system: options.system ?? this.systemPrompt,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxTokens,
        temperature,
      });

      this.totalUsage.input += response.tokens_used.input;
      this.totalUsage.output += response.tokens_used.output;
      this.requestCount += 1;

      return response.content.trim();
    } catch (error) {
      const message = sanitizeErrorMessage(error instanceof Error ? error.message : String(error));
      this.logger.error('LLM request failed', { provider: client.provider, model, error: message });
      throw new LLMProviderError(client.provider, model, message, { cause: error });
    }
  }

  async generateStructuredResponse(
    prompt: string,
    structure: Record<string, string>
  ): Promise<Record<string, string>> {
    const response = await this.generateResponse(buildStructuredPrompt(prompt, structure));
    return parseBracketSections(response);
  }
}

/**
 * APIキーが設定されたプロバイダーのみクライアント生成
 */
function createProviderClients(config: AIModelConfig): Partial<Record<LLMProvider, LLMClient>> {
  const clients: Partial<Record<LLMProvider, LLMClient>> = {};
  if (config.anthropic_api_key) {
    clients.anthropic = createAnthropicClient(config.anthropic_api_key);
  }
  if (config.openai_api_key) {
    clients.openai = createOpenAIClient(config.openai_api_key);
  }
  return clients;
}
