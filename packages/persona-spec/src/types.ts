/**
 * LLMプロバイダー
 */
export type LLMProvider = 'openai' | 'anthropic' | 'mock';

/**
 * ロガーインターフェース
 */
export interface AgentLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(meta: Record<string, unknown>): AgentLogger;
}

/**
 * LLMクライアントインターフェース
 */
export interface LLMClient {
  readonly provider: LLMProvider;
  chat(params: LLMChatParams): Promise<LLMChatResponse>;
}

/**
 * LLMチャットパラメータ
 */
export interface LLMChatParams {
  model: string;
  system?: string;
  messages: LLMMessage[];
  max_tokens: number;
  temperature: number;
}

/**
 * LLMメッセージ
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * LLMチャットレスポンス
 */
export interface LLMChatResponse {
  content: string;
  tokens_used: TokenUsage;
  model: string;
}

/**
 * トークン使用量
 */
export interface TokenUsage {
  input: number;
  output: number;
}

/**
 * 生成オプション（未指定時は設定値）
 */
export interface GenerateOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** ペルソナ既定のシステムプロンプトを置き換える */
  system?: string;
}

/**
 * プロンプトを受け取りテキストを返す生成器
 *
 * 各モジュールはこのインターフェースだけに依存する
 */
export interface TextGenerator {
  generateResponse(prompt: string, options?: GenerateOptions): Promise<string>;
  generateStructuredResponse(
    prompt: string,
    structure: Record<string, string>
  ): Promise<Record<string, string>>;
}
