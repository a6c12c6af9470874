import type { LLMProvider } from './types';

/**
 * プロバイダー判定用のモデル名プレフィックス
 */
const PROVIDER_PREFIXES: ReadonlyArray<[prefix: string, provider: LLMProvider]> = [
  ['gpt', 'openai'],
  ['o1', 'openai'],
  ['o3', 'openai'],
  ['claude', 'anthropic'],
];

/**
 * temperature を受け付けず max_completion_tokens を使う OpenAI の推論モデル
 */
const REASONING_MODEL_PREFIXES = ['o1', 'o3'] as const;

/**
 * 動作確認済みモデルID一覧
 */
export const KNOWN_MODEL_IDS = [
  'claude-sonnet-4-20250514',
  'claude-opus-4-20250514',
  'claude-3-5-sonnet-20241022',
  'claude-3-5-haiku-20241022',
  'gpt-4',
  'gpt-4o',
  'gpt-4o-mini',
] as const;

/**
 * モデル名から呼び出し先プロバイダーを決定
 *
 * どのプレフィックスにも一致しない場合は mock
 */
export function resolveProvider(model: string): LLMProvider {
  const normalized = model.trim().toLowerCase();
  for (const [prefix, provider] of PROVIDER_PREFIXES) {
    if (normalized.startsWith(prefix)) {
      return provider;
    }
  }
  return 'mock';
}

export function isReasoningModel(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return REASONING_MODEL_PREFIXES.some((prefix) => normalized.startsWith(prefix));
}

/**
 * モデルIDが既知かチェック
 */
export function isKnownModel(modelId: string): boolean {
  return KNOWN_MODEL_IDS.some((id) => id === modelId);
}
