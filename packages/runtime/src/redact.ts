/**
 * 秘匿情報のマスク
 *
 * 原則：APIキー等はログ・画面に絶対に出さない
 */

/**
 * センシティブなキー名パターン
 */
export const SENSITIVE_KEY_PATTERNS = [/api_?key/i, /secret/i, /token$/i, /password/i, /authorization/i];

/**
 * 文字列中のAPIキー形式
 */
const SECRET_VALUE_PATTERNS = [/sk-ant-[A-Za-z0-9_-]{8,}/g, /sk-[A-Za-z0-9_-]{8,}/g, /Bearer\s+[A-Za-z0-9._-]+/g];

const MAX_ERROR_MESSAGE_LENGTH = 500;

/**
 * キー名がセンシティブかどうかチェック
 */
export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((p) => p.test(key));
}

/**
 * 値を再帰的にマスク
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSecretValues(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }

  if (value && typeof value === 'object') {
    return redactRecord(Object.fromEntries(Object.entries(value)));
  }

  return value;
}

/**
 * オブジェクトの各キーをマスク（ログのメタデータ用）
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    result[key] = isSensitiveKey(key) && inner !== undefined && inner !== null && inner !== '' ? '[REDACTED]' : redactSecrets(inner);
  }
  return result;
}

/**
 * 文字列中のキー形式をマスク
 */
export function maskSecretValues(text: string): string {
  let result = text;
  for (const pattern of SECRET_VALUE_PATTERNS) {
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

/**
 * エラーメッセージのサニタイズ
 */
export function sanitizeErrorMessage(message: string): string {
  const masked = maskSecretValues(message);
  return masked.length > MAX_ERROR_MESSAGE_LENGTH
    ? masked.slice(0, MAX_ERROR_MESSAGE_LENGTH) + '...[TRUNCATED]'
    : masked;
}
