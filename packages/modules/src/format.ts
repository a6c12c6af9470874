/**
 * プロンプト用の整形ヘルパー
 */

function stringify(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((v) => String(v)).join(', ');
  }
  return String(value);
}

/**
 * 任意の値を1行に。配列は ", " 区切り、オブジェクトは "k: v" を ", " 区切り、null/undefined は空文字
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value)
      .map(([k, v]) => `${k}: ${stringify(v)}`)
      .join(', ');
  }
  return stringify(value);
}

/**
 * 相談内容・要件: key: value 行
 *
 * 配列は ", " 区切り、オブジェクトは "k: v" を ", " 区切り
 */
export function formatDetails(details: Record<string, unknown>): string {
  const entries = Object.entries(details);
  if (entries.length === 0) {
    return '詳細な情報は提供されていません。';
  }

  return entries
    .map(([key, value]) => {
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        return `${key}: ${formatValue(value)}`;
      }
      return `${key}: ${stringify(value)}`;
    })
    .join('\n');
}

/**
 * 評価回答: オブジェクトはインデント付き JSON
 */
export function formatResponses(responses: Record<string, unknown>): string {
  const entries = Object.entries(responses);
  if (entries.length === 0) {
    return '回答データが提供されていません。';
  }

  return entries
    .map(([key, value]) => {
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        return `${key}: ${JSON.stringify(value, null, 2)}`;
      }
      return `${key}: ${stringify(value)}`;
    })
    .join('\n');
}

/**
 * 文書要件: "- key: value" 行
 */
export function formatRequirements(requirements: Record<string, unknown>): string {
  const entries = Object.entries(requirements);
  if (entries.length === 0) {
    return '特別な要件はありません。';
  }
  return entries.map(([key, value]) => `- ${key}: ${stringify(value)}`).join('\n');
}

export function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

export function numberedList(items: readonly string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}
