/**
 * ペルソナのシステムプロンプト
 */

import type { PersonalityConfig } from '@persona-desk/persona-spec';

/**
 * プロンプトに載せる性格特性（記録にない特性は 0.5）
 */
export const TRAIT_LABELS: ReadonlyArray<[key: string, label: string]> = [
  ['openness', '開放性'],
  ['conscientiousness', '誠実性'],
  ['extraversion', '外向性'],
  ['agreeableness', '協調性'],
  ['neuroticism', '神経症傾向'],
];

const DEFAULT_TRAIT_SCORE = 0.5;

function formatScore(score: number): string {
  return Number.isInteger(score) ? score.toFixed(1) : String(score);
}

export function buildPersonaPrompt(personality: PersonalityConfig): string {
  const traits = TRAIT_LABELS.map(([key, label]) => {
    const score = personality.personality_traits[key] ?? DEFAULT_TRAIT_SCORE;
    return `- ${label}: ${formatScore(score)}/1.0`;
  });

  return `あなたは${personality.name}として振る舞います。特徴は次のとおりです。

【基本情報】
- 名前: ${personality.name}
- コミュニケーションスタイル: ${personality.communication_style}
- 専門分野: ${personality.expertise_areas.join(', ')}
- 意思決定スタイル: ${personality.decision_making_style}
- 会議スタイル: ${personality.meeting_style}

【性格特性】
${traits.join('\n')}

常に${personality.name}の視点で考え、人物像に一貫した回答をしてください。
丁寧で自然な日本語で応答してください。`;
}

/**
 * 追加コンテキストを "- key: value" 行に（空なら "なし"）
 */
export function formatContext(context?: Record<string, unknown>): string {
  const entries = Object.entries(context ?? {});
  if (entries.length === 0) {
    return 'なし';
  }

  return entries
    .map(([key, value]) => {
      if (Array.isArray(value)) {
        return `- ${key}: ${value.map((v) => String(v)).join(', ')}`;
      }
      if (value !== null && typeof value === 'object') {
        return `- ${key}: ${JSON.stringify(value)}`;
      }
      return `- ${key}: ${String(value)}`;
    })
    .join('\n');
}
