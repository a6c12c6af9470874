import { z } from 'zod';

/**
 * 性格特性スコア（0.0〜1.0）
 */
export const TraitScoreSchema = z.number().min(0).max(1);

/**
 * ペルソナ設定スキーマ
 */
export const PersonalityConfigSchema = z.object({
  name: z.string().min(1).default('田中誠'),
  language: z.string().min(1).default('ja'),
  communication_style: z.string().default('polite_formal'),
  expertise_areas: z.array(z.string()).default(['management', 'strategy', 'team_leadership']),
  decision_making_style: z.string().default('analytical_collaborative'),
  meeting_style: z.string().default('facilitative_consensus_building'),
  personality_traits: z.record(TraitScoreSchema).default({
    openness: 0.8,
    conscientiousness: 0.9,
    extraversion: 0.7,
    agreeableness: 0.8,
    neuroticism: 0.2,
  }),
});

export type PersonalityConfig = z.infer<typeof PersonalityConfigSchema>;

/**
 * AIモデル設定スキーマ
 */
export const AIModelConfigSchema = z.object({
  openai_api_key: z.string().min(1).optional(),
  anthropic_api_key: z.string().min(1).optional(),
  default_model: z.string().min(1).default('claude-sonnet-4-20250514'),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  max_tokens: z.coerce.number().int().positive().default(2000),
});

export type AIModelConfig = z.infer<typeof AIModelConfigSchema>;

/**
 * ログレベル
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * 評価フレームワークキー
 */
export const AssessmentTypeSchema = z.enum(['mbti', 'big5', 'disc', 'strengths']);

export type AssessmentType = z.infer<typeof AssessmentTypeSchema>;

/**
 * エージェント全体設定スキーマ
 *
 * ディレクトリは読み込み時に絶対パスへ解決済み
 */
export const AgentConfigSchema = z.object({
  personality: PersonalityConfigSchema,
  ai_model: AIModelConfigSchema,

  template_dir: z.string(),
  output_dir: z.string(),
  config_dir: z.string(),
  log_dir: z.string(),
  log_level: LogLevelSchema.default('info'),

  document_templates: z.string(),
  meeting_templates: z.string(),
  assessment_templates: z.string(),

  default_meeting_duration: z.coerce.number().int().min(11).default(60),
  personality_models: z.array(AssessmentTypeSchema).min(1).default(['mbti', 'big5', 'disc', 'strengths']),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/**
 * デフォルトペルソナ
 */
export const DEFAULT_PERSONALITY: PersonalityConfig = PersonalityConfigSchema.parse({});

/**
 * ペルソナ設定の検証
 */
export function validatePersonality(value: unknown) {
  return PersonalityConfigSchema.safeParse(value ?? {});
}
