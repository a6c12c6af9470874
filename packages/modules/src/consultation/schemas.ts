import { z } from 'zod';
import { formatValue } from '../format';

/**
 * 選択肢の項目。数値・配列・オブジェクトもプロンプト用の文字列に
 */
const OptionFieldSchema = z.unknown().transform(formatValue);

/**
 * 意思決定の選択肢
 */
export const DecisionOptionSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: OptionFieldSchema,
    benefits: OptionFieldSchema,
    risks: OptionFieldSchema,
    cost: OptionFieldSchema,
  })
  .passthrough();

export type DecisionOption = z.infer<typeof DecisionOptionSchema>;

export const DecisionOptionsSchema = z.array(DecisionOptionSchema).min(1);

/**
 * 合意形成の立場（ステークホルダー名 → 立場）
 */
export const StakeholderPositionsSchema = z
  .record(z.union([z.string(), z.number(), z.boolean(), z.array(z.unknown()), z.record(z.unknown())]))
  .refine((value) => Object.keys(value).length > 0, { message: 'at least one stakeholder is required' });

export type StakeholderPositions = z.infer<typeof StakeholderPositionsSchema>;

export interface BusinessCaseAnalysis {
  case_description: string;
  analysis_focus: string[];
  full_analysis: string;
  structured_analysis: Record<string, string>;
  analyst: string;
  timestamp: string;
  record_path: string;
}

export interface DecisionSupportResult {
  decision_context: string;
  options: Array<DecisionOption & { name: string }>;
  analysis: string;
  recommendation_summary: string;
  decision_supporter: string;
  timestamp: string;
  record_path: string;
}
