import { z } from 'zod';

/**
 * アクションアイテム
 */
export const ActionItemSchema = z.object({
  task: z.string().min(1),
  assignee: z.string().default('未定'),
  deadline: z.string().default('未定'),
});

export type ActionItem = z.infer<typeof ActionItemSchema>;

/**
 * 会議の基本情報
 */
export const MeetingInfoSchema = z
  .object({
    meeting_type: z.string().min(1).default('会議'),
    /** 表示用の日付（未指定なら作成日時） */
    date: z.string().optional(),
    participants: z.array(z.string()).default([]),
  })
  .passthrough();

export type MeetingInfo = z.infer<typeof MeetingInfoSchema>;

/**
 * 議事録入力ファイル
 */
export const MinutesInputSchema = z.object({
  meeting_info: MeetingInfoSchema.default({}),
  discussion_points: z.array(z.string()).default([]),
  decisions: z.array(z.string()).default([]),
  action_items: z.array(ActionItemSchema).default([]),
});

export type MinutesInput = z.infer<typeof MinutesInputSchema>;

/**
 * 議題ごとの時間枠
 */
export interface AgendaSlot {
  item: string;
  start_time: string;
  end_time: string;
  duration_minutes: number;
}

export interface MeetingPlan {
  meeting_type: string;
  participants: string[];
  agenda: string[];
  duration_minutes: number;
  facilitation_plan: string;
  schedule: AgendaSlot[];
  facilitator: string;
  timestamp: string;
  record_path: string;
}

export interface OneOnOnePlan {
  session_type: '1on1';
  participant: string;
  topics: string[];
  session_plan: string;
  facilitator: string;
  timestamp: string;
  record_path: string;
}
