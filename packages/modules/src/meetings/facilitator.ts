/**
 * 会議ファシリテーション
 */

import { ValidationError, addMinutes, fileStamp, formatClock, formatJapaneseDate } from '@persona-desk/runtime';
import { PersonaModule, type ModuleContext } from '../context';
import { bulletList, numberedList } from '../format';
import {
  ActionItemSchema,
  MeetingInfoSchema,
  type ActionItem,
  type AgendaSlot,
  type MeetingInfo,
  type MeetingPlan,
  type OneOnOnePlan,
} from './schemas';

/** 開始・終了の挨拶に充てる時間（分） */
export const OPENING_CLOSING_MINUTES = 10;
/** 最初の議題までの導入時間（分） */
const OPENING_MINUTES = 5;

export const DEFAULT_ONE_ON_ONE_TOPICS = [
  '最近の業務状況',
  '成果と課題',
  '今後の目標',
  '必要なサポート',
  'その他の相談事項',
] as const;

/**
 * 議題ごとに均等な時間枠を割り当てる
 */
export function buildAgendaSchedule(agenda: readonly string[], durationMinutes: number, start: Date): AgendaSlot[] {
  const slot = Math.floor((durationMinutes - OPENING_CLOSING_MINUTES) / agenda.length);

  return agenda.map((item, i) => {
    const startTime = addMinutes(start, OPENING_MINUTES + i * slot);
    return {
      item,
      start_time: formatClock(startTime),
      end_time: formatClock(addMinutes(startTime, slot)),
      duration_minutes: slot,
    };
  });
}

export class MeetingFacilitator extends PersonaModule {
  constructor(ctx: ModuleContext) {
    super(ctx, 'meetings');
  }

  async facilitateMeeting(
    meetingType: string,
    agenda: string[],
    participants: string[],
    durationMinutes?: number
  ): Promise<MeetingPlan> {
    const duration = durationMinutes ?? this.ctx.config.default_meeting_duration;

    const errors: string[] = [];
    if (agenda.length === 0) {
      errors.push('agenda: at least one item is required');
    }
    if (participants.length === 0) {
      errors.push('participants: at least one participant is required');
    }
    if (!Number.isInteger(duration) || duration <= OPENING_CLOSING_MINUTES) {
      errors.push(`duration: must be an integer greater than ${OPENING_CLOSING_MINUTES} minutes`);
    }
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }

    const prompt = `会議の進行プランを作成してください。

【会議情報】
- 種類: ${meetingType}
- 参加者: ${participants.join(', ')} (${participants.length}名)
- 予定時間: ${duration}分
- ファシリテーター: ${this.personaName}

【アジェンダ】
${numberedList(agenda)}

次の項目を含めてください：
1. オープニングと導入
2. 議題ごとの進め方と時間配分
3. 発言を促す問いかけの例
4. 合意形成の進め方
5. 次のアクションの決め方
6. クロージングのまとめ

${this.personaName}として、建設的で時間どおりに終わる会議にしてください。`;

    const facilitationPlan = await this.ctx.llm.generateResponse(prompt);
    const now = this.ctx.now();
    const schedule = buildAgendaSchedule(agenda, duration, now);

    const recordPath = this.saveRecord('meetings', `${meetingType}_plan`, 'meeting_plan', {
      title: `${meetingType} 会議進行プラン`,
      participants,
      duration_minutes: duration,
      agenda,
      schedule,
      plan: facilitationPlan,
    });

    this.logger.info('Meeting plan created', { meeting_type: meetingType, path: recordPath });

    return {
      meeting_type: meetingType,
      participants,
      agenda,
      duration_minutes: duration,
      facilitation_plan: facilitationPlan,
      schedule,
      facilitator: this.personaName,
      timestamp: now.toISOString(),
      record_path: recordPath,
    };
  }

  async conductOneOnOne(participant: string, topics?: string[]): Promise<OneOnOnePlan> {
    if (!participant.trim()) {
      throw new ValidationError(['participant: must not be empty']);
    }
    const sessionTopics = topics && topics.length > 0 ? topics : [...DEFAULT_ONE_ON_ONE_TOPICS];

    const prompt = `${participant}さんとの1on1ミーティングの進行プランを作成してください。

【1on1情報】
- 参加者: ${participant}さん
- ファシリテーター: ${this.personaName}
- 予定時間: 30分

【話したいトピック】
${bulletList(sessionTopics)}

次の項目を含めてください：
1. 場づくりとアイスブレイク
2. トピックごとの問いかけ例
3. 話を引き出す聴き方
4. フィードバックと助言の伝え方
5. 次回までのアクション設定
6. 終了時のまとめ

${this.personaName}として、${participant}さんが安心して話せる場にしてください。`;

    const sessionPlan = await this.ctx.llm.generateResponse(prompt);
    const now = this.ctx.now();

    const recordPath = this.saveRecord('meetings', '1on1_plan', 'meeting_plan', {
      title: `${participant}さんとの1on1 進行プラン`,
      participants: [participant],
      topics: sessionTopics,
      plan: sessionPlan,
    });

    this.logger.info('One-on-one plan created', { path: recordPath });

    return {
      session_type: '1on1',
      participant,
      topics: sessionTopics,
      session_plan: sessionPlan,
      facilitator: this.personaName,
      timestamp: now.toISOString(),
      record_path: recordPath,
    };
  }

  /**
   * 議事録を作成して保存し、本文を返す
   */
  async generateMeetingMinutes(
    meetingInfo: Partial<MeetingInfo>,
    discussionPoints: string[],
    decisions: string[],
    actionItems: Array<Partial<ActionItem> & { task: string }>
  ): Promise<string> {
    const info = MeetingInfoSchema.parse(meetingInfo);
    const actions = actionItems.map((item) => ActionItemSchema.parse(item));
    const date = info.date ?? formatJapaneseDate(this.ctx.now());

    const prompt = `次の会議の議事録本文を作成してください。

【会議情報】
- 会議名: ${info.meeting_type}
- 日時: ${date}
- 参加者: ${info.participants.join(', ')}
- ファシリテーター: ${this.personaName}

【主な議論内容】
${bulletList(discussionPoints)}

【決定事項】
${bulletList(decisions)}

【アクションアイテム】
${bulletList(actions.map((a) => `${a.task} (担当: ${a.assignee}, 期限: ${a.deadline})`))}

正式な議事録として読みやすく整理してください。`;

    const summary = await this.ctx.llm.generateResponse(prompt);
    const now = this.ctx.now();

    const content = this.ctx.records.render('meeting_minutes.md', {
      persona: this.personaName,
      meeting_type: info.meeting_type,
      date: info.date,
      datetime: formatJapaneseDate(now),
      participants: info.participants,
      discussion_points: discussionPoints,
      decisions,
      action_items: actions,
      summary,
    });

    const recordPath = this.ctx.output.save('meetings', `meeting_minutes_${fileStamp(now)}.md`, content);
    this.logger.info('Meeting minutes saved', { path: recordPath });
    return content;
  }
}
