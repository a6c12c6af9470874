/**
 * 相談・提案・ビジネスケース分析・意思決定支援
 */

import { ValidationError, formatIssues, formatJapaneseDate } from '@persona-desk/runtime';
import { PersonaModule, type ModuleContext } from '../context';
import { bulletList, formatDetails } from '../format';
import {
  DecisionOptionsSchema,
  type BusinessCaseAnalysis,
  type DecisionOption,
  type DecisionSupportResult,
} from './schemas';

/**
 * 相談種別と日本語名
 */
export const CONSULTATION_TYPES: Readonly<Record<string, string>> = {
  strategy: '戦略コンサルティング',
  management: 'マネジメント相談',
  career: 'キャリア相談',
  team: 'チーム課題解決',
  process: 'プロセス改善',
  decision: '意思決定支援',
  conflict: '対立解決',
  innovation: 'イノベーション支援',
};

export const DEFAULT_ANALYSIS_FOCUS = ['市場機会', '競合分析', 'リスク評価', '財務インパクト', '実現可能性'] as const;

/**
 * 構造化分析の項目
 */
export const BUSINESS_ANALYSIS_STRUCTURE: Readonly<Record<string, string>> = {
  状況分析: '現在の状況の要約',
  主要な機会: '特定された機会',
  主要な課題: '特定された課題',
  推奨度: '推奨レベル（高/中/低）',
  根拠: '推奨の根拠',
  次のステップ: '推奨アクション',
};

export function consultationName(type: string): string {
  return CONSULTATION_TYPES[type] ?? type;
}

export class ConsultationModule extends PersonaModule {
  constructor(ctx: ModuleContext) {
    super(ctx, 'consultation');
  }

  async provideConsultation(consultationType: string, details: Record<string, unknown>): Promise<string> {
    const name = consultationName(consultationType);
    const formattedDetails = formatDetails(details);

    const prompt = `${name}のご相談です。次の内容について、専門的な助言をお願いします。

【相談の種類】
${name}

【相談内容・詳細】
${formattedDetails}

【回答の構成】
1. 現状分析
2. 課題の特定
3. 解決の選択肢（複数）
4. 推奨アクション
5. 実行計画
6. リスクと注意点
7. 成功のポイント

${this.personaName}として、相談者の立場に立ち、実行できる助言をしてください。`;

    const response = await this.ctx.llm.generateResponse(prompt);

    const recordPath = this.saveRecord('consultations', `consultation_${consultationType}`, 'consultation', {
      consultation_name: name,
      details: formattedDetails,
      response,
    });
    this.logger.info('Consultation provided', { consultation_type: consultationType, path: recordPath });

    return response;
  }

  async makeProposal(topic: string, requirements: Record<string, unknown>): Promise<string> {
    const prompt = `次のテーマについて、提案書を作成してください。

【提案テーマ】
${topic}

【要件・背景情報】
${formatDetails(requirements)}

【提案書の構成】
1. エグゼクティブサマリー
2. 背景と現状分析
3. 提案の概要
4. 実施計画の詳細
5. 必要なリソースと予算
6. 期待効果とROI
7. リスクと対策
8. スケジュール
9. 成功指標とKPI
10. 次のステップ

${this.personaName}として、意思決定者が判断しやすい、根拠のある提案書にしてください。`;

    const content = await this.ctx.llm.generateResponse(prompt);

    const recordPath = this.saveRecord('proposals', `proposal_${topic}`, 'proposal', {
      topic,
      date: formatJapaneseDate(this.ctx.now()),
      content,
    });
    this.logger.info('Proposal created', { path: recordPath });

    return content;
  }

  async analyzeBusinessCase(caseDescription: string, analysisFocus?: string[]): Promise<BusinessCaseAnalysis> {
    const focusAreas = analysisFocus && analysisFocus.length > 0 ? analysisFocus : [...DEFAULT_ANALYSIS_FOCUS];

    const prompt = `次のビジネスケースを分析してください。

【ビジネスケース】
${caseDescription}

【分析観点】
${bulletList(focusAreas)}

次の構成で分析結果を示してください：

【状況分析】
現状と背景

【機会と課題】
- 機会:
- 課題:

【観点別の分析】
${focusAreas.map((focus) => `【${focus}】`).join('\n')}

【総合判断】
- 推奨度:（高/中/低）
- 主な根拠:
- 条件付きの推奨事項:

【アクションプラン】
1. 短期（1〜3か月）
2. 中期（3〜12か月）
3. 長期（1年以上）

${this.personaName}として、客観的で戦略的な分析にしてください。`;

    const fullAnalysis = await this.ctx.llm.generateResponse(prompt);
    const structuredAnalysis = await this.ctx.llm.generateStructuredResponse(
      `次の分析を構造化してください:\n${fullAnalysis}`,
      { ...BUSINESS_ANALYSIS_STRUCTURE }
    );

    const recordPath = this.saveRecord('analyses', 'business_analysis', 'business_analysis', {
      case_description: caseDescription,
      analysis_focus: focusAreas,
      full_analysis: fullAnalysis,
      structured_analysis: structuredAnalysis,
    });
    this.logger.info('Business case analysis completed', { path: recordPath });

    return {
      case_description: caseDescription,
      analysis_focus: focusAreas,
      full_analysis: fullAnalysis,
      structured_analysis: structuredAnalysis,
      analyst: this.personaName,
      timestamp: this.ctx.now().toISOString(),
      record_path: recordPath,
    };
  }

  async provideDecisionSupport(decisionContext: string, options: unknown[]): Promise<DecisionSupportResult> {
    const parsed = DecisionOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(formatIssues(parsed.error.issues));
    }
    const namedOptions = parsed.data.map((option, i) => ({ ...option, name: option.name ?? `選択肢${i + 1}` }));

    const prompt = `次の意思決定について、分析と推奨をお願いします。

【意思決定の背景】
${decisionContext}

【検討する選択肢】
${namedOptions.map((option, i) => formatOption(option, i)).join('\n\n')}

【分析の枠組み】
1. 選択肢ごとの評価
2. 比較マトリクス
3. リスクとベネフィット
4. 実現可能性
5. 戦略との整合
6. 総合的な推奨

各選択肢を次の観点で1〜5点で評価してください：
- 実現可能性
- 期待効果
- リスク
- 必要リソース
- 戦略的重要性

${this.personaName}として、意思決定者が自信を持って判断できる分析にしてください。`;

    const analysis = await this.ctx.llm.generateResponse(prompt);
    const recommendationSummary = await this.ctx.llm.generateResponse(
      `次の分析から、最も重要な推奨を1〜2文で要約してください：

${analysis}

${this.personaName}として、明確で行動しやすい表現にしてください。`
    );

    const recordPath = this.saveRecord('decisions', 'decision_support', 'decision_support', {
      decision_context: decisionContext,
      options: namedOptions,
      analysis,
      recommendation_summary: recommendationSummary,
    });
    this.logger.info('Decision support completed', { path: recordPath });

    return {
      decision_context: decisionContext,
      options: namedOptions,
      analysis,
      recommendation_summary: recommendationSummary,
      decision_supporter: this.personaName,
      timestamp: this.ctx.now().toISOString(),
      record_path: recordPath,
    };
  }
}

function formatOption(option: DecisionOption & { name: string }, index: number): string {
  return [
    `選択肢${index + 1}: ${option.name}`,
    `内容: ${option.description}`,
    `メリット: ${option.benefits}`,
    `デメリット: ${option.risks}`,
    `コスト: ${option.cost}`,
  ].join('\n');
}
