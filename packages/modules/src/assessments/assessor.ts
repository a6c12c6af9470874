/**
 * パーソナリティ評価
 */

import { UnsupportedTypeError, safeFileSegment } from '@persona-desk/runtime';
import { PersonaModule, type ModuleContext } from '../context';
import { formatResponses } from '../format';
import { createDefaultFrameworkRegistry, type AssessmentFramework, type FrameworkRegistry } from './frameworks';

export const ANONYMOUS_PARTICIPANT = '匿名';
export const MAX_INSIGHTS = 5;

export interface AssessmentResult {
  framework: string;
  analysis: string;
  insights: string[];
  assessment_type: string;
  participant: string;
  assessor: string;
  timestamp: string;
  record_path: string;
}

export interface QuestionnaireItem {
  question: string;
  options: string[];
}

/**
 * "- " で始まる行を洞察として最大5件抽出
 */
export function extractInsights(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('- '))
    .map((line) => line.slice(2).trim())
    .slice(0, MAX_INSIGHTS);
}

/**
 * "質問N: ..." と続く "A) ..." 〜 "D) ..." を読み取る
 */
export function parseQuestionnaire(text: string): QuestionnaireItem[] {
  const items: QuestionnaireItem[] = [];
  let current: QuestionnaireItem | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    const question = /^質問\s*\d+\s*[:：]\s*(.+)$/.exec(line);
    if (question?.[1]) {
      current = { question: question[1].trim(), options: [] };
      items.push(current);
      continue;
    }

    const option = /^[A-D][)）]\s*(.+)$/.exec(line);
    if (option?.[1] && current) {
      current.options.push(option[1].trim());
    }
  }

  return items;
}

export class PersonalityAssessor extends PersonaModule {
  constructor(
    ctx: ModuleContext,
    private readonly registry: FrameworkRegistry = createDefaultFrameworkRegistry()
  ) {
    super(ctx, 'assessments');
  }

  /**
   * 利用可能なフレームワーク（登録済みかつ設定で有効）
   */
  supportedTypes(): string[] {
    const enabled: readonly string[] = this.ctx.config.personality_models;
    return this.registry.keys().filter((key) => enabled.includes(key));
  }

  private resolveFramework(assessmentType: string): AssessmentFramework {
    const framework = this.supportedTypes().includes(assessmentType) ? this.registry.get(assessmentType) : null;
    if (!framework) {
      throw new UnsupportedTypeError('assessment type', assessmentType, this.supportedTypes());
    }
    return framework;
  }

  async assessPersonality(
    assessmentType: string,
    responses: Record<string, unknown>,
    participant?: string
  ): Promise<AssessmentResult> {
    const framework = this.resolveFramework(assessmentType);

    const analysis = await this.ctx.llm.generateResponse(
      framework.buildPrompt({
        subject: participant ? `名前: ${participant}` : `対象者: ${ANONYMOUS_PARTICIPANT}`,
        responses: formatResponses(responses),
        persona: this.personaName,
      })
    );
    const insights = await this.generateInsights(analysis, framework.label);

    const participantName = participant ?? ANONYMOUS_PARTICIPANT;
    const recordPath = this.saveRecord(
      'assessments',
      `${assessmentType}_assessment_${participant ? safeFileSegment(participant) : 'anonymous'}`,
      'assessment',
      { framework: framework.label, participant: participantName, analysis, insights }
    );

    this.logger.info('Assessment completed', { assessment_type: assessmentType, path: recordPath });

    return {
      framework: framework.label,
      analysis,
      insights,
      assessment_type: assessmentType,
      participant: participantName,
      assessor: this.personaName,
      timestamp: this.ctx.now().toISOString(),
      record_path: recordPath,
    };
  }

  private async generateInsights(analysis: string, label: string): Promise<string[]> {
    const prompt = `次の${label}分析から、重要な洞察を3〜5個抜き出してください。

【分析結果】
${analysis}

各洞察は次の形式で1行ずつ書いてください：
- [洞察]

${this.personaName}として、行動につながる洞察にしてください。`;

    return extractInsights(await this.ctx.llm.generateResponse(prompt));
  }

  async createAssessmentQuestionnaire(assessmentType: string): Promise<QuestionnaireItem[]> {
    const framework = this.resolveFramework(assessmentType);

    const prompt = `${framework.label}の性格診断に使う質問票を作成してください。

【要件】
- 質問は10〜15問
- 4択で答えられる形式
- 自然な日本語

次の形式で書いてください：

質問1: [質問]
A) [選択肢]
B) [選択肢]
C) [選択肢]
D) [選択肢]

${this.personaName}として、答えやすい質問票にしてください。`;

    return parseQuestionnaire(await this.ctx.llm.generateResponse(prompt));
  }
}
