/**
 * 評価フレームワーク定義とレジストリ
 */

import type { AssessmentType } from '@persona-desk/persona-spec';

export interface FrameworkPromptInput {
  /** "名前: xxx" または "対象者: 匿名" */
  subject: string;
  responses: string;
  persona: string;
}

export interface AssessmentFramework {
  key: AssessmentType;
  /** レポート見出し用の名称 */
  label: string;
  buildPrompt(input: FrameworkPromptInput): string;
}

const header = (intro: string, input: FrameworkPromptInput) => `${intro}

【対象者情報】
${input.subject}

【回答・観察データ】
${input.responses}

次の形式で分析結果を示してください：
`;

const mbti: AssessmentFramework = {
  key: 'mbti',
  label: 'MBTI',
  buildPrompt: (input) => `${header('次の情報から、MBTI（16タイプ）の観点で性格を分析してください。', input)}
【MBTI分析結果】
推定タイプ: [4文字のタイプ]

【各指標の傾向】
- 外向(E) / 内向(I):
- 感覚(S) / 直観(N):
- 思考(T) / 感情(F):
- 判断(J) / 知覚(P):

【性格の特徴】
- 強み:
- 注意したい点:
- コミュニケーションの傾向:
- 意思決定の傾向:

【職場での特性】
- 向いている役割:
- チームへの貢献:
- ストレスになりやすいこと:
- 成長へのアドバイス:

${input.persona}として、本人の成長につながる分析にしてください。`,
};

const big5: AssessmentFramework = {
  key: 'big5',
  label: 'Big Five',
  buildPrompt: (input) => `${header('次の情報から、ビッグファイブ（Big Five）の観点で性格特性を分析してください。', input)}
【ビッグファイブ分析結果】

【各特性の評価】（1〜10で評価）
- 開放性（Openness）: [点数] - [説明]
- 誠実性（Conscientiousness）: [点数] - [説明]
- 外向性（Extraversion）: [点数] - [説明]
- 協調性（Agreeableness）: [点数] - [説明]
- 神経症傾向（Neuroticism）: [点数] - [説明]

【全体像】
- 性格の特徴:
- 行動パターン:
- 対人関係の特徴:

【実践的なアドバイス】
- 強みの活かし方:
- 気をつける点:
- 成長のための提案:

${input.persona}として、客観的な分析にしてください。`,
};

const disc: AssessmentFramework = {
  key: 'disc',
  label: 'DISC',
  buildPrompt: (input) => `${header('次の情報から、DISC行動特性の観点で分析してください。', input)}
【DISC分析結果】

【各特性の評価】（高・中・低）
- 主導（Dominance）: [レベル] - [行動の特徴]
- 感化（Influence）: [レベル] - [行動の特徴]
- 安定（Steadiness）: [レベル] - [行動の特徴]
- 慎重（Conscientiousness）: [レベル] - [行動の特徴]

【行動スタイル】
- 仕事の進め方:
- コミュニケーション:
- 意思決定:
- ストレス下での行動:

【職場での活かし方】
- 向いている業務:
- 動機づけの方法:
- 他タイプとの協働:
- リーダーシップ:

${input.persona}として、すぐに使える分析にしてください。`,
};

const strengths: AssessmentFramework = {
  key: 'strengths',
  label: 'Strengths',
  buildPrompt: (input) => `${header('次の情報から、強みの観点で才能と能力を分析してください。', input)}
【強み分析結果】

【主な強み】（上位5つ）
1. [強み]: [説明と発揮される場面]
2. [強み]: [説明と発揮される場面]
3. [強み]: [説明と発揮される場面]
4. [強み]: [説明と発揮される場面]
5. [強み]: [説明と発揮される場面]

【強みの活かし方】
- 現在の役割で:
- キャリアで:
- チームで:

【成長のための提案】
- 強みを伸ばす:
- 弱みを補う:
- 新しい挑戦:

【アクションプラン】
- 今日からできること:
- 1か月の目標:
- 長期の方向性:

${input.persona}として、前向きで実行できる分析にしてください。`,
};

/**
 * フレームワークレジストリ
 */
export class FrameworkRegistry {
  private frameworks = new Map<string, AssessmentFramework>();

  register(framework: AssessmentFramework): void {
    this.frameworks.set(framework.key, framework);
  }

  get(key: string): AssessmentFramework | null {
    return this.frameworks.get(key) ?? null;
  }

  keys(): string[] {
    return Array.from(this.frameworks.keys());
  }
}

export function createDefaultFrameworkRegistry(): FrameworkRegistry {
  const registry = new FrameworkRegistry();
  for (const framework of [mbti, big5, disc, strengths]) {
    registry.register(framework);
  }
  return registry;
}
