import type { LLMClient, LLMChatParams, LLMChatResponse } from '@persona-desk/persona-spec';
import { formatJapaneseDate } from '../datetime';

export const MOCK_MODEL = 'persona-desk-mock';

export interface MockClientOptions {
  personaName: string;
  now?: () => Date;
}

interface CannedAnswer {
  keywords: string[];
  answer: string;
}

const CANNED_ANSWERS: CannedAnswer[] = [
  {
    keywords: ['文書', 'ドキュメント'],
    answer: `承知しました。以下の構成で文書を作成します。

【構成案】
1. 目的と概要
2. 背景と現状
3. 提案内容
4. スケジュール
5. 期待効果

追加のご要望があればお知らせください。`,
  },
  {
    keywords: ['会議', 'ミーティング'],
    answer: `会議の進め方について承知しました。

【進行方針】
1. アジェンダと時間配分の確認
2. 議題ごとの論点整理
3. 参加者全員からの意見聴取
4. 合意点の確認
5. 次のアクションと担当の決定`,
  },
  {
    keywords: ['評価', 'アセスメント'],
    answer: `評価の観点を整理しました。

【評価の観点】
- コミュニケーションの傾向
- 意思決定のスタイル
- チーム内で発揮しやすい役割
- 強みと伸ばせる領域
- 力を発揮しやすい環境`,
  },
  {
    keywords: ['相談', '提案'],
    answer: `ご相談ありがとうございます。

【分析の視点】
- 現状と課題の整理
- 選択肢の洗い出し
- リスクと機会
- 実現可能性
- 中長期の影響`,
  },
];

/**
 * 開発用モッククライアント
 *
 * APIキー未設定時に使う。最後のユーザーメッセージのキーワードで定型文を返す
 */
export function createMockClient(options: MockClientOptions): LLMClient {
  const now = options.now ?? (() => new Date());

  const answerFor = (prompt: string): string => {
    const canned = CANNED_ANSWERS.find((c) => c.keywords.some((k) => prompt.includes(k)));
    if (canned) {
      return canned.answer;
    }
    return `承知しました。${formatJapaneseDate(now())}時点の${options.personaName}として、ご質問について考えます。

状況やご要望をもう少し詳しくお聞かせいただけますか。

（注：これは開発用のモック応答です。実運用ではAIプロバイダーのAPIキーを設定してください。）`;
  };

  return {
    provider: 'mock',

    async chat(params: LLMChatParams): Promise<LLMChatResponse> {
      const lastUser = [...params.messages].reverse().find((m) => m.role === 'user');
      const prompt = lastUser?.content ?? '';

      // API を呼ばないので使用トークンは 0
      return {
        content: answerFor(prompt),
        tokens_used: { input: 0, output: 0 },
        model: MOCK_MODEL,
      };
    },
  };
}
